import { equals } from "uint8arrays"

import type {
	Bound,
	CompareOptions,
	CompareResult,
	DataBlock,
	DataStore,
	Entry,
	Node,
	ReadWriteTree,
	TreeOptions,
	TreeSource,
	VectorClock,
} from "./interface.js"
import { DEFAULT_OPTIONS, ZERO_DIGEST } from "./constants.js"
import { copyDataBlock, createDataBlock, validateKey } from "./DataBlock.js"
import { Builder } from "./Builder.js"
import { Comparator } from "./Comparator.js"
import { Updater } from "./Updater.js"
import { hashLeaf } from "./hash.js"
import { logger } from "./logger.js"

/**
 * MerkleTree pairs an authoritative DataStore with a cached hash tree over
 * its keys. Writes mark the cached root stale (or, for a changed value of an
 * existing key, rehash a single path) and the next read rebuilds it.
 *
 * The root is always replaced and never mutated, so a root obtained from
 * `getRoot()` remains a consistent snapshot after later writes.
 */
export class MerkleTree implements ReadWriteTree {
	public readonly options: Required<TreeOptions>

	private readonly log = logger("antientropy:tree")
	private readonly updater = new Updater()

	#root: Node | null = null
	#stale: boolean

	public constructor(
		private readonly store: DataStore,
		options: TreeOptions = {},
	) {
		const { incremental = DEFAULT_OPTIONS.incremental } = options
		this.options = { incremental }
		this.#stale = store.size > 0
	}

	public get size(): number {
		return this.store.size
	}

	public update(key: Uint8Array, value: Uint8Array, vectorClock: VectorClock): void {
		const block = createDataBlock(key, value, vectorClock)
		this.log("update(%h, %h)", block.key, block.value)

		const previous = this.store.get(block.key)
		if (previous !== null && equals(hashLeaf(previous), hashLeaf(block))) {
			return
		}

		this.store.set(block.key, block)

		if (previous !== null && this.options.incremental && !this.#stale && this.#root !== null) {
			this.#root = this.updater.update(this.#root, this.store.rank(block.key), block)
		} else {
			this.#stale = true
		}
	}

	public delete(key: Uint8Array): void {
		validateKey(key)
		this.log("delete(%h)", key)

		if (this.store.get(key) === null) {
			return
		}

		this.store.delete(key)
		this.#stale = true
	}

	public clear(): void {
		this.store.clear()
		this.#root = null
		this.#stale = false
	}

	/**
	 * Get the root node of the hash tree, rebuilding it first if the tree has
	 * been modified. Returns null if the tree is empty.
	 */
	public getRoot(): Node | null {
		if (this.#stale) {
			this.#root = Builder.fromStore(this.store)
			this.#stale = false
			this.log("rebuilt root %n", this.#root)
		}

		return this.#root
	}

	public getRootHash(): Uint8Array {
		const root = this.getRoot()
		return root === null ? ZERO_DIGEST.slice() : root.hash.slice()
	}

	public has(key: Uint8Array): boolean {
		return this.store.get(key) !== null
	}

	public get(key: Uint8Array): DataBlock | null {
		const block = this.store.get(key)
		return block === null ? null : copyDataBlock(block)
	}

	// keys and blocks are copied on the way out: the stored keys order the
	// store and the stored values back the leaf hashes.

	public *keys(
		lowerBound: Bound | null = null,
		upperBound: Bound | null = null,
		options: { reverse?: boolean } = {},
	): IterableIterator<Uint8Array> {
		for (const key of this.store.keys(lowerBound, upperBound, options)) {
			yield key.slice()
		}
	}

	public *entries(
		lowerBound: Bound | null = null,
		upperBound: Bound | null = null,
		options: { reverse?: boolean } = {},
	): IterableIterator<Entry> {
		for (const [key, block] of this.store.entries(lowerBound, upperBound, options)) {
			yield [key.slice(), copyDataBlock(block)]
		}
	}

	public compare(other: TreeSource, options: CompareOptions = {}): CompareResult {
		return new Comparator(this, other, options).compare()
	}

	/**
	 * Fork the tree. The snapshot shares the current (frozen) root but owns a
	 * separate copy of the store, so writes to either tree are invisible to the other.
	 */
	public snapshot(): MerkleTree {
		const root = this.getRoot()
		const tree = new MerkleTree(this.store.snapshot(), this.options)
		tree.#root = root
		tree.#stale = false
		return tree
	}
}
