import PQueue from "p-queue"

import { MerkleTree, createDataBlock } from "@antientropy/merkle"
import type {
	Awaitable,
	CompareOptions,
	CompareResult,
	DataBlock,
	ReadOnlyTree,
	ReadWriteTree,
	TreeOptions,
	TreeSource,
} from "@antientropy/merkle"
import { logger } from "@antientropy/merkle/logger"

import { MemoryStore } from "./MemoryStore.js"

/**
 * Replica owns the tree of one shard. Readers always see the most recently
 * published snapshot; writers are serialized, work on a private fork of the
 * tree, and publish it with a single reference swap when their callback
 * returns. A callback that throws publishes nothing.
 */
export class Replica {
	public static async fromEntries(
		entries: Iterable<DataBlock> | AsyncIterable<DataBlock>,
		options: TreeOptions = {},
	): Promise<Replica> {
		const store = new MemoryStore()
		for await (const { key, value, vectorClock } of entries) {
			const block = createDataBlock(key, value, vectorClock)
			store.set(block.key, block)
		}

		return new Replica(options, new MerkleTree(store, options))
	}

	private readonly log = logger("antientropy:replica")

	#queue = new PQueue({ concurrency: 1 })
	#open = true
	#tree: MerkleTree

	public constructor(
		public readonly options: TreeOptions = {},
		tree: MerkleTree = new MerkleTree(new MemoryStore(), options),
	) {
		tree.getRoot()
		this.#tree = tree
	}

	public async close(): Promise<void> {
		this.#open = false
		await this.#queue.onIdle()
		this.#tree = new MerkleTree(new MemoryStore(), this.options)
	}

	public async clear(): Promise<void> {
		this.assertOpen()
		await this.#queue.add(
			() => {
				this.#tree = new MerkleTree(new MemoryStore(), this.options)
				this.log("cleared")
			},
			{ throwOnTimeout: true },
		)
	}

	/**
	 * The currently published snapshot. It is never modified, even by
	 * writes that complete after it is returned.
	 */
	public snapshot(): ReadOnlyTree {
		this.assertOpen()
		return this.#tree
	}

	public getRootHash(): Uint8Array {
		return this.snapshot().getRootHash()
	}

	public compare(peer: Replica | TreeSource, options: CompareOptions = {}): CompareResult {
		const other = peer instanceof Replica ? peer.snapshot() : peer
		return this.snapshot().compare(other, options)
	}

	public async read<T>(callback: (tree: ReadOnlyTree) => Awaitable<T>): Promise<T> {
		return await callback(this.snapshot())
	}

	public async write<T>(callback: (tree: ReadWriteTree) => Awaitable<T>): Promise<T> {
		this.assertOpen()

		return await this.#queue.add(
			async () => {
				const tree = this.#tree.snapshot()
				const result = await callback(tree)

				// rebuild before publishing so that readers never trigger a rebuild
				const root = tree.getRoot()
				this.#tree = tree
				this.log("published root %n", root)
				return result
			},
			{ throwOnTimeout: true },
		)
	}

	private assertOpen() {
		if (this.#open === false) {
			throw new Error("replica closed")
		}
	}
}
