import { compare } from "uint8arrays"

import createTree from "functional-red-black-tree"
import type { Tree } from "functional-red-black-tree"

import { isAbove, isBelow } from "@antientropy/merkle"
import type { Bound, DataBlock, DataStore, Entry } from "@antientropy/merkle"

/**
 * A DataStore on a persistent red-black tree. Every write replaces the
 * underlying tree, so `snapshot()` is O(1) and snapshots never observe
 * later writes.
 */
export class MemoryStore implements DataStore {
	#tree: Tree<Uint8Array, DataBlock>

	public constructor(tree: Tree<Uint8Array, DataBlock> = createTree(compare)) {
		this.#tree = tree
	}

	public get size(): number {
		return this.#tree.length
	}

	public get(key: Uint8Array): DataBlock | null {
		return this.#tree.get(key) ?? null
	}

	public set(key: Uint8Array, block: DataBlock): void {
		if (this.#tree.get(key) !== undefined) {
			this.#tree = this.#tree.remove(key)
		}

		this.#tree = this.#tree.insert(key, block)
	}

	public delete(key: Uint8Array): void {
		this.#tree = this.#tree.remove(key)
	}

	public clear(): void {
		this.#tree = createTree(compare)
	}

	public rank(key: Uint8Array): number {
		return this.#tree.ge(key).index
	}

	public snapshot(): MemoryStore {
		return new MemoryStore(this.#tree)
	}

	public *keys(
		lowerBound: Bound | null = null,
		upperBound: Bound | null = null,
		{ reverse = false }: { reverse?: boolean } = {},
	): IterableIterator<Uint8Array> {
		for (const [key] of this.entries(lowerBound, upperBound, { reverse })) {
			yield key
		}
	}

	public *entries(
		lowerBound: Bound | null = null,
		upperBound: Bound | null = null,
		{ reverse = false }: { reverse?: boolean } = {},
	): IterableIterator<Entry> {
		if (reverse === false) {
			const iter =
				lowerBound === null
					? this.#tree.begin
					: lowerBound.inclusive
						? this.#tree.ge(lowerBound.key)
						: this.#tree.gt(lowerBound.key)

			while (iter.valid && isBelow(iter.key, upperBound)) {
				yield [iter.key, iter.value]
				iter.next()
			}
		} else {
			const iter =
				upperBound === null
					? this.#tree.end
					: upperBound.inclusive
						? this.#tree.le(upperBound.key)
						: this.#tree.lt(upperBound.key)

			while (iter.valid && isAbove(iter.key, lowerBound)) {
				yield [iter.key, iter.value]
				iter.prev()
			}
		}
	}
}
