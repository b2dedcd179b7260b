export type VectorClock = Record<string, number>

export type DataBlock = {
	readonly key: Uint8Array
	readonly value: Uint8Array
	readonly vectorClock: Readonly<VectorClock>
}

export type Leaf = {
	readonly isLeaf: true
	readonly level: 0
	readonly hash: Uint8Array
	readonly key: Uint8Array
	readonly block: DataBlock
	readonly size: 1
	readonly min: Uint8Array
	readonly max: Uint8Array
}

/**
 * An internal node. The last node of an odd-length level is paired with itself,
 * in which case `left` and `right` are the same (frozen) object.
 */
export type Branch = {
	readonly isLeaf: false
	readonly level: number
	readonly hash: Uint8Array
	readonly left: Node
	readonly right: Node
	readonly size: number
	readonly min: Uint8Array
	readonly max: Uint8Array
}

export type Node = Leaf | Branch

export type Awaitable<T> = Promise<T> | T

export type Bound<T = Uint8Array> = { key: T; inclusive: boolean }

export type Entry = [key: Uint8Array, block: DataBlock]

/**
 * A sorted, mutable map from keys to data blocks.
 * `snapshot()` returns an independent copy; writes to either copy are not
 * visible in the other.
 */
export interface DataStore {
	readonly size: number

	get(key: Uint8Array): DataBlock | null
	set(key: Uint8Array, block: DataBlock): void
	delete(key: Uint8Array): void
	clear(): void

	/** The number of keys strictly less than `key` */
	rank(key: Uint8Array): number

	keys(
		lowerBound?: Bound | null,
		upperBound?: Bound | null,
		options?: { reverse?: boolean },
	): IterableIterator<Uint8Array>

	entries(
		lowerBound?: Bound | null,
		upperBound?: Bound | null,
		options?: { reverse?: boolean },
	): IterableIterator<Entry>

	snapshot(): DataStore
}

export interface TreeOptions {
	/** Rehash a single root-to-leaf path when an existing key changes, instead of rebuilding */
	incremental?: boolean
}

export interface CompareOptions {
	/** Maximum number of node pairs to examine */
	budget?: number
	/** Wall-clock deadline as a `Date.now()` timestamp */
	deadline?: number
}

export type CompareResult = {
	/** Deduplicated, in ascending key order */
	inconsistentKeys: Uint8Array[]
	/** `false` if the traversal was cut short by a budget or deadline */
	complete: boolean
	/** Number of node pairs examined */
	visits: number
}

/**
 * Anything the comparator can diff against: a root, and the full keyset for
 * the case where the other side is empty.
 */
export interface TreeSource {
	getRoot(): Node | null
	keys(): IterableIterator<Uint8Array>
}

export interface ReadOnlyTree extends TreeSource {
	readonly size: number

	getRootHash(): Uint8Array
	has(key: Uint8Array): boolean
	get(key: Uint8Array): DataBlock | null

	keys(lowerBound?: Bound | null, upperBound?: Bound | null, options?: { reverse?: boolean }): IterableIterator<Uint8Array>
	entries(lowerBound?: Bound | null, upperBound?: Bound | null, options?: { reverse?: boolean }): IterableIterator<Entry>

	compare(other: TreeSource, options?: CompareOptions): CompareResult
}

export interface ReadWriteTree extends ReadOnlyTree {
	update(key: Uint8Array, value: Uint8Array, vectorClock: VectorClock): void
	delete(key: Uint8Array): void
}
