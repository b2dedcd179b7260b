import type { Branch, DataBlock, DataStore, Leaf, Node } from "./interface.js"
import { hashBranch, hashLeaf } from "./hash.js"
import { logger } from "./logger.js"
import { assert, compareKeys } from "./utils.js"

export function createLeaf(block: DataBlock): Leaf {
	const leaf: Leaf = {
		isLeaf: true,
		level: 0,
		hash: hashLeaf(block),
		key: block.key,
		block,
		size: 1,
		min: block.key,
		max: block.key,
	}

	return Object.freeze(leaf)
}

/**
 * Create a parent for two adjacent nodes at the same level. Passing the same
 * node twice creates the parent of a duplicated odd node.
 */
export function createBranch(left: Node, right: Node): Branch {
	assert(left.level === right.level, "cannot pair nodes at different levels")
	const branch: Branch = {
		isLeaf: false,
		level: left.level + 1,
		hash: hashBranch(left.hash, right.hash),
		left,
		right,
		size: left === right ? left.size : left.size + right.size,
		min: left.min,
		max: right.max,
	}

	return Object.freeze(branch)
}

/**
 * Builder assembles a balanced binary hash tree bottom-up from a sorted keyset.
 * Adjacent nodes are paired left to right, and the last node of an odd-length
 * level is paired with itself.
 */
export class Builder {
	public static fromStore(store: DataStore): Node | null {
		const builder = new Builder()
		for (const [_, block] of store.entries()) {
			builder.add(block)
		}

		return builder.finalize()
	}

	public static fromEntries(blocks: Iterable<DataBlock>): Node | null {
		const sorted = Array.from(blocks).sort((a, b) => compareKeys(a.key, b.key))

		const builder = new Builder()
		for (const block of sorted) {
			builder.add(block)
		}

		return builder.finalize()
	}

	private readonly log = logger("antientropy:builder")
	private readonly leaves: Leaf[] = []
	private finalized = false

	public get size(): number {
		return this.leaves.length
	}

	public add(block: DataBlock): void {
		if (this.finalized) {
			throw new Error("builder already finalized")
		}

		const last = this.leaves.at(-1)
		if (last !== undefined && compareKeys(last.key, block.key) !== -1) {
			throw new RangeError("keys must be added in strictly ascending order")
		}

		this.leaves.push(createLeaf(block))
	}

	public finalize(): Node | null {
		this.finalized = true
		if (this.leaves.length === 0) {
			this.log("finalized empty tree")
			return null
		}

		let nodes: Node[] = this.leaves
		while (nodes.length > 1) {
			nodes = Builder.buildLevel(nodes)
		}

		const [root] = nodes
		this.log("finalized %d leaves with root %n", this.leaves.length, root)
		return root
	}

	private static buildLevel(nodes: Node[]): Node[] {
		const parents: Node[] = []
		for (let i = 0; i < nodes.length; i += 2) {
			const left = nodes[i]
			const right = i + 1 < nodes.length ? nodes[i + 1] : left
			parents.push(createBranch(left, right))
		}

		return parents
	}
}
