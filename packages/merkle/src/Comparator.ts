import { equals, toString } from "uint8arrays"

import type { CompareOptions, CompareResult, Node, TreeSource } from "./interface.js"
import { logger } from "./logger.js"
import { compareKeys, keyRange } from "./utils.js"

/**
 * Comparator diffs two trees by walking them in lockstep from the roots,
 * pruning every pair of subtrees with equal hashes.
 *
 * Positions are aligned by pairing order only. Two trees built from different
 * keysets have different shapes, so wherever a leaf meets a branch the entire
 * key range of both sides is reported, and leaves at the same position with
 * different keys are both reported.
 */
export class Comparator {
	private static indent = "│ "

	private depth = 0
	private formatter = logger("antientropy:compare")

	private readonly inconsistentKeys = new Map<string, Uint8Array>()
	private visits = 0
	private complete = true

	constructor(
		private readonly a: TreeSource,
		private readonly b: TreeSource,
		private readonly options: CompareOptions = {},
	) {
		if (options.budget !== undefined && !(Number.isInteger(options.budget) && options.budget >= 0)) {
			throw new RangeError("budget must be a non-negative integer")
		}
	}

	private log(format: string, ...args: unknown[]) {
		this.formatter("%s" + format, Comparator.indent.repeat(this.depth), ...args)
	}

	public compare(): CompareResult {
		const rootA = this.a.getRoot()
		const rootB = this.b.getRoot()

		this.log("COMPARE")
		this.depth += 1
		this.log("root a: %n", rootA)
		this.log("root b: %n", rootB)

		if (rootA === null && rootB === null) {
			this.log("both trees are empty")
		} else if (rootA === null) {
			this.log("tree a is empty")
			for (const key of this.b.keys()) {
				this.emit(key)
			}
		} else if (rootB === null) {
			this.log("tree b is empty")
			for (const key of this.a.keys()) {
				this.emit(key)
			}
		} else {
			this.compareNodes(rootA, rootB)
		}

		this.depth -= 1

		const inconsistentKeys = Array.from(this.inconsistentKeys.values()).sort(compareKeys)
		this.log("found %d inconsistent keys in %d visits", inconsistentKeys.length, this.visits)
		return { inconsistentKeys, complete: this.complete, visits: this.visits }
	}

	private compareNodes(a: Node, b: Node): void {
		if (!this.complete) {
			return
		} else if (this.isExhausted()) {
			this.log("budget exhausted after %d visits", this.visits)
			this.complete = false
			return
		}

		this.visits += 1
		this.log("a: %n", a)
		this.log("b: %n", b)

		if (equals(a.hash, b.hash)) {
			this.log("skipping subtree")
		} else if (a.isLeaf && b.isLeaf) {
			this.emit(a.key)
			this.emit(b.key)
		} else if (a.isLeaf || b.isLeaf) {
			this.log("structural mismatch")
			this.emitRange(a)
			this.emitRange(b)
		} else {
			this.depth += 1
			this.compareNodes(a.left, b.left)
			if (a.right !== a.left || b.right !== b.left) {
				this.compareNodes(a.right, b.right)
			}

			this.depth -= 1
		}
	}

	private isExhausted(): boolean {
		const { budget, deadline } = this.options
		if (budget !== undefined && this.visits >= budget) {
			return true
		} else if (deadline !== undefined && Date.now() >= deadline) {
			return true
		} else {
			return false
		}
	}

	private emitRange(node: Node) {
		for (const key of keyRange(node)) {
			this.emit(key)
		}
	}

	private emit(key: Uint8Array) {
		const id = toString(key, "hex")
		if (!this.inconsistentKeys.has(id)) {
			this.log("inconsistent key %k", key)
			this.inconsistentKeys.set(id, key.slice())
		}
	}
}

export function compare(a: TreeSource, b: TreeSource, options: CompareOptions = {}): CompareResult {
	return new Comparator(a, b, options).compare()
}
