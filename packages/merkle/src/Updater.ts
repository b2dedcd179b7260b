import type { DataBlock, Node } from "./interface.js"
import { createBranch, createLeaf } from "./Builder.js"
import { logger } from "./logger.js"
import { assert, equalKeys } from "./utils.js"

/**
 * Updater replaces the leaf at a given sorted position and rehashes the single
 * path from that leaf to the root. Every node off the path is reused as-is, and
 * the old root is left untouched.
 *
 * The leaf count must not change: inserting or deleting a key shifts the
 * position of every following leaf, which requires a full rebuild.
 */
export class Updater {
	private readonly log = logger("antientropy:updater")

	public update(root: Node, rank: number, block: DataBlock): Node {
		if (!Number.isInteger(rank) || rank < 0 || rank >= root.size) {
			throw new RangeError("leaf rank out of range")
		}

		this.log("update(%d, %k)", rank, block.key)
		return this.replace(root, rank, block)
	}

	private replace(node: Node, rank: number, block: DataBlock): Node {
		if (node.isLeaf) {
			assert(equalKeys(node.key, block.key), "leaf key does not match block key")
			return createLeaf(block)
		}

		// the position of the child on the path, among all nodes at the child's level
		const position = Math.floor(rank / 2 ** (node.level - 1))
		if (position % 2 === 0) {
			const left = this.replace(node.left, rank, block)
			const right = node.right === node.left ? left : node.right
			return createBranch(left, right)
		} else {
			assert(node.right !== node.left, "expected distinct right child")
			return createBranch(node.left, this.replace(node.right, rank, block))
		}
	}
}
