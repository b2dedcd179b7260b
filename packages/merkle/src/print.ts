import { toString } from "uint8arrays"

import type { Node, TreeSource } from "./interface.js"

/**
 * Pretty-print the tree structure as utf-8 lines.
 * A duplicated odd node is printed once, followed by a `=` marker.
 */
export function* printTree(tree: TreeSource, options: { hashSize?: number } = {}): IterableIterator<Uint8Array> {
	const hashSize = options.hashSize ?? 4
	const slot = "  ".repeat(hashSize)
	const hash = ({ hash }: Node) => toString(hash.subarray(0, hashSize), "hex")
	const encoder = new TextEncoder()

	function* printNode(prefix: string, bullet: string, node: Node): IterableIterator<Uint8Array> {
		yield encoder.encode(bullet)
		yield encoder.encode(` ${hash(node)} `)
		if (node.isLeaf) {
			yield encoder.encode(`│ ${toString(node.key, "hex")}\n`)
		} else if (node.left === node.right) {
			yield* printNode(prefix + "│   " + slot, "┬─", node.left)
			yield encoder.encode(prefix)
			yield encoder.encode("└─ =\n")
		} else {
			yield* printNode(prefix + "│   " + slot, "┬─", node.left)
			yield encoder.encode(prefix)
			yield* printNode(prefix + "    " + slot, "└─", node.right)
		}
	}

	const root = tree.getRoot()
	if (root === null) {
		yield encoder.encode("── (empty)\n")
	} else {
		yield* printNode("    " + slot, "──", root)
	}
}
