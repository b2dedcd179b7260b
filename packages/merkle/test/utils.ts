import Prando from "prando"
import { hexToBytes } from "@noble/hashes/utils"
import { fromString, toString } from "uint8arrays"

import { assert } from "@antientropy/merkle"
import type { Node, ReadWriteTree, VectorClock } from "@antientropy/merkle"

export const encode = (value: string) => fromString(value)
export const decode = (value: Uint8Array) => toString(value)

export const defaultValue = hexToBytes("ffffffff")

export function getKey(i: number): Uint8Array {
	const buffer = new ArrayBuffer(4)
	const view = new DataView(buffer)
	view.setUint32(0, i)
	return new Uint8Array(buffer)
}

export function* iota(
	count: number,
	getValue: (i: number) => Uint8Array = () => defaultValue,
): IterableIterator<[Uint8Array, Uint8Array]> {
	for (let i = 0; i < count; i++) {
		yield [getKey(i), getValue(i)]
	}
}

export function populate<T extends ReadWriteTree>(
	tree: T,
	entries: Iterable<[Uint8Array, Uint8Array]>,
	vectorClock: VectorClock = { n1: 1 },
): T {
	for (const [key, value] of entries) {
		tree.update(key, value, vectorClock)
	}

	return tree
}

export function shuffle<T>(seed: string, array: T[]): T[] {
	const rng = new Prando.default(seed)
	for (let i = array.length - 1; i > 0; i--) {
		const j = rng.nextInt(0, i)
		const temp = array[i]
		array[i] = array[j]
		array[j] = temp
	}

	return array
}

/**
 * Follow a path of child directions down from a node.
 */
export function descend(node: Node | null, ...path: ("left" | "right")[]): Node {
	assert(node !== null, "tree is empty")
	for (const direction of path) {
		assert(!node.isLeaf, "unexpected leaf")
		node = node[direction]
	}

	return node
}
