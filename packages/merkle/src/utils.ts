import { equals, compare } from "uint8arrays"

import type { Bound, Node } from "./interface.js"

export function assert(condition: unknown, message?: string, ...args: unknown[]): asserts condition {
	if (!condition) {
		if (args.length > 0) {
			console.error(...args)
		}

		throw new Error(message ?? "Internal error")
	}
}

export function compareKeys(a: Uint8Array, b: Uint8Array): -1 | 0 | 1 {
	const result = compare(a, b)
	return result < 0 ? -1 : result > 0 ? 1 : 0
}

export const equalKeys = (a: Uint8Array, b: Uint8Array) => equals(a, b)

export function isAbove(key: Uint8Array, lowerBound: Bound | null): boolean {
	if (lowerBound === null) {
		return true
	} else if (lowerBound.inclusive) {
		return compare(key, lowerBound.key) >= 0
	} else {
		return compare(key, lowerBound.key) > 0
	}
}

export function isBelow(key: Uint8Array, upperBound: Bound | null): boolean {
	if (upperBound === null) {
		return true
	} else if (upperBound.inclusive) {
		return compare(key, upperBound.key) <= 0
	} else {
		return compare(key, upperBound.key) < 0
	}
}

/**
 * Yield the keys covered by a node in ascending order.
 * A duplicated right child is only visited once.
 */
export function* keyRange(node: Node): IterableIterator<Uint8Array> {
	if (node.isLeaf) {
		yield node.key
	} else {
		yield* keyRange(node.left)
		if (node.right !== node.left) {
			yield* keyRange(node.right)
		}
	}
}

export function getHeight(size: number): number {
	let height = 0
	while (size > 1) {
		size = Math.ceil(size / 2)
		height++
	}

	return height
}
