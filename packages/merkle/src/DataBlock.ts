import { compare, fromString } from "uint8arrays"

import type { DataBlock, VectorClock } from "./interface.js"
import { ValidationError } from "./errors.js"

export function validateKey(key: unknown): asserts key is Uint8Array {
	if (!(key instanceof Uint8Array)) {
		throw new ValidationError("key must be a Uint8Array")
	} else if (key.byteLength === 0) {
		throw new ValidationError("key must not be empty")
	}
}

export function validateValue(value: unknown): asserts value is Uint8Array {
	if (!(value instanceof Uint8Array)) {
		throw new ValidationError("value must be a Uint8Array")
	}
}

export function validateVectorClock(clock: unknown): asserts clock is VectorClock {
	if (typeof clock !== "object" || clock === null || Array.isArray(clock)) {
		throw new ValidationError("vector clock must be an object")
	}

	for (const [nodeId, counter] of Object.entries(clock)) {
		if (nodeId.length === 0) {
			throw new ValidationError("vector clock node id must not be empty")
		} else if (nodeId.includes(":") || nodeId.includes(";")) {
			throw new ValidationError(`invalid vector clock node id ${JSON.stringify(nodeId)}`)
		} else if (typeof counter !== "number" || !Number.isSafeInteger(counter) || counter < 0) {
			throw new ValidationError(`invalid vector clock counter for ${JSON.stringify(nodeId)}`)
		}
	}
}

/**
 * Validate and copy a key, value and vector clock into a frozen data block.
 * Later writes to the caller's buffers do not affect the block.
 */
export function createDataBlock(key: Uint8Array, value: Uint8Array, vectorClock: VectorClock): DataBlock {
	validateKey(key)
	validateValue(value)
	validateVectorClock(vectorClock)

	return Object.freeze({
		key: key.slice(),
		value: value.slice(),
		vectorClock: Object.freeze({ ...vectorClock }),
	})
}

/** Copy a stored block so that callers cannot write to the tree's buffers. */
export function copyDataBlock({ key, value, vectorClock }: DataBlock): DataBlock {
	return Object.freeze({ key: key.slice(), value: value.slice(), vectorClock })
}

/**
 * Canonical byte representation of a vector clock: `nodeId:counter;` for every
 * entry, sorted by the UTF-8 bytes of the node id. Independent of the order in
 * which the clock's entries were inserted.
 */
export function encodeVectorClock(clock: Readonly<VectorClock>): Uint8Array {
	const entries = Object.entries(clock).map(([nodeId, counter]) => [fromString(nodeId), `${nodeId}:${counter};`] as const)
	entries.sort(([a], [b]) => compare(a, b))
	return fromString(entries.map(([_, entry]) => entry).join(""))
}
