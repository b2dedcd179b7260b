import { sha256 } from "@noble/hashes/sha256"

import type { DataBlock } from "./interface.js"
import { encodeVectorClock } from "./DataBlock.js"

const sizeBuffer = new ArrayBuffer(4)
const sizeBufferView = new DataView(sizeBuffer)

/**
 * SHA-256 of a data block's canonical bytes: the key and the value, each
 * prefixed with its big-endian uint32 length, followed by the encoded vector clock.
 *
 * This framing is the hashing contract between replicas. Two replicas only
 * agree on a root hash if both hash leaves exactly this way.
 */
export function hashLeaf({ key, value, vectorClock }: DataBlock): Uint8Array {
	const hash = sha256.create()

	sizeBufferView.setUint32(0, key.length)
	hash.update(new Uint8Array(sizeBuffer))
	hash.update(key)
	sizeBufferView.setUint32(0, value.length)
	hash.update(new Uint8Array(sizeBuffer))
	hash.update(value)
	hash.update(encodeVectorClock(vectorClock))

	return hash.digest()
}

export function hashBranch(left: Uint8Array, right: Uint8Array): Uint8Array {
	return sha256.create().update(left).update(right).digest()
}
