import { MerkleTree } from "@antientropy/merkle"
import type { TreeOptions } from "@antientropy/merkle"

import { MemoryStore } from "./MemoryStore.js"

export function openTree(options: TreeOptions = {}): MerkleTree {
	return new MerkleTree(new MemoryStore(), options)
}

export { MemoryStore }
export { Replica } from "./Replica.js"
