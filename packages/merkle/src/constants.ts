import type { TreeOptions } from "./interface.js"

export const HASH_SIZE = 32

/** Root hash of a tree with no keys */
export const ZERO_DIGEST: Uint8Array = new Uint8Array(HASH_SIZE)

export const DEFAULT_OPTIONS: Required<TreeOptions> = { incremental: true }
