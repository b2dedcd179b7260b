import debug from "debug"
import { toString } from "uint8arrays"

import type { Node } from "./interface.js"

export const formatKey = (key: Uint8Array | null) => (key ? toString(key, "hex") : "null")

export const formatNode = (node: Node | null) => {
	if (node === null) {
		return "null"
	} else if (node.isLeaf) {
		return `{ 0:${formatKey(node.min)} | ${toString(node.hash, "hex")} }`
	} else {
		return `{ ${node.level}:${formatKey(node.min)}..${formatKey(node.max)} | ${toString(node.hash, "hex")} }`
	}
}

debug.formatters.h = (bytes: Uint8Array) => toString(bytes, "hex")
debug.formatters.k = formatKey
debug.formatters.n = formatNode

export const logger = (name: string) => debug(name)
