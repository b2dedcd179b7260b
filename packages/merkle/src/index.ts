export * from "./interface.js"
export * from "./constants.js"
export * from "./errors.js"

export * from "./DataBlock.js"
export * from "./Builder.js"
export * from "./Comparator.js"
export * from "./Updater.js"
export * from "./MerkleTree.js"

export { hashLeaf, hashBranch } from "./hash.js"
export { printTree } from "./print.js"
export { assert, compareKeys, equalKeys, isAbove, isBelow, keyRange, getHeight } from "./utils.js"
