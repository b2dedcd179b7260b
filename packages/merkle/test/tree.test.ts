import test from "ava"

import { MerkleTree, ValidationError, ZERO_DIGEST, hashBranch, hashLeaf } from "@antientropy/merkle"
import { MemoryStore, openTree } from "@antientropy/memory"

import { decode, defaultValue, descend, encode, getKey, iota, populate, shuffle } from "./utils.js"

test("empty tree", (t) => {
	const tree = openTree()
	t.is(tree.size, 0)
	t.is(tree.getRoot(), null)
	t.deepEqual(tree.getRootHash(), ZERO_DIGEST)
})

test("get/update/delete", (t) => {
	const tree = openTree()
	tree.update(encode("a"), encode("foo"), { n1: 1 })
	tree.update(encode("a"), encode("bar"), { n1: 2 })
	t.deepEqual(tree.get(encode("a"))?.value, encode("bar"))
	t.deepEqual(tree.get(encode("a"))?.vectorClock, { n1: 2 })
	t.true(tree.has(encode("a")))

	tree.delete(encode("a"))
	t.is(tree.get(encode("a")), null)
	t.false(tree.has(encode("a")))

	tree.delete(encode("a"))
	t.is(tree.get(encode("a")), null)
	t.deepEqual(tree.getRootHash(), ZERO_DIGEST)
})

test("root hash of a single key is its leaf hash", (t) => {
	const tree = openTree()
	tree.update(encode("a"), encode("foo"), { n1: 1 })

	const block = tree.get(encode("a"))
	t.not(block, null)
	if (block !== null) {
		t.deepEqual(tree.getRootHash(), hashLeaf(block))
	}
})

test("root hash of two keys", (t) => {
	const tree = openTree()
	tree.update(encode("b"), encode("2"), {})
	tree.update(encode("a"), encode("1"), {})

	const [a, b] = [descend(tree.getRoot(), "left"), descend(tree.getRoot(), "right")]
	t.deepEqual(tree.getRootHash(), hashBranch(a.hash, b.hash))
	t.is(decode(a.min), "a")
	t.is(decode(b.min), "b")
})

test("insertion order does not affect the root hash", (t) => {
	const entries = Array.from(iota(100, (i) => encode(`value-${i}`)))

	const a = populate(openTree(), entries)
	const b = populate(openTree(), shuffle("insertion order", [...entries]))
	const c = populate(openTree(), [...entries].reverse())

	t.deepEqual(a.getRootHash(), b.getRootHash())
	t.deepEqual(a.getRootHash(), c.getRootHash())
	t.deepEqual(a.compare(b).inconsistentKeys, [])
})

test("vector clock entry order does not affect the root hash", (t) => {
	const a = openTree()
	const b = openTree()
	a.update(encode("k"), encode("v"), { alpha: 1, beta: 2, gamma: 3 })
	b.update(encode("k"), encode("v"), { gamma: 3, alpha: 1, beta: 2 })
	t.deepEqual(a.getRootHash(), b.getRootHash())
})

test("changing any single value changes the root hash", (t) => {
	const count = 13
	const tree = populate(openTree(), iota(count))
	const original = tree.getRootHash()

	for (let i = 0; i < count; i++) {
		tree.update(getKey(i), encode("changed"), { n1: 1 })
		t.notDeepEqual(tree.getRootHash(), original, `key ${i}`)

		tree.update(getKey(i), defaultValue, { n1: 1 })
		t.deepEqual(tree.getRootHash(), original, `key ${i}`)
	}
})

test("rewriting an identical block keeps the same root", (t) => {
	const tree = populate(openTree(), iota(10))
	const root = tree.getRoot()
	populate(tree, iota(10))
	t.is(tree.getRoot(), root)
})

test("deleting an absent key is a no-op", (t) => {
	const tree = populate(openTree(), iota(10))
	const root = tree.getRoot()
	tree.delete(getKey(99))
	t.is(tree.getRoot(), root)
})

test("invalid writes do not modify the tree", (t) => {
	const tree = populate(openTree(), iota(3))
	const hash = tree.getRootHash()

	t.throws(() => tree.update(new Uint8Array([]), encode("v"), {}), { instanceOf: ValidationError })
	t.throws(() => tree.update(getKey(0), encode("v"), { n1: -1 }), { instanceOf: ValidationError })
	t.throws(() => tree.update(getKey(5), encode("v"), { "": 1 }), { instanceOf: ValidationError })
	t.throws(() => tree.delete(new Uint8Array([])), { instanceOf: ValidationError })

	t.is(tree.size, 3)
	t.false(tree.has(getKey(5)))
	t.deepEqual(tree.getRootHash(), hash)
})

test("stored blocks are isolated from the caller's buffers", (t) => {
	const tree = openTree()
	const key = encode("key")
	const value = encode("value")
	tree.update(key, value, { n1: 1 })
	const hash = tree.getRootHash()

	value.set(encode("VALUE"))
	t.deepEqual(tree.get(encode("key"))?.value, encode("value"))
	t.deepEqual(tree.getRootHash(), hash)
})

test("hashes, keys and blocks returned to the caller are copies", (t) => {
	const a = populate(openTree(), iota(4))
	const b = populate(openTree(), iota(4))
	const snapshot = a.snapshot()
	const hash = b.getRootHash()

	a.getRootHash().fill(0)
	t.deepEqual(a.getRootHash(), hash)
	t.deepEqual(snapshot.getRootHash(), hash)

	a.get(getKey(1))?.value.fill(0)
	t.deepEqual(a.get(getKey(1))?.value, defaultValue)

	for (const key of a.keys()) {
		key.fill(0xff)
	}

	for (const [key, block] of a.entries()) {
		key.fill(0xff)
		block.value.fill(0)
	}

	t.deepEqual(Array.from(a.keys()), [0, 1, 2, 3].map(getKey))
	t.true(a.has(getKey(2)))
	t.deepEqual(a.get(getKey(2))?.value, defaultValue)
	t.deepEqual(a.getRootHash(), hash)
	t.deepEqual(a.compare(b).inconsistentKeys, [])
})

test("incremental updates and full rebuilds agree", (t) => {
	const incremental = openTree({ incremental: true })
	const rebuild = openTree({ incremental: false })
	t.true(incremental.options.incremental)
	t.false(rebuild.options.incremental)

	const steps: [op: "update" | "delete", i: number][] = []
	for (let i = 0; i < 40; i++) steps.push(["update", i])
	for (let i = 0; i < 40; i += 3) steps.push(["update", i])
	for (let i = 0; i < 40; i += 5) steps.push(["delete", i])
	shuffle("steps", steps)

	for (const [op, i] of steps) {
		for (const tree of [incremental, rebuild]) {
			if (op === "update") {
				tree.update(getKey(i), encode(`value-${i}-${tree.size}`), { n1: i })
			} else {
				tree.delete(getKey(i))
			}
		}

		t.deepEqual(incremental.getRootHash(), rebuild.getRootHash())
	}

	const fresh = new MerkleTree(new MemoryStore())
	for (const [key, block] of incremental.entries()) {
		fresh.update(key, block.value, block.vectorClock)
	}

	t.deepEqual(fresh.getRootHash(), incremental.getRootHash())
})

test("updating an existing key rehashes a single path", (t) => {
	const tree = populate(openTree(), iota(5))
	const root = tree.getRoot()
	const hash = root?.hash.slice()

	tree.update(getKey(4), encode("changed"), { n1: 1 })
	const next = tree.getRoot()

	t.not(next, root)
	t.notDeepEqual(next?.hash, hash)
	t.is(descend(next, "left"), descend(root, "left"))

	// the old root and its duplicated leaf are untouched
	t.deepEqual(root?.hash, hash)
	const leaf = descend(root, "right", "left", "left")
	t.true(leaf.isLeaf)
	if (leaf.isLeaf) {
		t.deepEqual(leaf.block.value, defaultValue)
	}

	const newLeaf = descend(next, "right", "left", "left")
	t.is(newLeaf, descend(next, "right", "left", "right"))
	t.is(descend(next, "right", "left"), descend(next, "right", "right"))
})

test("snapshots are isolated from later writes", (t) => {
	const tree = populate(openTree(), iota(8))
	const snapshot = tree.snapshot()
	const hash = snapshot.getRootHash()

	tree.update(getKey(100), encode("new"), {})
	tree.delete(getKey(0))
	tree.update(getKey(1), encode("changed"), {})

	t.is(snapshot.size, 8)
	t.true(snapshot.has(getKey(0)))
	t.false(snapshot.has(getKey(100)))
	t.deepEqual(snapshot.getRootHash(), hash)

	snapshot.update(getKey(200), encode("other"), {})
	t.false(tree.has(getKey(200)))
	t.deepEqual(snapshot.keys().next().value, getKey(0))
})

test("clear", (t) => {
	const tree = populate(openTree(), iota(8))
	tree.clear()
	t.is(tree.size, 0)
	t.is(tree.getRoot(), null)
	t.deepEqual(Array.from(tree.keys()), [])
})

test("a tree opened over a populated store builds lazily", (t) => {
	const store = new MemoryStore()
	const source = new MerkleTree(store)
	populate(source, iota(6))

	const tree = new MerkleTree(store.snapshot(), { incremental: false })
	t.is(tree.size, 6)
	t.deepEqual(tree.getRootHash(), source.getRootHash())
})

test("keys and entries are ordered by key bytes", (t) => {
	const tree = openTree()
	for (const key of ["b", "a", "ab", "B"]) {
		tree.update(encode(key), encode(key.toUpperCase()), {})
	}

	t.deepEqual(Array.from(tree.keys(), decode), ["B", "a", "ab", "b"])
	t.deepEqual(Array.from(tree.keys(null, null, { reverse: true }), decode), ["b", "ab", "a", "B"])
	t.deepEqual(
		Array.from(tree.entries({ key: encode("a"), inclusive: false }), ([key, block]) => [decode(key), decode(block.value)]),
		[
			["ab", "AB"],
			["b", "B"],
		],
	)
})
