import { describe, expect, it } from "vitest";
import { validate } from "./validate";
import { WAVLTree } from "./WAVLTree";

function treeOf(entries: Array<[number, string]>): WAVLTree {
	const tree = new WAVLTree();
	for (const [k, v] of entries) tree.insert(k, v);
	return tree;
}

describe("WAVLTree", () => {
	it("starts empty", () => {
		const tree = new WAVLTree();
		expect(tree.empty()).toBe(true);
		expect(tree.size()).toBe(0);
		expect(tree.getRoot()).toBeNull();
		expect(tree.min()).toBeUndefined();
		expect(tree.max()).toBeUndefined();
		expect(tree.select(1)).toBeUndefined();
		expect(tree.search(1)).toBeUndefined();
		expect(tree.keysToArray()).toEqual([]);
		expect(tree.valuesToArray()).toEqual([]);
		expect(validate(tree).height).toBe(-1);
	});

	it("inserts three entries and reports order, extremes and size", () => {
		const tree = new WAVLTree();
		expect(tree.insert(5, "a")).toEqual({ ok: true, rebalances: 0 });
		expect(tree.insert(3, "b")).toEqual({ ok: true, rebalances: 1 });
		expect(tree.insert(8, "c")).toEqual({ ok: true, rebalances: 0 });

		expect(tree.keysToArray()).toEqual([3, 5, 8]);
		expect(tree.valuesToArray()).toEqual(["b", "a", "c"]);
		expect(tree.min()).toBe("b");
		expect(tree.max()).toBe("c");
		expect(tree.size()).toBe(3);
		expect(tree.empty()).toBe(false);
		validate(tree);
	});

	it("rejects a duplicate key and keeps the first value", () => {
		const tree = new WAVLTree();
		tree.insert(5, "a");
		expect(tree.insert(5, "z")).toEqual({ ok: false, error: "DuplicateKey" });
		expect(tree.search(5)).toBe("a");
		expect(tree.size()).toBe(1);
		validate(tree);
	});

	it("reports KeyNotFound and leaves the tree untouched", () => {
		const tree = treeOf([
			[5, "a"],
			[3, "b"],
			[8, "c"],
		]);
		const root = tree.getRoot();
		expect(tree.delete(99)).toEqual({ ok: false, error: "KeyNotFound" });
		expect(tree.getRoot()).toBe(root);
		expect(tree.keysToArray()).toEqual([3, 5, 8]);
		expect(tree.size()).toBe(3);
		expect(root?.leftDiff).toBe(1);
		expect(root?.rightDiff).toBe(1);
	});

	it("stays shallow on ascending inserts", () => {
		const tree = new WAVLTree();
		const costs = [10, 20, 30, 40, 50].map((k) => tree.insert(k, `v${k}`));
		expect(costs).toEqual([
			{ ok: true, rebalances: 0 },
			{ ok: true, rebalances: 1 },
			{ ok: true, rebalances: 3 },
			{ ok: true, rebalances: 2 },
			{ ok: true, rebalances: 3 },
		]);
		const stats = validate(tree);
		// Three levels of nodes, not a chain of five
		expect(stats.height).toBe(2);
		expect(tree.getRoot()?.key).toBe(20);
		expect(tree.getRoot()?.right?.key).toBe(40);
		expect(tree.keysToArray()).toEqual([10, 20, 30, 40, 50]);
	});

	it("stays shallow on descending inserts", () => {
		const tree = new WAVLTree();
		const costs = [50, 40, 30].map((k) => tree.insert(k, `v${k}`).ok);
		expect(costs).toEqual([true, true, true]);
		expect(tree.getRoot()?.key).toBe(40);
		expect(validate(tree).height).toBe(1);
	});

	it("counts a double rotation on a zig-zag insert", () => {
		const tree = new WAVLTree();
		tree.insert(10, "a");
		tree.insert(30, "c");
		expect(tree.insert(20, "b")).toEqual({ ok: true, rebalances: 6 });
		const root = tree.getRoot();
		expect(root?.key).toBe(20);
		expect(root?.left?.key).toBe(10);
		expect(root?.right?.key).toBe(30);
		expect(root?.getRank()).toBe(1);
		validate(tree);
	});

	it("selects by 1-indexed rank", () => {
		const tree = treeOf([
			[5, "a"],
			[3, "b"],
			[8, "c"],
		]);
		expect(tree.select(1)).toBe("b");
		expect(tree.select(2)).toBe("a");
		expect(tree.select(3)).toBe("c");
		expect(tree.select(0)).toBeUndefined();
		expect(tree.select(4)).toBeUndefined();
		expect(tree.select(-1)).toBeUndefined();
		expect(tree.select(1.5)).toBeUndefined();
	});

	it("ranks keys as the inverse of select", () => {
		const tree = treeOf([
			[5, "a"],
			[3, "b"],
			[8, "c"],
			[1, "d"],
		]);
		expect(tree.rank(1)).toBe(1);
		expect(tree.rank(3)).toBe(2);
		expect(tree.rank(5)).toBe(3);
		expect(tree.rank(8)).toBe(4);
		expect(tree.rank(4)).toBe(0);
		expect(tree.rank(100)).toBe(0);
	});

	it("deletes the root of a three-node tree", () => {
		const tree = treeOf([
			[5, "a"],
			[3, "b"],
			[8, "c"],
		]);
		expect(tree.delete(5)).toEqual({ ok: true, rebalances: 0 });
		expect(tree.size()).toBe(2);
		expect(tree.keysToArray()).toEqual([3, 8]);
		expect(tree.search(5)).toBeUndefined();
		expect(tree.search(8)).toBe("c");
		expect(tree.min()).toBe("b");
		expect(tree.max()).toBe("c");
		// The successor's entry was copied into the root node.
		expect(tree.getRoot()?.key).toBe(8);
		expect(tree.maxNode()).toBe(tree.getRoot());
		validate(tree);
	});

	it("rotates and demotes when a delete leaves a 3-diff", () => {
		const tree = treeOf([
			[10, "a"],
			[20, "b"],
			[30, "c"],
			[40, "d"],
		]);
		expect(tree.delete(10)).toEqual({ ok: true, rebalances: 4 });
		const root = tree.getRoot();
		expect(root?.key).toBe(30);
		expect(root?.leftDiff).toBe(2);
		expect(root?.rightDiff).toBe(2);
		expect(root?.left?.key).toBe(20);
		expect(root?.left?.isLeaf()).toBe(true);
		expect(tree.min()).toBe("b");
		validate(tree);
	});

	it("updates min and max as extremes come and go", () => {
		const tree = treeOf([
			[5, "a"],
			[3, "b"],
			[8, "c"],
		]);
		tree.insert(1, "d");
		tree.insert(9, "e");
		expect(tree.min()).toBe("d");
		expect(tree.max()).toBe("e");
		tree.delete(1);
		tree.delete(9);
		expect(tree.min()).toBe("b");
		expect(tree.max()).toBe("c");
		validate(tree);
	});

	it("empties back out after deleting everything", () => {
		const tree = treeOf([
			[2, "x"],
			[1, "y"],
			[3, "z"],
		]);
		for (const k of [2, 1, 3]) expect(tree.delete(k).ok).toBe(true);
		expect(tree.empty()).toBe(true);
		expect(tree.size()).toBe(0);
		expect(tree.min()).toBeUndefined();
		expect(tree.max()).toBeUndefined();
		expect(tree.minNode()).toBeNull();
		validate(tree);
	});

	it("throws before mutating on a non-integer key", () => {
		const tree = treeOf([[1, "a"]]);
		expect(() => tree.insert(1.5, "b")).toThrow(RangeError);
		expect(() => tree.insert(Number.NaN, "b")).toThrow(
			"Key must be a safe integer, got NaN",
		);
		expect(tree.size()).toBe(1);
		expect(tree.search(1.5)).toBeUndefined();
		expect(tree.delete(1.5)).toEqual({ ok: false, error: "KeyNotFound" });
	});

	it("accepts negative keys and non-string values", () => {
		const tree = new WAVLTree<{ n: number }>();
		tree.insert(-3, { n: 1 });
		tree.insert(0, { n: 2 });
		tree.insert(-10, { n: 3 });
		expect(tree.keysToArray()).toEqual([-10, -3, 0]);
		expect(tree.min()).toEqual({ n: 3 });
		expect(tree.select(2)).toEqual({ n: 1 });
	});
});
