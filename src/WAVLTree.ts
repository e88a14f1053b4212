import { rebalanceAfterDelete, removeEntry } from "./DeleteRebalance";
import { rebalanceAfterInsert } from "./InsertRebalance";
import type { RootSlot } from "./Rotation";
import { refreshSizes, sizeOf, WAVLNode } from "./WAVLNode";

export type InsertResult =
	| { ok: true; rebalances: number }
	| { ok: false; error: "DuplicateKey" };

export type DeleteResult =
	| { ok: true; rebalances: number }
	| { ok: false; error: "KeyNotFound" };

/**
 * WAVLTree
 *
 * Ordered map from integer keys to values, balanced by rank differences of 1 or
 * 2 on every edge (Haeupler, Sen & Tarjan). Insert-only use keeps it an AVL
 * tree; deletions loosen it towards red-black height while repairs stay O(1)
 * amortized.
 *
 * - Every node caches its subtree size, so select/rank run in O(log n).
 * - The nodes holding the smallest and largest key are cached, so min/max are O(1).
 * - insert/delete report the rebalancing cost they incurred (see OPERATION_COSTS)
 *   and signal DuplicateKey/KeyNotFound through the result instead of throwing.
 */
export class WAVLTree<V = string> {
	private readonly slot: RootSlot<V> = { root: null };
	private minRef: WAVLNode<V> | null = null;
	private maxRef: WAVLNode<V> | null = null;

	empty(): boolean {
		return this.slot.root === null;
	}

	size(): number {
		return sizeOf(this.slot.root);
	}

	getRoot(): WAVLNode<V> | null {
		return this.slot.root;
	}

	minNode(): WAVLNode<V> | null {
		return this.minRef;
	}

	maxNode(): WAVLNode<V> | null {
		return this.maxRef;
	}

	min(): V | undefined {
		return this.minRef?.value;
	}

	max(): V | undefined {
		return this.maxRef?.value;
	}

	search(key: number): V | undefined {
		return this.findNode(key)?.value;
	}

	insert(key: number, value: V): InsertResult {
		if (!Number.isSafeInteger(key)) {
			throw new RangeError(`Key must be a safe integer, got ${key}`);
		}

		let parent: WAVLNode<V> | null = null;
		let cur = this.slot.root;
		while (cur) {
			if (key === cur.key) return { ok: false, error: "DuplicateKey" };
			parent = cur;
			cur = key < cur.key ? cur.left : cur.right;
		}

		const leaf = new WAVLNode(key, value, parent);
		if (!parent) {
			this.slot.root = leaf;
		} else if (key < parent.key) {
			parent.left = leaf;
		} else {
			parent.right = leaf;
		}

		if (!this.minRef || key < this.minRef.key) this.minRef = leaf;
		if (!this.maxRef || key > this.maxRef.key) this.maxRef = leaf;

		const rebalances = rebalanceAfterInsert(this.slot, leaf);
		refreshSizes(leaf.parent);
		return { ok: true, rebalances };
	}

	delete(key: number): DeleteResult {
		const node = this.findNode(key);
		if (!node) return { ok: false, error: "KeyNotFound" };

		const { removed, parent } = removeEntry(this.slot, node);
		const rebalances = rebalanceAfterDelete(this.slot, parent);
		refreshSizes(parent);

		const root = this.slot.root;
		if (!root) {
			this.minRef = null;
			this.maxRef = null;
		} else {
			// The removed node may be a successor whose entry now lives elsewhere.
			if (this.minRef === removed || this.minRef?.key === key) {
				this.minRef = root.min();
			}
			if (this.maxRef === removed || this.maxRef?.key === key) {
				this.maxRef = root.max();
			}
		}
		return { ok: true, rebalances };
	}

	/** Value with the `rank`-th smallest key, 1-indexed. */
	select(rank: number): V | undefined {
		if (!Number.isInteger(rank) || rank < 1 || rank > this.size()) {
			return undefined;
		}
		let remaining = rank - 1;
		let cur = this.slot.root;
		while (cur) {
			const leftSize = sizeOf(cur.left);
			if (remaining === leftSize) return cur.value;
			if (remaining < leftSize) {
				cur = cur.left;
			} else {
				remaining -= leftSize + 1;
				cur = cur.right;
			}
		}
		return undefined;
	}

	/** 1-indexed position of `key` in ascending order, or 0 when absent. */
	rank(key: number): number {
		let before = 0;
		let cur = this.slot.root;
		while (cur) {
			if (key === cur.key) return before + sizeOf(cur.left) + 1;
			if (key < cur.key) {
				cur = cur.left;
			} else {
				before += sizeOf(cur.left) + 1;
				cur = cur.right;
			}
		}
		return 0;
	}

	keysToArray(): number[] {
		return this.inOrder((node) => node.key);
	}

	valuesToArray(): V[] {
		return this.inOrder((node) => node.value);
	}

	private findNode(key: number): WAVLNode<V> | null {
		let cur = this.slot.root;
		while (cur) {
			if (key === cur.key) return cur;
			cur = key < cur.key ? cur.left : cur.right;
		}
		return null;
	}

	private inOrder<R>(pick: (node: WAVLNode<V>) => R): R[] {
		const out: R[] = [];
		const stack: WAVLNode<V>[] = [];
		let cur = this.slot.root;
		while (cur || stack.length > 0) {
			while (cur) {
				stack.push(cur);
				cur = cur.left;
			}
			const node = stack.pop();
			if (!node) break;
			out.push(pick(node));
			cur = node.right;
		}
		return out;
	}
}
