import type { WAVLTree } from "./WAVLTree";
import { sizeOf, type WAVLNode } from "./WAVLNode";

export type TreeStats = {
	size: number;
	// Edges on the longest root-to-leaf path; -1 when empty.
	height: number;
	rank: number;
	leaves: number;
	// Nodes by their (leftDiff, rightDiff) pattern, e.g. "1/2".
	rankDiffCounts: Map<string, number>;
};

type Visit<V> = {
	node: WAVLNode<V>;
	depth: number;
	// Exclusive key bounds inherited from ancestors
	low: number;
	high: number;
};

/**
 * Check every structural invariant of `tree` and return shape statistics.
 * Throws `Invariant violation: ...` on the first broken one.
 */
export function validate<V>(tree: WAVLTree<V>): TreeStats {
	const root = tree.getRoot();
	const stats = validateSubtree(root);
	if (!root) {
		if (tree.minNode() !== null || tree.maxNode() !== null) {
			throw new Error("Invariant violation: empty tree caches a min/max node");
		}
		return stats;
	}
	if (tree.minNode() !== root.min()) {
		throw new Error("Invariant violation: cached min is not the leftmost node");
	}
	if (tree.maxNode() !== root.max()) {
		throw new Error("Invariant violation: cached max is not the rightmost node");
	}
	return stats;
}

/** Order, rank, size and parent-link checks for the subtree under `root`. */
export function validateSubtree<V>(root: WAVLNode<V> | null): TreeStats {
	const stats: TreeStats = {
		size: 0,
		height: -1,
		rank: -1,
		leaves: 0,
		rankDiffCounts: new Map(),
	};

	if (!root) return stats;
	if (root.parent !== null) {
		throw new Error(`Invariant violation: root ${root.key} has a parent`);
	}

	// Pre-order pass for order, links and diff ranges.
	const order: WAVLNode<V>[] = [];
	const stack: Visit<V>[] = [
		{ node: root, depth: 0, low: -Infinity, high: Infinity },
	];
	while (stack.length) {
		const visit = stack.pop() as Visit<V>;
		const { node, depth, low, high } = visit;
		order.push(node);

		if (!(node.key > low && node.key < high)) {
			throw new Error(
				`Invariant violation: key ${node.key} outside (${low}, ${high})`,
			);
		}
		for (const d of [node.leftDiff, node.rightDiff]) {
			if (d !== 1 && d !== 2) {
				throw new Error(
					`Invariant violation: node ${node.key} has rank diff ${d}`,
				);
			}
		}

		const pattern = `${node.leftDiff}/${node.rightDiff}`;
		stats.rankDiffCounts.set(
			pattern,
			(stats.rankDiffCounts.get(pattern) ?? 0) + 1,
		);
		if (node.isLeaf()) stats.leaves += 1;
		if (depth > stats.height) stats.height = depth;

		if (node.left) {
			checkParent(node.left, node);
			stack.push({ node: node.left, depth: depth + 1, low, high: node.key });
		}
		if (node.right) {
			checkParent(node.right, node);
			stack.push({ node: node.right, depth: depth + 1, low: node.key, high });
		}
	}

	// Children before parents: ranks and sizes bottom-up.
	const ranks = new Map<WAVLNode<V>, number>();
	const rankOfChild = (child: WAVLNode<V> | null): number =>
		child ? (ranks.get(child) ?? -1) : -1;
	for (let i = order.length - 1; i >= 0; i--) {
		const node = order[i] as WAVLNode<V>;
		const fromLeft = node.leftDiff + rankOfChild(node.left);
		const fromRight = node.rightDiff + rankOfChild(node.right);
		if (fromLeft !== fromRight) {
			throw new Error(
				`Invariant violation: node ${node.key} has rank ${fromLeft} via left but ${fromRight} via right`,
			);
		}
		ranks.set(node, fromLeft);

		const expected = sizeOf(node.left) + sizeOf(node.right) + 1;
		if (node.size !== expected) {
			throw new Error(
				`Invariant violation: node ${node.key} has size ${node.size}, expected ${expected}`,
			);
		}
	}

	stats.size = order.length;
	stats.rank = ranks.get(root) ?? -1;
	if (root.size !== stats.size) {
		throw new Error(
			`Invariant violation: root size ${root.size} but ${stats.size} nodes reachable`,
		);
	}
	return stats;
}

function checkParent<V>(child: WAVLNode<V>, parent: WAVLNode<V>): void {
	if (child.parent !== parent) {
		throw new Error(
			`Invariant violation: node ${child.key} does not link back to ${parent.key}`,
		);
	}
}

/**
 * Upper bound on the height (in edges) of a WAVL tree holding `n` nodes.
 * Insert-only trees are AVL trees; with deletions the rank bound 2·log2(n+1)
 * applies.
 */
export function maxHeightForSize(
	n: number,
	options: { withDeletions?: boolean } = {},
): number {
	if (n <= 0) return -1;
	if (options.withDeletions) return Math.floor(2 * Math.log2(n + 1));
	return Math.floor(1.4405 * Math.log2(n + 2));
}
