import { opposite, type WAVLNode } from "./WAVLNode";

/** Holder for a tree's root, reseated when a rotation lifts a node to the top. */
export interface RootSlot<V> {
	root: WAVLNode<V> | null;
}

/**
 * Lift `node` above its parent, keeping in-order key order.
 *
 * The inner subtree of `node` moves to the slot `node` vacated, and every parent
 * link is rewired. Only the two rotated nodes get their sizes recomputed; ranks
 * are untouched, so callers set the diffs first and refresh sizes higher up
 * afterwards.
 */
export function rotate<V>(slot: RootSlot<V>, node: WAVLNode<V>): void {
	const parent = node.parent;
	if (!parent) {
		throw new Error(`Invariant violation: cannot rotate root ${node.key}`);
	}
	const side = parent.sideOf(node);
	const ancestor = parent.parent;

	node.parent = ancestor;
	if (ancestor) {
		ancestor.setChild(ancestor.sideOf(parent), node);
	} else {
		slot.root = node;
	}

	const inner = node.child(opposite(side));
	parent.setChild(side, inner);
	if (inner) inner.parent = parent;

	node.setChild(opposite(side), parent);
	parent.parent = node;

	parent.recomputeSize();
	node.recomputeSize();
}
