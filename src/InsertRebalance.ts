import { OPERATION_COSTS } from "./config";
import { rotate, type RootSlot } from "./Rotation";
import { opposite, type Side, type WAVLNode } from "./WAVLNode";

export type InsertCase = "promote" | "rotate" | "doubleRotate" | "stop";

export type RebalanceStep = {
	cost: number;
	action: "continue" | "stop";
};

/**
 * Decide how to repair `node` after the rank of its `side` child rose by one.
 * The diff on `side` must already be decremented.
 */
export function classifyInsert<V>(node: WAVLNode<V>, side: Side): InsertCase {
	if (node.diff(side) !== 0) return "stop";

	const other = node.diff(opposite(side));
	if (other === 1) return "promote";

	const child = node.child(side);
	if (other !== 2 || !child) {
		throw new Error(
			`Invariant violation: unexpected diffs ${node.leftDiff}/${node.rightDiff} at ${node.key}`,
		);
	}
	// The child was just promoted, so exactly one of its diffs is 2.
	if (child.diff(opposite(side)) === 2) return "rotate";
	if (child.diff(side) === 2) return "doubleRotate";
	throw new Error(
		`Invariant violation: child ${child.key} has diffs ${child.leftDiff}/${child.rightDiff}`,
	);
}

export function applyInsertCase<V>(
	slot: RootSlot<V>,
	node: WAVLNode<V>,
	side: Side,
	kase: InsertCase,
): RebalanceStep {
	switch (kase) {
		case "promote":
			node.leftDiff += 1;
			node.rightDiff += 1;
			return { cost: OPERATION_COSTS.promote, action: "continue" };
		case "rotate":
			singleRotate(slot, node, side);
			return { cost: OPERATION_COSTS.insertRotation, action: "stop" };
		case "doubleRotate":
			doubleRotate(slot, node, side);
			return { cost: OPERATION_COSTS.insertDoubleRotation, action: "stop" };
		case "stop":
			return { cost: 0, action: "stop" };
	}
}

/**
 * Walk up from a freshly attached leaf, promoting until a rotation or a valid
 * node ends the repair. Returns the summed operation cost. Subtree sizes on the
 * path are left for the caller to refresh.
 */
export function rebalanceAfterInsert<V>(
	slot: RootSlot<V>,
	leaf: WAVLNode<V>,
): number {
	let cost = 0;
	let child = leaf;
	let node = leaf.parent;
	while (node) {
		const side = node.sideOf(child);
		node.setDiff(side, node.diff(side) - 1);
		const step = applyInsertCase(slot, node, side, classifyInsert(node, side));
		cost += step.cost;
		if (step.action === "stop") return cost;
		child = node;
		node = node.parent;
	}
	return cost;
}

function singleRotate<V>(slot: RootSlot<V>, node: WAVLNode<V>, side: Side): void {
	const child = node.child(side);
	if (!child) throw new Error("Invariant violation: missing child for rotation");
	node.leftDiff = 1;
	node.rightDiff = 1;
	child.leftDiff = 1;
	child.rightDiff = 1;
	rotate(slot, child);
}

function doubleRotate<V>(slot: RootSlot<V>, node: WAVLNode<V>, side: Side): void {
	const inner = opposite(side);
	const child = node.child(side);
	const grandchild = child?.child(inner);
	if (!child || !grandchild) {
		throw new Error("Invariant violation: missing grandchild for double rotation");
	}
	// Each half of the grandchild moves under the node it faces.
	node.setDiff(side, grandchild.diff(inner));
	node.setDiff(inner, 1);
	child.setDiff(side, 1);
	child.setDiff(inner, grandchild.diff(side));
	grandchild.leftDiff = 1;
	grandchild.rightDiff = 1;
	rotate(slot, grandchild);
	rotate(slot, grandchild);
}
