import { OPERATION_COSTS } from "./config";
import type { RebalanceStep } from "./InsertRebalance";
import { rotate, type RootSlot } from "./Rotation";
import { opposite, type Side, type WAVLNode } from "./WAVLNode";

export type DeleteCase =
	| "demote"
	| "doubleDemote"
	| "rotate"
	| "doubleRotate"
	| "stop";

/**
 * Take the entry held by `node` out of the tree.
 *
 * A node with two children keeps its place: the in-order successor's key and
 * value are copied into it and the successor, which has no left child, is the
 * node that gets spliced out. Returns the spliced node and its former parent,
 * where rebalancing starts.
 */
export function removeEntry<V>(
	slot: RootSlot<V>,
	node: WAVLNode<V>,
): { removed: WAVLNode<V>; parent: WAVLNode<V> | null } {
	let target = node;
	if (node.left && node.right) {
		const successor = node.right.min();
		node.key = successor.key;
		node.value = successor.value;
		target = successor;
	}

	const parent = target.parent;
	const child = target.left ?? target.right;
	if (child) child.parent = parent;

	if (!parent) {
		slot.root = child;
	} else {
		const side = parent.sideOf(target);
		parent.setChild(side, child);
		parent.setDiff(side, parent.diff(side) + 1);
	}

	target.parent = null;
	target.left = null;
	target.right = null;
	return { removed: target, parent };
}

export function classifyDelete<V>(node: WAVLNode<V>): DeleteCase {
	const { leftDiff, rightDiff } = node;
	if (
		(leftDiff === 3 && rightDiff === 2) ||
		(leftDiff === 2 && rightDiff === 3) ||
		(leftDiff === 2 && rightDiff === 2 && node.isLeaf())
	) {
		return "demote";
	}

	const deficient = deficientSide(node);
	if (!deficient || node.diff(opposite(deficient)) !== 1) return "stop";

	const sibling = siblingOf(node, deficient);
	const outer = sibling.diff(opposite(deficient));
	const inner = sibling.diff(deficient);
	if (outer === 2 && inner === 2) return "doubleDemote";
	if (outer === 1) return "rotate";
	return "doubleRotate";
}

export function applyDeleteCase<V>(
	slot: RootSlot<V>,
	node: WAVLNode<V>,
	kase: DeleteCase,
): RebalanceStep {
	switch (kase) {
		case "demote":
			demote(node);
			return { cost: OPERATION_COSTS.demote, action: "continue" };
		case "doubleDemote":
			demote(siblingOf(node, requireDeficientSide(node)));
			demote(node);
			return { cost: OPERATION_COSTS.doubleDemote, action: "continue" };
		case "rotate": {
			const extra = singleRotate(slot, node) ? OPERATION_COSTS.demote : 0;
			return { cost: OPERATION_COSTS.deleteRotation + extra, action: "stop" };
		}
		case "doubleRotate":
			doubleRotate(slot, node);
			return { cost: OPERATION_COSTS.deleteDoubleRotation, action: "stop" };
		case "stop":
			return { cost: 0, action: "stop" };
	}
}

/**
 * Walk up from the parent of a spliced node, demoting until a rotation or a
 * valid node ends the repair. Returns the summed operation cost.
 */
export function rebalanceAfterDelete<V>(
	slot: RootSlot<V>,
	start: WAVLNode<V> | null,
): number {
	let cost = 0;
	let node = start;
	while (node) {
		const step = applyDeleteCase(slot, node, classifyDelete(node));
		cost += step.cost;
		if (step.action === "stop") return cost;
		node = node.parent;
	}
	return cost;
}

function deficientSide<V>(node: WAVLNode<V>): Side | null {
	if (node.leftDiff === 3) return "left";
	if (node.rightDiff === 3) return "right";
	return null;
}

function requireDeficientSide<V>(node: WAVLNode<V>): Side {
	const side = deficientSide(node);
	if (!side) {
		throw new Error(`Invariant violation: ${node.key} has no 3-diff side`);
	}
	return side;
}

function siblingOf<V>(node: WAVLNode<V>, deficient: Side): WAVLNode<V> {
	const sibling = node.child(opposite(deficient));
	if (!sibling) {
		throw new Error(
			`Invariant violation: ${node.key} has diffs ${node.leftDiff}/${node.rightDiff} but no ${opposite(deficient)} child`,
		);
	}
	return sibling;
}

function demote<V>(node: WAVLNode<V>): void {
	node.leftDiff -= 1;
	node.rightDiff -= 1;
	const parent = node.parent;
	if (parent) {
		const side = parent.sideOf(node);
		parent.setDiff(side, parent.diff(side) + 1);
	}
}

// Returns true when the rotated-down node needed a trailing demote.
function singleRotate<V>(slot: RootSlot<V>, node: WAVLNode<V>): boolean {
	const deficient = requireDeficientSide(node);
	const outer = opposite(deficient);
	const sibling = siblingOf(node, deficient);

	node.setDiff(deficient, 2);
	node.setDiff(outer, sibling.diff(deficient));
	sibling.setDiff(outer, sibling.diff(outer) + 1);
	sibling.setDiff(deficient, 1);
	rotate(slot, sibling);

	if (node.leftDiff === 2 && node.rightDiff === 2) {
		demote(node);
		return true;
	}
	return false;
}

function doubleRotate<V>(slot: RootSlot<V>, node: WAVLNode<V>): void {
	const deficient = requireDeficientSide(node);
	const outer = opposite(deficient);
	const sibling = siblingOf(node, deficient);
	const grandchild = sibling.child(deficient);
	if (!grandchild) {
		throw new Error(
			`Invariant violation: ${sibling.key} has no inner child for double rotation`,
		);
	}

	node.setDiff(deficient, 1);
	node.setDiff(outer, grandchild.diff(deficient));
	sibling.setDiff(outer, sibling.diff(outer) - 1);
	sibling.setDiff(deficient, grandchild.diff(outer));
	grandchild.leftDiff = 2;
	grandchild.rightDiff = 2;
	rotate(slot, grandchild);
	rotate(slot, grandchild);
}
