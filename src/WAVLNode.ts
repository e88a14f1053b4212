export type Side = "left" | "right";

export function opposite(side: Side): Side {
	return side === "left" ? "right" : "left";
}

/**
 * Internal node of a WAVL tree. An absent child is `null`, which has rank -1
 * and size 0.
 *
 * Ranks are never stored: each node keeps the rank difference to its two
 * children, and rank(node) = leftDiff + rank(left).
 */
export class WAVLNode<V> {
	left: WAVLNode<V> | null = null;
	right: WAVLNode<V> | null = null;
	// Non-owning back-reference, null at the root.
	parent: WAVLNode<V> | null;
	leftDiff = 1;
	rightDiff = 1;
	// Number of nodes in the subtree rooted here, self included.
	size = 1;

	constructor(
		public key: number,
		public value: V,
		parent: WAVLNode<V> | null = null,
	) {
		this.parent = parent;
	}

	child(side: Side): WAVLNode<V> | null {
		return side === "left" ? this.left : this.right;
	}

	setChild(side: Side, node: WAVLNode<V> | null): void {
		if (side === "left") this.left = node;
		else this.right = node;
	}

	diff(side: Side): number {
		return side === "left" ? this.leftDiff : this.rightDiff;
	}

	setDiff(side: Side, value: number): void {
		if (side === "left") this.leftDiff = value;
		else this.rightDiff = value;
	}

	sideOf(child: WAVLNode<V> | null): Side {
		if (this.left === child) return "left";
		if (this.right === child) return "right";
		throw new Error(
			`Invariant violation: node ${child?.key} is not a child of ${this.key}`,
		);
	}

	isLeaf(): boolean {
		return this.left === null && this.right === null;
	}

	isBinary(): boolean {
		return this.left !== null && this.right !== null;
	}

	recomputeSize(): void {
		this.size = sizeOf(this.left) + sizeOf(this.right) + 1;
	}

	min(): WAVLNode<V> {
		let cur: WAVLNode<V> = this;
		while (cur.left) cur = cur.left;
		return cur;
	}

	max(): WAVLNode<V> {
		let cur: WAVLNode<V> = this;
		while (cur.right) cur = cur.right;
		return cur;
	}

	// ---- read accessors ----

	getKey(): number {
		return this.key;
	}

	getValue(): V {
		return this.value;
	}

	getLeft(): WAVLNode<V> | null {
		return this.left;
	}

	getRight(): WAVLNode<V> | null {
		return this.right;
	}

	getParent(): WAVLNode<V> | null {
		return this.parent;
	}

	getSize(): number {
		return this.size;
	}

	getRank(): number {
		return rankOf(this);
	}
}

export function sizeOf<V>(node: WAVLNode<V> | null): number {
	return node ? node.size : 0;
}

// Follows the left spine, so O(height).
export function rankOf<V>(node: WAVLNode<V> | null): number {
	let rank = -1;
	let cur = node;
	while (cur) {
		rank += cur.leftDiff;
		cur = cur.left;
	}
	return rank;
}

/** Recompute cached sizes from `node` up to the root. */
export function refreshSizes<V>(node: WAVLNode<V> | null): void {
	let cur = node;
	while (cur) {
		cur.recomputeSize();
		cur = cur.parent;
	}
}
