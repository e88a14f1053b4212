// Rebalancing cost table. insert() and delete() report the sum of these.
export const OPERATION_COSTS = {
	promote: 1,
	insertRotation: 2,
	insertDoubleRotation: 5,
	demote: 1,
	doubleDemote: 2,
	deleteRotation: 3,
	deleteDoubleRotation: 5,
} as const;

export const DEFAULT_BENCH_SIZE = 100_000;
export const DEFAULT_BENCH_SEED = 0x5eed;
// Fraction of keys removed again in the mixed insert/delete phase
export const DEFAULT_DELETE_RATIO = 0.5;
