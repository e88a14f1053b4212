// Deterministic PRNG so benchmarks and randomized tests replay exactly.
export function mulberry32(seed: number): () => number {
	let t = seed >>> 0;
	return function rand(): number {
		t += 0x6d2b79f5;
		let x = t;
		x = Math.imul(x ^ (x >>> 15), x | 1);
		x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
		return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
	};
}

/** Fisher-Yates shuffle of a copy of `values`. */
export function shuffled<T>(values: readonly T[], rand: () => number): T[] {
	const out = values.slice();
	for (let i = out.length - 1; i > 0; i--) {
		const j = Math.floor(rand() * (i + 1));
		const tmp = out[i] as T;
		out[i] = out[j] as T;
		out[j] = tmp;
	}
	return out;
}

export function range(start: number, end: number): number[] {
	const out: number[] = [];
	for (let i = start; i < end; i++) out.push(i);
	return out;
}
