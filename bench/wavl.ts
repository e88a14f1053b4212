import {
	DEFAULT_BENCH_SEED,
	DEFAULT_BENCH_SIZE,
	DEFAULT_DELETE_RATIO,
} from "../src/config";
import { mulberry32, range, shuffled } from "../src/random";
import { maxHeightForSize, validate } from "../src/validate";
import { WAVLTree } from "../src/WAVLTree";

type Pattern = "ascending" | "descending" | "random";

function formatNumber(n: number): string {
	return Intl.NumberFormat("en-US").format(n);
}

function keysFor(pattern: Pattern, n: number, seed: number): number[] {
	const keys = range(0, n);
	if (pattern === "descending") return keys.reverse();
	if (pattern === "random") return shuffled(keys, mulberry32(seed));
	return keys;
}

function benchPattern(pattern: Pattern, n: number, seed: number, deleteRatio: number): void {
	const keys = keysFor(pattern, n, seed);
	const tree = new WAVLTree<number>();

	let insertCost = 0;
	const insertStart = performance.now();
	for (let i = 0; i < keys.length; i++) {
		const key = keys[i] as number;
		const res = tree.insert(key, key);
		if (res.ok) insertCost += res.rebalances;
	}
	const insertMs = performance.now() - insertStart;
	const afterInsert = validate(tree);

	const victims = shuffled(keys, mulberry32(seed + 1)).slice(
		0,
		Math.floor(n * deleteRatio),
	);
	let deleteCost = 0;
	const deleteStart = performance.now();
	for (let i = 0; i < victims.length; i++) {
		const res = tree.delete(victims[i] as number);
		if (res.ok) deleteCost += res.rebalances;
	}
	const deleteMs = performance.now() - deleteStart;
	const afterDelete = validate(tree);

	console.log(`\n${pattern}`);
	console.log(
		`  insert ${formatNumber(n)}: ${(n / (insertMs / 1000)).toFixed(0)} ops/sec, ` +
			`${(insertCost / n).toFixed(3)} rebalances/op, height ${afterInsert.height} ` +
			`(bound ${maxHeightForSize(n)}), rank ${afterInsert.rank}`,
	);
	if (victims.length > 0) {
		console.log(
			`  delete ${formatNumber(victims.length)}: ${(victims.length / (deleteMs / 1000)).toFixed(0)} ops/sec, ` +
				`${(deleteCost / victims.length).toFixed(3)} rebalances/op, height ${afterDelete.height} ` +
				`(bound ${maxHeightForSize(afterDelete.size, { withDeletions: true })})`,
		);
	}
	const diffs = Array.from(afterDelete.rankDiffCounts.entries())
		.sort(([a], [b]) => a.localeCompare(b))
		.map(([kind, count]) => `${kind}=${formatNumber(count)}`)
		.join(" ");
	console.log(`  rank diffs: ${diffs}`);
}

async function main() {
	const n = Number.parseInt(process.argv[2] || String(DEFAULT_BENCH_SIZE), 10);
	const seed = Number.parseInt(process.argv[3] || String(DEFAULT_BENCH_SEED), 10);
	const ratio = Number.parseFloat(process.argv[4] || String(DEFAULT_DELETE_RATIO));
	console.log(
		`WAVLTree bench, N=${formatNumber(n)}, seed=${seed}, deleteRatio=${ratio}`,
	);
	for (const pattern of ["ascending", "descending", "random"] as const) {
		benchPattern(pattern, n, seed, ratio);
	}
}

main().catch((err) => {
	console.error(err);
	process.exit(1);
});
