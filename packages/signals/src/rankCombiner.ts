import {
	RankMismatchError,
	type RankedUniverse,
	type Signal,
} from "@rotator/core";

export type SignalMap = ReadonlyMap<string, Signal>;

/**
 * 1-based ordinal ranks, highest score first. `Array.prototype.sort` is
 * stable, so equal scores keep their input order.
 */
export const ordinalRanks = (
	scores: ReadonlyArray<readonly [string, number]>
): Map<string, number> => {
	const ordered = [...scores].sort((a, b) => b[1] - a[1]);
	const ranks = new Map<string, number>();
	ordered.forEach(([symbol], index) => {
		ranks.set(symbol, index + 1);
	});
	return ranks;
};

/**
 * Combined rank per symbol: its momentum-return ordinal plus its
 * discreteness ordinal, both ranked descending.
 */
export function combine(signals: SignalMap): RankedUniverse {
	const entries = [...signals.entries()];
	for (const [symbol, signal] of entries) {
		if (
			!Number.isFinite(signal.momentumReturn) ||
			!Number.isFinite(signal.discreteness)
		) {
			throw new RangeError(`Signal for ${symbol} is not finite`);
		}
	}

	const returnRanks = ordinalRanks(
		entries.map(([symbol, signal]) => [symbol, signal.momentumReturn] as const)
	);
	const discretenessRanks = ordinalRanks(
		entries.map(([symbol, signal]) => [symbol, signal.discreteness] as const)
	);

	const combined: RankedUniverse = new Map();
	for (const symbol of new Set([
		...returnRanks.keys(),
		...discretenessRanks.keys(),
	])) {
		const returnRank = returnRanks.get(symbol);
		const discretenessRank = discretenessRanks.get(symbol);
		if (returnRank === undefined || discretenessRank === undefined) {
			throw new RankMismatchError(symbol);
		}
		combined.set(symbol, returnRank + discretenessRank);
	}
	return combined;
}

/**
 * The `count` symbols with the largest combined rank. Equal ranks keep the
 * order of the ranked map.
 */
export function selectTop(ranked: RankedUniverse, count: number): string[] {
	if (!Number.isInteger(count) || count < 0) {
		throw new RangeError(`count must be a non-negative integer, got ${count}`);
	}
	return [...ranked.entries()]
		.sort((a, b) => b[1] - a[1])
		.slice(0, count)
		.map(([symbol]) => symbol);
}
