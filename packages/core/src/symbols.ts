const LEVERAGED_SUFFIXES = ["UP", "DOWN", "BULL", "BEAR"];

/** Exchange id for a spot pair, e.g. `toSymbol("BTC", "USDT") === "BTCUSDT"`. */
export const toSymbol = (baseAsset: string, quoteAsset: string): string =>
	`${baseAsset}${quoteAsset}`.toUpperCase();

/**
 * Base asset of a symbol quoted in `quoteAsset`, or `null` when the symbol
 * is not quoted in it.
 */
export const baseAssetOf = (
	symbol: string,
	quoteAsset: string
): string | null => {
	const upper = symbol.toUpperCase();
	const quote = quoteAsset.toUpperCase();
	if (!upper.endsWith(quote) || upper.length === quote.length) {
		return null;
	}
	return upper.slice(0, upper.length - quote.length);
};

export const isLeveragedToken = (baseAsset: string): boolean =>
	LEVERAGED_SUFFIXES.some(
		(suffix) => baseAsset.length > suffix.length && baseAsset.endsWith(suffix)
	);

export interface UniverseFilterOptions {
	quoteCurrency: string;
	excludedBaseAssets?: readonly string[];
}

/**
 * Keep symbols quoted in the quote currency whose base is neither excluded
 * nor a leveraged token. Order and first occurrence are preserved.
 */
export const filterUniverse = (
	symbols: Iterable<string>,
	options: UniverseFilterOptions
): string[] => {
	const excluded = new Set(
		(options.excludedBaseAssets ?? []).map((asset) => asset.toUpperCase())
	);
	const seen = new Set<string>();
	const result: string[] = [];
	for (const raw of symbols) {
		const symbol = raw.toUpperCase();
		if (seen.has(symbol)) {
			continue;
		}
		seen.add(symbol);
		const base = baseAssetOf(symbol, options.quoteCurrency);
		if (!base || excluded.has(base) || isLeveragedToken(base)) {
			continue;
		}
		result.push(symbol);
	}
	return result;
};
