import {
	baseAssetOf,
	toSymbol,
	type Holdings,
	type SelectedSet,
} from "@rotator/core";

export interface SellInstruction {
	asset: string;
	symbol: string;
	quantity: number;
}

export interface ReconcilePlan {
	toSell: SellInstruction[];
	toBuy: string[];
}

export interface ReconcileOptions {
	quoteCurrency: string;
	/** Assets never liquidated, e.g. a fee token. */
	ignoredAssets?: readonly string[];
}

/**
 * Split the account into positions to close and symbols to open.
 *
 * Held assets outside the selection are sold in full. Selected symbols whose
 * base asset is already held are not bought again.
 */
export const reconcile = (
	holdings: Holdings,
	selected: SelectedSet,
	options: ReconcileOptions
): ReconcilePlan => {
	const quote = options.quoteCurrency.toUpperCase();
	const ignored = new Set(
		(options.ignoredAssets ?? []).map((asset) => asset.toUpperCase())
	);
	const selectedSymbols = new Set(selected.map((symbol) => symbol.toUpperCase()));

	const held = new Map<string, number>();
	for (const [asset, quantity] of Object.entries(holdings)) {
		if (Number.isFinite(quantity) && quantity > 0) {
			held.set(asset.toUpperCase(), quantity);
		}
	}

	const toSell: SellInstruction[] = [...held.entries()]
		.filter(
			([asset]) =>
				asset !== quote &&
				!ignored.has(asset) &&
				!selectedSymbols.has(toSymbol(asset, quote))
		)
		.sort(([a], [b]) => a.localeCompare(b))
		.map(([asset, quantity]) => ({
			asset,
			symbol: toSymbol(asset, quote),
			quantity,
		}));

	const toBuy: string[] = [];
	for (const symbol of selectedSymbols) {
		const base = baseAssetOf(symbol, quote) ?? symbol;
		if (!held.has(base)) {
			toBuy.push(symbol);
		}
	}

	return { toSell, toBuy };
};
