import type { SymbolConstraints } from "@rotator/core";

/**
 * Subset of a ccxt unified market this package reads.
 */
export interface SpotMarket {
	id?: string;
	symbol: string;
	base: string;
	quote: string;
	spot?: boolean;
	active?: boolean;
	precision?: { amount?: number };
	limits?: { cost?: { min?: number } };
	info?: unknown;
}

/**
 * How ccxt expresses `precision.amount` for a venue: a step size
 * (`0.001`) or a count of decimal places (`3`). Binance uses step sizes.
 */
export type AmountPrecisionMode = "tick_size" | "decimal_places";

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const toNumber = (value: unknown): number | undefined => {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : undefined;
	}
	if (typeof value === "string" && value.trim().length > 0) {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : undefined;
	}
	return undefined;
};

/**
 * Decimal places implied by a lot step, e.g. `0.001` → 3 and `1` → 0.
 */
export const decimalsOfStep = (step: number): number => {
	if (!Number.isFinite(step) || step <= 0) {
		throw new RangeError(`Invalid lot step: ${step}`);
	}
	const text = step.toFixed(12).replace(/0+$/, "");
	const dot = text.indexOf(".");
	return dot === -1 || dot === text.length - 1 ? 0 : text.length - dot - 1;
};

const findFilter = (
	info: unknown,
	types: readonly string[]
): Record<string, unknown> | undefined => {
	if (!isRecord(info) || !Array.isArray(info.filters)) {
		return undefined;
	}
	for (const filter of info.filters) {
		if (isRecord(filter) && types.includes(String(filter.filterType))) {
			return filter;
		}
	}
	return undefined;
};

const quantityPrecisionOf = (
	market: SpotMarket,
	mode: AmountPrecisionMode
): number | undefined => {
	const stepSize = toNumber(findFilter(market.info, ["LOT_SIZE"])?.stepSize);
	if (stepSize !== undefined && stepSize > 0) {
		return decimalsOfStep(stepSize);
	}
	const amount = market.precision?.amount;
	if (amount === undefined || !Number.isFinite(amount) || amount <= 0) {
		return undefined;
	}
	if (mode === "decimal_places") {
		return Math.max(0, Math.floor(amount));
	}
	return decimalsOfStep(amount);
};

const minNotionalOf = (market: SpotMarket): number | undefined => {
	const filter = findFilter(market.info, ["NOTIONAL", "MIN_NOTIONAL"]);
	const fromFilter = toNumber(filter?.minNotional);
	if (fromFilter !== undefined && fromFilter > 0) {
		return fromFilter;
	}
	const fromLimits = market.limits?.cost?.min;
	return fromLimits !== undefined && fromLimits > 0 ? fromLimits : undefined;
};

/**
 * Derive order constraints from exchange metadata. Raw Binance filters take
 * precedence over ccxt's unified fields.
 */
export const constraintsFromMarket = (
	market: SpotMarket,
	mode: AmountPrecisionMode = "tick_size"
): SymbolConstraints | null => {
	const quantityPrecision = quantityPrecisionOf(market, mode);
	if (quantityPrecision === undefined) {
		return null;
	}
	const minNotional = minNotionalOf(market);
	return {
		symbol: market.id ?? `${market.base}${market.quote}`,
		baseAsset: market.base,
		quoteAsset: market.quote,
		quantityPrecision,
		...(minNotional === undefined ? {} : { minNotional }),
	};
};
