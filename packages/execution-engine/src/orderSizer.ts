import {
	BelowMinNotionalError,
	DataUnavailableError,
	InsufficientFundsError,
	ZeroQuantityError,
	type OrderRejectionError,
	type SymbolConstraints,
} from "@rotator/core";

export interface SizingRejection {
	kind: "rejected";
	error: OrderRejectionError | DataUnavailableError;
}

export type SizingResult =
	| { kind: "sized"; quantity: number; notional: number }
	| SizingRejection;

export type LiquidationSizing = { kind: "sized"; quantity: number } | SizingRejection;

/**
 * Floor `value` to `decimals` places. The result never exceeds `value`, so a
 * sized quantity cannot overshoot the exchange's lot step.
 */
export const truncateToPrecision = (
	value: number,
	decimals: number
): number => {
	if (!Number.isInteger(decimals) || decimals < 0) {
		throw new RangeError(
			`decimals must be a non-negative integer, got ${decimals}`
		);
	}
	if (!Number.isFinite(value) || value <= 0) {
		return 0;
	}
	const factor = 10 ** decimals;
	// toFixed absorbs float noise such as 0.29 * 100 = 28.999999999999996
	let units = Math.floor(Number((value * factor).toFixed(9)));
	if (units / factor > value) {
		units -= 1;
	}
	return Math.max(units, 0) / factor;
};

const reject = (
	error: OrderRejectionError | DataUnavailableError
): SizingRejection => ({ kind: "rejected", error });

/**
 * Quantity for a buy worth `targetNotional` at `price`.
 *
 * @param availableBalance - Spendable quote balance; omit to skip the funds check
 */
export const sizeOrder = (
	targetNotional: number,
	price: number,
	constraints: SymbolConstraints,
	availableBalance?: number
): SizingResult => {
	const { symbol } = constraints;
	if (availableBalance !== undefined && availableBalance < targetNotional) {
		return reject(
			new InsufficientFundsError(symbol, availableBalance, targetNotional)
		);
	}
	if (!Number.isFinite(price) || price <= 0) {
		return reject(
			new DataUnavailableError(symbol, `Invalid price ${price} for ${symbol}`)
		);
	}

	const rawQuantity = targetNotional / price;
	const quantity = truncateToPrecision(
		rawQuantity,
		constraints.quantityPrecision
	);
	if (quantity <= 0) {
		return reject(new ZeroQuantityError(symbol, rawQuantity));
	}

	const notional = quantity * price;
	if (
		constraints.minNotional !== undefined &&
		notional < constraints.minNotional
	) {
		return reject(
			new BelowMinNotionalError(symbol, notional, constraints.minNotional)
		);
	}
	return { kind: "sized", quantity, notional };
};

/**
 * Quantity for selling a whole position. The minimum notional is not
 * checked; whatever truncates above zero is sold.
 */
export const sizeLiquidation = (
	quantity: number,
	constraints: SymbolConstraints
): LiquidationSizing => {
	const truncated = truncateToPrecision(
		quantity,
		constraints.quantityPrecision
	);
	if (truncated <= 0) {
		return reject(new ZeroQuantityError(constraints.symbol, quantity));
	}
	return { kind: "sized", quantity: truncated };
};
