/**
 * Error taxonomy for the rotation engine.
 *
 * Symbol-local errors (missing data, order rejections) are caught by the
 * selector and executor and turned into skips. Cycle-level errors abort the
 * cycle and reach the scheduler as a failed outcome.
 */
export type RotatorErrorCode =
	| "DATA_UNAVAILABLE"
	| "INSUFFICIENT_DATA"
	| "RANK_MISMATCH"
	| "BELOW_MIN_NOTIONAL"
	| "INSUFFICIENT_FUNDS"
	| "ZERO_QUANTITY"
	| "EXCHANGE_REJECTION"
	| "REBALANCE_ABORTED"
	| "CONFIG_INVALID";

export class RotatorError extends Error {
	readonly code: RotatorErrorCode;

	constructor(code: RotatorErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

export class DataUnavailableError extends RotatorError {
	constructor(
		readonly symbol: string,
		message: string,
		options?: ErrorOptions
	) {
		super("DATA_UNAVAILABLE", message, options);
	}
}

export class InsufficientDataError extends RotatorError {
	constructor(
		readonly symbol: string,
		readonly available: number,
		readonly required: number
	) {
		super(
			"INSUFFICIENT_DATA",
			`Series for ${symbol} has ${available} points, ${required} required`
		);
	}
}

export class RankMismatchError extends RotatorError {
	constructor(readonly symbol: string) {
		super(
			"RANK_MISMATCH",
			`Symbol ${symbol} is missing from one of the signal orderings`
		);
	}
}

/** Base class for a single order being refused before or at submission. */
export class OrderRejectionError extends RotatorError {
	constructor(
		code: RotatorErrorCode,
		readonly symbol: string,
		message: string,
		options?: ErrorOptions
	) {
		super(code, message, options);
	}
}

export class BelowMinNotionalError extends OrderRejectionError {
	constructor(
		symbol: string,
		readonly notional: number,
		readonly minNotional: number
	) {
		super(
			"BELOW_MIN_NOTIONAL",
			symbol,
			`Order notional ${notional} for ${symbol} is below minimum ${minNotional}`
		);
	}
}

export class InsufficientFundsError extends OrderRejectionError {
	constructor(
		symbol: string,
		readonly available: number,
		readonly required: number
	) {
		super(
			"INSUFFICIENT_FUNDS",
			symbol,
			`Available balance ${available} is below required ${required} for ${symbol}`
		);
	}
}

export class ZeroQuantityError extends OrderRejectionError {
	constructor(symbol: string, readonly rawQuantity: number) {
		super(
			"ZERO_QUANTITY",
			symbol,
			`Quantity ${rawQuantity} for ${symbol} truncates to zero`
		);
	}
}

export class ExchangeRejectionError extends OrderRejectionError {
	constructor(symbol: string, message: string, options?: ErrorOptions) {
		super("EXCHANGE_REJECTION", symbol, message, options);
	}
}

/**
 * A rebalance stopped part-way. Orders already filled stay on the exchange;
 * the next cycle reconciles from whatever the account then holds.
 */
export class RebalanceAbortedError extends RotatorError {
	constructor(readonly state: string, cause: unknown) {
		super(
			"REBALANCE_ABORTED",
			`Rebalance aborted while ${state}: ${errorMessage(cause)}`,
			{ cause }
		);
	}
}

export class ConfigError extends RotatorError {
	constructor(message: string) {
		super("CONFIG_INVALID", message);
	}
}

export const isRotatorError = (value: unknown): value is RotatorError =>
	value instanceof RotatorError;

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
