import {
	InsufficientDataError,
	type PriceSeries,
	type Signal,
} from "@rotator/core";

const closesOf = (series: PriceSeries): number[] =>
	series.points.map((point) => point.close);

const sign = (value: number): number => {
	if (value > 0) {
		return 1;
	}
	if (value < 0) {
		return -1;
	}
	return 0;
};

const assertLookback = (lookback: number): void => {
	if (!Number.isInteger(lookback) || lookback < 1) {
		throw new RangeError(`lookback must be an integer >= 1, got ${lookback}`);
	}
};

/**
 * Return from the close `lookback` points back to the latest close.
 * With `lookback === series length` this is the first-to-last return.
 */
export function momentumReturn(series: PriceSeries, lookback: number): number {
	assertLookback(lookback);
	const closes = closesOf(series);
	if (closes.length < lookback) {
		throw new InsufficientDataError(series.symbol, closes.length, lookback);
	}
	const last = closes[closes.length - 1];
	const anchor = closes[closes.length - lookback];
	return last / anchor - 1;
}

/**
 * Information discreteness of the whole series.
 *
 * Up and down step counts are divided by the number of closes, not by the
 * number of steps. The result is signed by the cumulative return, so a rally
 * made of many small up days scores lower than one made of a few jumps.
 */
export function discreteness(series: PriceSeries): number {
	const closes = closesOf(series);
	if (closes.length === 0) {
		throw new InsufficientDataError(series.symbol, 0, 1);
	}

	let up = 0;
	let down = 0;
	for (let i = 1; i < closes.length; i += 1) {
		const change = closes[i] / closes[i - 1] - 1;
		if (change > 0) {
			up += 1;
		} else if (change < 0) {
			down += 1;
		}
	}

	const posFrac = up / closes.length;
	const negFrac = down / closes.length;
	const cumulReturn = closes[closes.length - 1] / closes[0] - 1;
	return sign(cumulReturn) * (negFrac - posFrac);
}

export function computeSignal(series: PriceSeries, lookback: number): Signal {
	return {
		momentumReturn: momentumReturn(series, lookback),
		discreteness: discreteness(series),
	};
}
