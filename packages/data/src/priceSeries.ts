import {
	DataUnavailableError,
	type PricePoint,
	type PriceSeries,
} from "@rotator/core";

const isUsablePoint = (point: PricePoint): boolean =>
	Number.isFinite(point.timestamp) &&
	Number.isFinite(point.close) &&
	point.close > 0;

/**
 * Build a frozen series from raw points: unusable closes are dropped, points
 * are ordered by time and the last point wins for a repeated timestamp.
 *
 * @throws DataUnavailableError when no usable point remains
 */
export const buildPriceSeries = (
	symbol: string,
	points: Iterable<PricePoint>
): PriceSeries => {
	const byTimestamp = new Map<number, number>();
	for (const point of points) {
		if (isUsablePoint(point)) {
			byTimestamp.set(point.timestamp, point.close);
		}
	}
	if (byTimestamp.size === 0) {
		throw new DataUnavailableError(symbol, `No usable closes for ${symbol}`);
	}
	const ordered = [...byTimestamp.entries()]
		.sort((a, b) => a[0] - b[0])
		.map(([timestamp, close]) => Object.freeze({ timestamp, close }));
	return Object.freeze({ symbol, points: Object.freeze(ordered) });
};

/** Keep only the most recent `count` points. */
export const tailPriceSeries = (
	series: PriceSeries,
	count: number
): PriceSeries => {
	if (count >= series.points.length) {
		return series;
	}
	return buildPriceSeries(
		series.symbol,
		series.points.slice(series.points.length - Math.max(count, 1))
	);
};
