import type { OHLCV } from "ccxt";
import type { PricePoint } from "@rotator/core";

/**
 * Closing prices of the ccxt OHLCV rows whose period had ended by `asOf`.
 * The still-forming candle of the current period is left out, so the last
 * point is always a settled close. Missing fields become NaN and are
 * dropped later by `buildPriceSeries`.
 */
export const closedCandlePoints = (
	rows: readonly OHLCV[],
	periodMs: number,
	asOf: number
): PricePoint[] => {
	const points: PricePoint[] = [];
	for (const row of rows) {
		const timestamp = Number(row[0] ?? Number.NaN);
		if (timestamp + periodMs > asOf) {
			continue;
		}
		points.push({ timestamp, close: Number(row[4] ?? Number.NaN) });
	}
	return points;
};
