import { DataUnavailableError } from "@rotator/core";
import { describe, expect, it } from "vitest";
import { buildPriceSeries, tailPriceSeries } from "./priceSeries";
import { closedCandlePoints } from "./utils/ccxtMapper";

const DAY = 86_400_000;
const baseTs = Date.UTC(2025, 0, 1);

describe("buildPriceSeries", () => {
	it("orders points by time and keeps the last close per timestamp", () => {
		const series = buildPriceSeries("ETHUSDT", [
			{ timestamp: 3, close: 30 },
			{ timestamp: 1, close: 10 },
			{ timestamp: 2, close: 20 },
			{ timestamp: 1, close: 11 },
		]);
		expect(series.points).toEqual([
			{ timestamp: 1, close: 11 },
			{ timestamp: 2, close: 20 },
			{ timestamp: 3, close: 30 },
		]);
	});

	it("drops non-positive and non-finite closes", () => {
		const series = buildPriceSeries("ETHUSDT", [
			{ timestamp: 1, close: 0 },
			{ timestamp: 2, close: Number.NaN },
			{ timestamp: 3, close: -4 },
			{ timestamp: 4, close: 12 },
		]);
		expect(series.points).toEqual([{ timestamp: 4, close: 12 }]);
	});

	it("freezes the series", () => {
		const series = buildPriceSeries("ETHUSDT", [{ timestamp: 1, close: 5 }]);
		expect(Object.isFrozen(series)).toBe(true);
		expect(Object.isFrozen(series.points)).toBe(true);
	});

	it("throws DataUnavailableError when nothing usable remains", () => {
		expect(() =>
			buildPriceSeries("ETHUSDT", [{ timestamp: 1, close: 0 }])
		).toThrowError(DataUnavailableError);
	});
});

describe("tailPriceSeries", () => {
	it("keeps the most recent points", () => {
		const series = buildPriceSeries(
			"ETHUSDT",
			[1, 2, 3, 4, 5].map((close, idx) => ({ timestamp: baseTs + idx * DAY, close }))
		);
		expect(tailPriceSeries(series, 2).points.map((p) => p.close)).toEqual([4, 5]);
		expect(tailPriceSeries(series, 10)).toBe(series);
	});
});

describe("closedCandlePoints", () => {
	it("keeps the closes of finished candles and drops the open one", () => {
		const rows: Array<[number, number, number, number, number, number]> = [
			[baseTs, 1, 2, 0.5, 1.5, 10],
			[baseTs + DAY, 1.5, 2, 1, 1.8, 10],
			[baseTs + 2 * DAY, 1.8, 2, 1.7, 1.9, 10],
		];
		expect(closedCandlePoints(rows, DAY, baseTs + 2 * DAY + 3_600_000)).toEqual([
			{ timestamp: baseTs, close: 1.5 },
			{ timestamp: baseTs + DAY, close: 1.8 },
		]);
	});

	it("keeps a candle whose period ends exactly at the cut-off", () => {
		expect(closedCandlePoints([[baseTs, 1, 1, 1, 4, 1]], DAY, baseTs + DAY)).toEqual([
			{ timestamp: baseTs, close: 4 },
		]);
	});

	it("maps a missing close to NaN", () => {
		const [point] = closedCandlePoints(
			[[baseTs, 1, 1, 1, undefined, 1]],
			DAY,
			baseTs + DAY
		);
		expect(point.timestamp).toBe(baseTs);
		expect(point.close).toBeNaN();
	});
});
