import {
	BelowMinNotionalError,
	DataUnavailableError,
	InsufficientFundsError,
	ZeroQuantityError,
	type SymbolConstraints,
} from "@rotator/core";
import { describe, expect, it } from "vitest";
import { sizeLiquidation, sizeOrder, truncateToPrecision } from "./orderSizer";

const constraints = (
	quantityPrecision: number,
	minNotional?: number
): SymbolConstraints => ({
	symbol: "AUSDT",
	baseAsset: "A",
	quoteAsset: "USDT",
	quantityPrecision,
	minNotional,
});

describe("truncateToPrecision", () => {
	it("floors to the requested number of decimals", () => {
		expect(truncateToPrecision(100 / 33.333, 2)).toBe(3);
		expect(truncateToPrecision(1.23456, 3)).toBe(1.234);
		expect(truncateToPrecision(9.99, 0)).toBe(9);
	});

	it("keeps values already on the step", () => {
		expect(truncateToPrecision(0.29, 2)).toBe(0.29);
	});

	it("never returns more than the input", () => {
		const values = [0.1 + 0.2, 1 / 3, 2.675, 1e-7, 12345.6789];
		for (const value of values) {
			for (const decimals of [0, 1, 2, 5, 8]) {
				expect(truncateToPrecision(value, decimals)).toBeLessThanOrEqual(value);
			}
		}
	});

	it("returns zero for non-positive values", () => {
		expect(truncateToPrecision(0, 2)).toBe(0);
		expect(truncateToPrecision(-4, 2)).toBe(0);
	});

	it("rejects invalid precision", () => {
		expect(() => truncateToPrecision(1, -1)).toThrow(RangeError);
		expect(() => truncateToPrecision(1, 1.5)).toThrow(RangeError);
	});
});

describe("sizeOrder", () => {
	it("sizes a buy from the target notional", () => {
		const result = sizeOrder(100, 33.333, constraints(2));
		expect(result.kind).toBe("sized");
		if (result.kind === "sized") {
			expect(result.quantity).toBe(3);
			expect(result.notional).toBeCloseTo(99.999, 9);
		}
	});

	it("rejects orders below the minimum notional", () => {
		const result = sizeOrder(10, 3, constraints(0, 10));
		expect(result.kind).toBe("rejected");
		if (result.kind === "rejected") {
			expect(result.error).toBeInstanceOf(BelowMinNotionalError);
			expect(result.error.code).toBe("BELOW_MIN_NOTIONAL");
		}
	});

	it("only sizes orders that meet the minimum notional", () => {
		const prices = [0.5, 1.7, 3.3, 19.99, 250];
		for (const price of prices) {
			const result = sizeOrder(20, price, constraints(1, 15));
			if (result.kind === "sized") {
				expect(result.quantity * price).toBeGreaterThanOrEqual(15);
			}
		}
	});

	it("rejects when the available balance is below the target", () => {
		const result = sizeOrder(20, 10, constraints(2), 15);
		expect(result).toMatchObject({ kind: "rejected" });
		if (result.kind === "rejected") {
			expect(result.error).toBeInstanceOf(InsufficientFundsError);
		}
	});

	it("rejects a non-positive price", () => {
		const result = sizeOrder(20, 0, constraints(2));
		expect(result.kind === "rejected" && result.error).toBeInstanceOf(
			DataUnavailableError
		);
	});

	it("rejects quantities that truncate to zero", () => {
		const result = sizeOrder(1, 1000, constraints(2));
		expect(result.kind === "rejected" && result.error).toBeInstanceOf(
			ZeroQuantityError
		);
	});
});

describe("sizeLiquidation", () => {
	it("truncates the whole position without a notional check", () => {
		expect(sizeLiquidation(2.5678, constraints(2, 1000))).toEqual({
			kind: "sized",
			quantity: 2.56,
		});
	});

	it("rejects dust below the quantity step", () => {
		const result = sizeLiquidation(0.004, constraints(2));
		expect(result.kind === "rejected" && result.error.code).toBe("ZERO_QUANTITY");
	});
});
