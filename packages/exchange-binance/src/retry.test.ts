import { NetworkError } from "ccxt";
import { describe, expect, it, vi } from "vitest";
import { backoffDelay, withRetry } from "./retry";

describe("backoffDelay", () => {
	it("doubles per attempt and caps at the maximum", () => {
		expect(backoffDelay(0, 100)).toBe(100);
		expect(backoffDelay(3, 100)).toBe(800);
		expect(backoffDelay(10, 100, 5_000)).toBe(5_000);
	});
});

describe("withRetry", () => {
	it("retries transient network errors with growing delays", async () => {
		const sleep = vi.fn(async (_ms: number) => undefined);
		const task = vi
			.fn<() => Promise<string>>()
			.mockRejectedValueOnce(new NetworkError("timeout"))
			.mockRejectedValueOnce(new NetworkError("reset"))
			.mockResolvedValue("ok");

		await expect(
			withRetry(task, { maxRetries: 3, baseDelayMs: 100, sleep })
		).resolves.toBe("ok");
		expect(task).toHaveBeenCalledTimes(3);
		expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
	});

	it("gives up after the bounded number of retries", async () => {
		const sleep = vi.fn(async (_ms: number) => undefined);
		const task = vi.fn(async (): Promise<string> => {
			throw new NetworkError("down");
		});

		await expect(
			withRetry(task, { maxRetries: 2, baseDelayMs: 10, sleep })
		).rejects.toThrowError("down");
		expect(task).toHaveBeenCalledTimes(3);
	});

	it("does not retry errors that are not transient", async () => {
		const sleep = vi.fn(async (_ms: number) => undefined);
		const task = vi.fn(async (): Promise<string> => {
			throw new Error("bad symbol");
		});

		await expect(
			withRetry(task, { maxRetries: 5, baseDelayMs: 10, sleep })
		).rejects.toThrowError("bad symbol");
		expect(task).toHaveBeenCalledTimes(1);
		expect(sleep).not.toHaveBeenCalled();
	});
});
