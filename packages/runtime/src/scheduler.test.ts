import {
	DEFAULT_ROTATION_CONFIG,
	DataUnavailableError,
	silentLogger,
	type RotationConfig,
} from "@rotator/core";
import { PaperGateway } from "@rotator/execution-engine";
import { describe, expect, it, vi } from "vitest";
import type { CycleOutcome, runCycle } from "./runCycle";
import { nextCycleDelay, runScheduler } from "./scheduler";

const config: RotationConfig = {
	...DEFAULT_ROTATION_CONFIG,
	holdingDays: 7,
	failureCooldownMs: 300_000,
};

const completed: CycleOutcome = {
	status: "completed",
	report: {
		selected: [],
		sold: [],
		bought: [],
		skipped: [],
		finalBalance: 0,
		regimePassed: false,
		refReturn: 0,
	},
	startedAt: 0,
	finishedAt: 0,
};

const failed: CycleOutcome = {
	status: "failed",
	stage: "selection",
	error: new DataUnavailableError("BTCUSDT", "No candles for BTCUSDT"),
	startedAt: 0,
	finishedAt: 0,
};

const deps = {
	gateway: new PaperGateway({
		marketData: {
			fetchPriceSeries: async (symbol: string) => {
				throw new DataUnavailableError(symbol, "offline");
			},
			fetchTradableUniverse: async () => [],
			fetchSymbolConstraints: async () => null,
			fetchPrice: async (symbol: string) => {
				throw new DataUnavailableError(symbol, "offline");
			},
		},
		quoteCurrency: "USDT",
		startingBalance: 0,
		commission: 0,
	}),
};

const setup = () => {
	const cycle = vi.fn<typeof runCycle>();
	const sleep = vi.fn<(ms: number, signal?: AbortSignal) => Promise<void>>(
		async () => undefined
	);
	return { cycle, sleep };
};

describe("nextCycleDelay", () => {
	it("waits the holding period after a completed cycle", () => {
		expect(nextCycleDelay(completed, config)).toBe(7 * 86_400_000);
	});

	it("waits the failure cooldown after a failed cycle", () => {
		expect(nextCycleDelay(failed, config)).toBe(300_000);
	});
});

describe("runScheduler", () => {
	it("runs cycles back to back with outcome-driven delays", async () => {
		const { cycle, sleep } = setup();
		cycle.mockResolvedValueOnce(failed).mockResolvedValueOnce(completed);

		const summary = await runScheduler({
			config,
			deps,
			maxCycles: 2,
			runCycle: cycle,
			sleep,
			logger: silentLogger,
		});

		expect(summary).toEqual({ cyclesRun: 2, lastOutcome: completed });
		expect(cycle).toHaveBeenCalledTimes(2);
		expect(cycle).toHaveBeenCalledWith(config, deps);
		expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([300_000]);
	});

	it("stops between cycles once aborted", async () => {
		const { cycle, sleep } = setup();
		const controller = new AbortController();
		cycle.mockImplementation(async () => {
			controller.abort();
			return completed;
		});

		const summary = await runScheduler({
			config,
			deps,
			signal: controller.signal,
			runCycle: cycle,
			sleep,
			logger: silentLogger,
		});

		expect(summary.cyclesRun).toBe(1);
		expect(sleep).not.toHaveBeenCalled();
	});

	it("passes the abort signal to the wait", async () => {
		const { cycle, sleep } = setup();
		const controller = new AbortController();
		cycle.mockResolvedValue(completed);
		sleep.mockImplementation(async () => {
			controller.abort();
		});

		const summary = await runScheduler({
			config,
			deps,
			signal: controller.signal,
			runCycle: cycle,
			sleep,
			logger: silentLogger,
		});

		expect(summary.cyclesRun).toBe(1);
		expect(sleep).toHaveBeenCalledWith(7 * 86_400_000, controller.signal);
	});

	it("does not start when already aborted", async () => {
		const { cycle, sleep } = setup();
		const controller = new AbortController();
		controller.abort();

		const summary = await runScheduler({
			config,
			deps,
			signal: controller.signal,
			runCycle: cycle,
			sleep,
			logger: silentLogger,
		});

		expect(summary).toEqual({ cyclesRun: 0, lastOutcome: null });
		expect(cycle).not.toHaveBeenCalled();
	});

	it("rejects a non-positive cycle limit", async () => {
		await expect(
			runScheduler({ config, deps, maxCycles: 0, logger: silentLogger })
		).rejects.toThrow(RangeError);
	});
});
