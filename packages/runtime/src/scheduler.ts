import {
	createLogger,
	daysToMs,
	sleep as defaultSleep,
	type ModuleLogger,
	type RotationConfig,
	type Sleep,
} from "@rotator/core";
import {
	runCycle as defaultRunCycle,
	type CycleDependencies,
	type CycleOutcome,
} from "./runCycle";

const schedulerLogger = createLogger("runtime:scheduler");

/**
 * Wait before the next cycle: the holding period after a completed cycle,
 * the failure cooldown after a failed one.
 */
export const nextCycleDelay = (
	outcome: CycleOutcome,
	config: Pick<RotationConfig, "holdingDays" | "failureCooldownMs">
): number =>
	outcome.status === "completed"
		? daysToMs(config.holdingDays)
		: config.failureCooldownMs;

export interface SchedulerOptions {
	config: RotationConfig;
	deps: CycleDependencies;
	/** Stop after this many cycles; runs until aborted when omitted. */
	maxCycles?: number;
	/** Checked between cycles and interrupts the wait; a running cycle finishes. */
	signal?: AbortSignal;
	sleep?: Sleep;
	now?: () => number;
	logger?: ModuleLogger;
	runCycle?: typeof defaultRunCycle;
	onOutcome?: (outcome: CycleOutcome) => void;
}

export interface SchedulerSummary {
	cyclesRun: number;
	lastOutcome: CycleOutcome | null;
}

export async function runScheduler(
	options: SchedulerOptions
): Promise<SchedulerSummary> {
	const { config, deps, maxCycles, signal } = options;
	if (maxCycles !== undefined && (!Number.isInteger(maxCycles) || maxCycles < 1)) {
		throw new RangeError(`maxCycles must be an integer >= 1, got ${maxCycles}`);
	}
	const cycle = options.runCycle ?? defaultRunCycle;
	const wait = options.sleep ?? defaultSleep;
	const now = options.now ?? Date.now;
	const logger = options.logger ?? schedulerLogger;

	let cyclesRun = 0;
	let lastOutcome: CycleOutcome | null = null;

	while (!signal?.aborted) {
		const outcome = await cycle(config, deps);
		cyclesRun += 1;
		lastOutcome = outcome;
		options.onOutcome?.(outcome);

		if (maxCycles !== undefined && cyclesRun >= maxCycles) {
			break;
		}
		if (signal?.aborted) {
			break;
		}

		const delayMs = nextCycleDelay(outcome, config);
		logger.info("next_cycle_scheduled", {
			status: outcome.status,
			delayMs,
			nextRunAt: new Date(now() + delayMs).toISOString(),
		});
		await wait(delayMs, signal);
	}

	logger.info("scheduler_stopped", {
		cyclesRun,
		aborted: signal?.aborted ?? false,
	});
	return { cyclesRun, lastOutcome };
}
