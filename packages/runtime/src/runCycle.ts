import {
	createLogger,
	describeError,
	filterUniverse,
	type ExchangeGateway,
	type FillConfirmation,
	type ModuleLogger,
	type RotationConfig,
	type SelectedSet,
	type Sleep,
} from "@rotator/core";
import {
	RebalanceExecutor,
	reconcile,
	type SkippedOrder,
} from "@rotator/execution-engine";
import { selectUniverse } from "./universeSelector";

export interface CycleReport {
	selected: SelectedSet;
	sold: FillConfirmation[];
	bought: FillConfirmation[];
	skipped: SkippedOrder[];
	finalBalance: number;
	regimePassed: boolean;
	refReturn: number;
}

/** Where a failed cycle stopped. */
export type CycleStage = "universe" | "selection" | "reconcile" | "rebalance";

export type CycleOutcome =
	| {
			status: "completed";
			report: CycleReport;
			startedAt: number;
			finishedAt: number;
	  }
	| {
			status: "failed";
			stage: CycleStage;
			error: unknown;
			startedAt: number;
			finishedAt: number;
	  };

export interface CycleDependencies {
	gateway: ExchangeGateway;
	sleep?: Sleep;
	now?: () => number;
	logger?: ModuleLogger;
}

const cycleLogger = createLogger("runtime:cycle");

/**
 * One full rotation: list the universe, select, reconcile against the
 * account and rebalance. An empty selection holds the current positions and
 * places no orders. Failures come back as a `failed` outcome naming the
 * stage; nothing is retried here.
 */
export async function runCycle(
	config: RotationConfig,
	deps: CycleDependencies
): Promise<CycleOutcome> {
	const { gateway } = deps;
	const now = deps.now ?? Date.now;
	const logger = deps.logger ?? cycleLogger;
	const startedAt = now();
	let stage: CycleStage = "universe";

	logger.info("cycle_started", {
		referenceSymbol: config.referenceSymbol,
		lookback: config.lookback,
		numberOfTokens: config.numberOfTokens,
	});

	try {
		const listed = await gateway.fetchTradableUniverse();
		const universe = filterUniverse(listed, {
			quoteCurrency: config.quoteCurrency,
			excludedBaseAssets: config.excludedBaseAssets,
		});

		stage = "selection";
		const selection = await selectUniverse({
			provider: gateway,
			universe,
			settings: config,
			sleep: deps.sleep,
			logger: deps.logger,
		});

		stage = "reconcile";
		const holdings = await gateway.fetchHoldings();
		if (selection.selected.length === 0) {
			const report: CycleReport = {
				selected: [],
				sold: [],
				bought: [],
				skipped: [],
				finalBalance: holdings[config.quoteCurrency.toUpperCase()] ?? 0,
				regimePassed: selection.regimePassed,
				refReturn: selection.refReturn,
			};
			logger.info("positions_held", {
				regimePassed: report.regimePassed,
				refReturn: report.refReturn,
				holdings,
			});
			logger.info("cycle_completed", {
				selected: report.selected,
				sold: 0,
				bought: 0,
				skipped: 0,
				finalBalance: report.finalBalance,
			});
			return { status: "completed", report, startedAt, finishedAt: now() };
		}
		const plan = reconcile(holdings, selection.selected, {
			quoteCurrency: config.quoteCurrency,
			ignoredAssets: config.ignoredAssets,
		});
		logger.info("rebalance_planned", {
			toSell: plan.toSell.map((entry) => entry.symbol),
			toBuy: plan.toBuy,
		});

		stage = "rebalance";
		const executor = new RebalanceExecutor({
			gateway,
			settings: config,
			sleep: deps.sleep,
			logger: deps.logger,
		});
		const result = await executor.execute(plan);

		const report: CycleReport = {
			selected: selection.selected,
			...result,
			regimePassed: selection.regimePassed,
			refReturn: selection.refReturn,
		};
		logger.info("cycle_completed", {
			selected: report.selected,
			sold: report.sold.length,
			bought: report.bought.length,
			skipped: report.skipped.length,
			finalBalance: report.finalBalance,
		});
		return { status: "completed", report, startedAt, finishedAt: now() };
	} catch (error) {
		logger.error("cycle_failed", { stage, ...describeError(error) });
		return { status: "failed", stage, error, startedAt, finishedAt: now() };
	}
}
