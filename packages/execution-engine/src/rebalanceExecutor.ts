import {
	DataUnavailableError,
	ExchangeRejectionError,
	InsufficientFundsError,
	OrderRejectionError,
	RebalanceAbortedError,
	createLogger,
	describeError,
	errorMessage,
	isRotatorError,
	sleep as defaultSleep,
	type ExchangeGateway,
	type FillConfirmation,
	type ModuleLogger,
	type OrderSide,
	type RotationConfig,
	type RotatorErrorCode,
	type Sleep,
} from "@rotator/core";
import { sizeLiquidation, sizeOrder } from "./orderSizer";
import type { ReconcilePlan, SellInstruction } from "./positionReconciler";

export type RebalanceState =
	| "idle"
	| "liquidating"
	| "settlement_wait"
	| "acquiring"
	| "done"
	| "failed";

export interface SkippedOrder {
	symbol: string;
	side: OrderSide;
	reason: RotatorErrorCode;
	message: string;
}

export interface RebalanceReport {
	sold: FillConfirmation[];
	bought: FillConfirmation[];
	skipped: SkippedOrder[];
	/** Quote balance left after the buys, tracked locally from fills. */
	finalBalance: number;
}

export type RebalanceSettings = Pick<
	RotationConfig,
	| "quoteCurrency"
	| "notionalPerAsset"
	| "orderDelayMs"
	| "settlementDelayMs"
>;

export interface RebalanceExecutorOptions {
	gateway: ExchangeGateway;
	settings: RebalanceSettings;
	sleep?: Sleep;
	logger?: ModuleLogger;
}

/**
 * Runs one rebalance: sell everything outside the selection, wait for the
 * proceeds to settle, then buy the new entries. An executor instance runs a
 * single plan.
 *
 * The `settlement_wait` state is always entered, but the `settlementDelayMs`
 * pause only happens when at least one sell filled; with no fills there are
 * no proceeds to wait for.
 *
 * Per-order problems become skips. Failing to read holdings or symbol
 * metadata aborts the rebalance with `RebalanceAbortedError`; fills made
 * before that point stay on the exchange.
 */
export class RebalanceExecutor {
	private state: RebalanceState = "idle";
	private ordersSubmitted = 0;
	private readonly sold: FillConfirmation[] = [];
	private readonly bought: FillConfirmation[] = [];
	private readonly skipped: SkippedOrder[] = [];
	private readonly gateway: ExchangeGateway;
	private readonly settings: RebalanceSettings;
	private readonly sleep: Sleep;
	private readonly logger: ModuleLogger;

	constructor(options: RebalanceExecutorOptions) {
		this.gateway = options.gateway;
		this.settings = options.settings;
		this.sleep = options.sleep ?? defaultSleep;
		this.logger = options.logger ?? createLogger("execution-engine:rebalance");
	}

	get currentState(): RebalanceState {
		return this.state;
	}

	async execute(plan: ReconcilePlan): Promise<RebalanceReport> {
		if (this.state !== "idle") {
			throw new Error(`Rebalance already ran (state ${this.state})`);
		}
		try {
			this.transition("liquidating");
			for (const instruction of plan.toSell) {
				await this.liquidate(instruction);
			}

			this.transition("settlement_wait");
			if (this.sold.length > 0) {
				await this.sleep(this.settings.settlementDelayMs);
			}

			this.transition("acquiring");
			const finalBalance = await this.acquire(plan.toBuy);

			this.transition("done");
			const report: RebalanceReport = {
				sold: [...this.sold],
				bought: [...this.bought],
				skipped: [...this.skipped],
				finalBalance,
			};
			this.logger.info("cycle_summary", { ...report });
			return report;
		} catch (error) {
			const failedIn = this.state;
			this.transition("failed", describeError(error));
			throw new RebalanceAbortedError(failedIn, error);
		}
	}

	private async liquidate(instruction: SellInstruction): Promise<void> {
		const { symbol } = instruction;
		const constraints = await this.gateway.fetchSymbolConstraints(symbol);
		if (!constraints) {
			this.skip(
				symbol,
				"SELL",
				new DataUnavailableError(
					symbol,
					`${symbol} is not listed; ${instruction.asset} position left in place`
				)
			);
			return;
		}
		const sizing = sizeLiquidation(instruction.quantity, constraints);
		if (sizing.kind === "rejected") {
			this.skip(symbol, "SELL", sizing.error);
			return;
		}
		const fill = await this.submit(symbol, "SELL", sizing.quantity);
		if (fill) {
			this.sold.push(fill);
		}
	}

	private async acquire(toBuy: readonly string[]): Promise<number> {
		const holdings = await this.gateway.fetchHoldings();
		const quote = this.settings.quoteCurrency.toUpperCase();
		const target = this.settings.notionalPerAsset;
		let balance = holdings[quote] ?? 0;

		for (const symbol of toBuy) {
			if (balance < target) {
				this.skip(symbol, "BUY", new InsufficientFundsError(symbol, balance, target));
				continue;
			}

			let price: number;
			try {
				price = await this.gateway.fetchPrice(symbol);
			} catch (error) {
				this.skip(
					symbol,
					"BUY",
					isRotatorError(error)
						? error
						: new DataUnavailableError(symbol, errorMessage(error), {
								cause: error,
							})
				);
				continue;
			}

			const constraints = await this.gateway.fetchSymbolConstraints(symbol);
			if (!constraints) {
				this.skip(
					symbol,
					"BUY",
					new DataUnavailableError(symbol, `${symbol} is not listed`)
				);
				continue;
			}

			const sizing = sizeOrder(target, price, constraints, balance);
			if (sizing.kind === "rejected") {
				this.skip(symbol, "BUY", sizing.error);
				continue;
			}

			const fill = await this.submit(symbol, "BUY", sizing.quantity);
			if (fill) {
				this.bought.push(fill);
				balance -= fill.cost ?? fill.quantity * (fill.price ?? price);
			}
		}
		return balance;
	}

	private async submit(
		symbol: string,
		side: OrderSide,
		quantity: number
	): Promise<FillConfirmation | null> {
		if (this.ordersSubmitted > 0) {
			await this.sleep(this.settings.orderDelayMs);
		}
		this.ordersSubmitted += 1;
		try {
			const fill = await this.gateway.submitMarketOrder(symbol, side, quantity);
			this.logger.info("order_filled", { ...fill });
			return fill;
		} catch (error) {
			this.skip(
				symbol,
				side,
				error instanceof OrderRejectionError
					? error
					: new ExchangeRejectionError(symbol, errorMessage(error), {
							cause: error,
						})
			);
			return null;
		}
	}

	private skip(symbol: string, side: OrderSide, error: Error): void {
		const skipped: SkippedOrder = {
			symbol,
			side,
			reason: isRotatorError(error) ? error.code : "DATA_UNAVAILABLE",
			message: error.message,
		};
		this.skipped.push(skipped);
		this.logger.warn("order_skipped", { ...skipped });
	}

	private transition(next: RebalanceState, data?: Record<string, unknown>): void {
		const previous = this.state;
		this.state = next;
		this.logger.info("rebalance_state", { from: previous, to: next, ...data });
	}
}
