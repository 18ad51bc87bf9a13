import {
	ExchangeRejectionError,
	InsufficientFundsError,
	baseAssetOf,
	createLogger,
	type ExchangeGateway,
	type FillConfirmation,
	type Holdings,
	type OrderSide,
	type PriceSeries,
	type SymbolConstraints,
} from "@rotator/core";

const paperLogger = createLogger("execution-engine:paper");

/** Read-only half of a gateway; a live gateway without credentials will do. */
export type MarketDataSource = Pick<
	ExchangeGateway,
	| "fetchPriceSeries"
	| "fetchTradableUniverse"
	| "fetchSymbolConstraints"
	| "fetchPrice"
>;

export interface PaperGatewayOptions {
	marketData: MarketDataSource;
	quoteCurrency: string;
	startingBalance: number;
	/** Fee rate taken from what each fill delivers, e.g. 0.001. */
	commission: number;
	initialHoldings?: Holdings;
}

export interface PaperAccountSnapshot {
	startingBalance: number;
	holdings: Holdings;
	feesPaid: number;
	trades: {
		total: number;
		buys: number;
		sells: number;
	};
	lastFill?: FillConfirmation;
}

const DUST = 1e-12;

/**
 * Simulated account on top of real market data. Market orders fill in full at
 * the current price; the commission is charged in the asset received.
 */
export class PaperGateway implements ExchangeGateway {
	private readonly marketData: MarketDataSource;
	private readonly quoteCurrency: string;
	private readonly startingBalance: number;
	private readonly commission: number;
	private readonly balances = new Map<string, number>();
	private feesPaid = 0;
	private trades = { total: 0, buys: 0, sells: 0 };
	private lastFill?: FillConfirmation;

	constructor(options: PaperGatewayOptions) {
		const { commission } = options;
		if (!Number.isFinite(commission) || commission < 0 || commission >= 1) {
			throw new RangeError(`commission must be in [0, 1), got ${commission}`);
		}
		this.marketData = options.marketData;
		this.quoteCurrency = options.quoteCurrency.toUpperCase();
		this.startingBalance = options.startingBalance;
		this.commission = options.commission;
		const initial = Object.entries(options.initialHoldings ?? {});
		for (const [asset, quantity] of initial) {
			this.credit(asset.toUpperCase(), quantity);
		}
		this.credit(this.quoteCurrency, options.startingBalance);
	}

	fetchPriceSeries(symbol: string, lookbackDays: number): Promise<PriceSeries> {
		return this.marketData.fetchPriceSeries(symbol, lookbackDays);
	}

	fetchTradableUniverse(): Promise<string[]> {
		return this.marketData.fetchTradableUniverse();
	}

	fetchSymbolConstraints(symbol: string): Promise<SymbolConstraints | null> {
		return this.marketData.fetchSymbolConstraints(symbol);
	}

	fetchPrice(symbol: string): Promise<number> {
		return this.marketData.fetchPrice(symbol);
	}

	async fetchHoldings(): Promise<Holdings> {
		return Object.fromEntries(this.balances);
	}

	async submitMarketOrder(
		symbol: string,
		side: OrderSide,
		quantity: number
	): Promise<FillConfirmation> {
		const base = baseAssetOf(symbol, this.quoteCurrency);
		if (base === null) {
			throw new ExchangeRejectionError(
				symbol,
				`${symbol} is not quoted in ${this.quoteCurrency}`
			);
		}
		if (!Number.isFinite(quantity) || quantity <= 0) {
			throw new ExchangeRejectionError(symbol, `Invalid quantity ${quantity}`);
		}

		const price = await this.marketData.fetchPrice(symbol);
		const cost = quantity * price;

		if (side === "BUY") {
			const available = this.balanceOf(this.quoteCurrency);
			if (available < cost) {
				throw new InsufficientFundsError(symbol, available, cost);
			}
			const fee = quantity * this.commission;
			this.debit(this.quoteCurrency, cost);
			this.credit(base, quantity - fee);
			this.feesPaid += fee * price;
			this.trades.buys += 1;
		} else {
			const available = this.balanceOf(base);
			if (available < quantity) {
				throw new InsufficientFundsError(symbol, available, quantity);
			}
			const fee = cost * this.commission;
			this.debit(base, quantity);
			this.credit(this.quoteCurrency, cost - fee);
			this.feesPaid += fee;
			this.trades.sells += 1;
		}
		this.trades.total += 1;

		const fill: FillConfirmation = {
			orderId: `paper-${this.trades.total}`,
			symbol,
			side,
			quantity,
			price,
			cost,
		};
		this.lastFill = fill;
		paperLogger.info("paper_account_update", {
			symbol,
			side,
			snapshot: this.snapshot(),
		});
		return fill;
	}

	snapshot(): PaperAccountSnapshot {
		return {
			startingBalance: this.startingBalance,
			holdings: Object.fromEntries(this.balances),
			feesPaid: this.feesPaid,
			trades: { ...this.trades },
			lastFill: this.lastFill,
		};
	}

	private balanceOf(asset: string): number {
		return this.balances.get(asset) ?? 0;
	}

	private credit(asset: string, amount: number): void {
		if (!Number.isFinite(amount) || amount <= 0) {
			return;
		}
		this.balances.set(asset, this.balanceOf(asset) + amount);
	}

	private debit(asset: string, amount: number): void {
		const remaining = this.balanceOf(asset) - amount;
		if (remaining <= DUST) {
			this.balances.delete(asset);
		} else {
			this.balances.set(asset, remaining);
		}
	}
}
