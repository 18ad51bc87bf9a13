import ccxt from "ccxt";
import type { OHLCV } from "ccxt";
import {
	DataUnavailableError,
	ExchangeRejectionError,
	DAY_MS,
	HOUR_MS,
	createLogger,
	describeError,
	errorMessage,
	type ExchangeGateway,
	type FillConfirmation,
	type Holdings,
	type OrderSide,
	type PriceSeries,
	type Sleep,
	type SymbolConstraints,
} from "@rotator/core";
import {
	buildPriceSeries,
	closedCandlePoints,
	tailPriceSeries,
} from "@rotator/data";
import {
	constraintsFromMarket,
	type AmountPrecisionMode,
	type SpotMarket,
} from "./marketConstraints";
import { withRetry } from "./retry";

const binanceLogger = createLogger("exchange:binance");

const DAILY_TIMEFRAME = "1d";

export interface SpotOrder {
	id?: string;
	amount?: number;
	filled?: number;
	price?: number;
	average?: number;
	cost?: number;
}

export interface SpotTicker {
	last?: number;
	close?: number;
}

/**
 * The slice of a ccxt exchange the gateway calls. A ccxt `binance` instance
 * satisfies it; tests pass an in-memory fake.
 */
export interface SpotExchangeApi {
	loadMarkets(reload?: boolean): Promise<Record<string, SpotMarket>>;
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
	fetchBalance(): Promise<unknown>;
	fetchTicker(symbol: string): Promise<SpotTicker>;
	createOrder(
		symbol: string,
		type: "market",
		side: "buy" | "sell",
		amount: number
	): Promise<SpotOrder>;
}

export interface BinanceSpotGatewayOptions {
	quoteCurrency: string;
	apiKey?: string;
	secret?: string;
	testnet?: boolean;
	maxRetries?: number;
	retryBaseDelayMs?: number;
	marketsTtlMs?: number;
	precisionMode?: AmountPrecisionMode;
	exchange?: SpotExchangeApi;
	sleep?: Sleep;
	now?: () => number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const positiveOrNull = (value: number | undefined): number | null =>
	value !== undefined && Number.isFinite(value) && value > 0 ? value : null;

export const createCcxtBinanceSpot = (
	options: Pick<BinanceSpotGatewayOptions, "apiKey" | "secret" | "testnet">
): SpotExchangeApi => {
	const client = new ccxt.binance({
		apiKey: options.apiKey || undefined,
		secret: options.secret || undefined,
		enableRateLimit: true,
		options: {
			defaultType: "spot",
		},
	});
	if (options.testnet) {
		client.setSandboxMode(true);
	}
	return client;
};

/**
 * Free balances keyed by asset, keeping only positive finite amounts.
 */
export const parseFreeBalances = (balance: unknown): Holdings => {
	const free = isRecord(balance) ? balance.free : undefined;
	const holdings: Record<string, number> = {};
	if (!isRecord(free)) {
		return holdings;
	}
	for (const [asset, amount] of Object.entries(free)) {
		const value = typeof amount === "string" ? Number(amount) : amount;
		if (typeof value === "number" && Number.isFinite(value) && value > 0) {
			holdings[asset.toUpperCase()] = value;
		}
	}
	return holdings;
};

export class BinanceSpotGateway implements ExchangeGateway {
	private readonly exchange: SpotExchangeApi;
	private readonly quoteCurrency: string;
	private readonly precisionMode: AmountPrecisionMode;
	private readonly marketsTtlMs: number;
	private readonly now: () => number;
	private marketsById: Map<string, SpotMarket> | null = null;
	private marketsLoadedAt = 0;

	constructor(private readonly options: BinanceSpotGatewayOptions) {
		this.exchange = options.exchange ?? createCcxtBinanceSpot(options);
		this.quoteCurrency = options.quoteCurrency.toUpperCase();
		this.precisionMode = options.precisionMode ?? "tick_size";
		this.marketsTtlMs = options.marketsTtlMs ?? HOUR_MS;
		this.now = options.now ?? Date.now;
	}

	/**
	 * The last `lookbackDays` settled daily closes. Today's candle is still
	 * open, so one extra row is requested and then dropped.
	 */
	async fetchPriceSeries(
		symbol: string,
		lookbackDays: number
	): Promise<PriceSeries> {
		const market = await this.requireMarket(symbol);
		let rows: OHLCV[];
		try {
			rows = await this.retrying("fetch_ohlcv", () =>
				this.exchange.fetchOHLCV(
					market.symbol,
					DAILY_TIMEFRAME,
					undefined,
					lookbackDays + 1
				)
			);
		} catch (error) {
			throw new DataUnavailableError(
				symbol,
				`Failed to fetch daily candles for ${symbol}: ${errorMessage(error)}`,
				{ cause: error }
			);
		}
		const points = closedCandlePoints(rows, DAY_MS, this.now());
		return tailPriceSeries(buildPriceSeries(symbol, points), lookbackDays);
	}

	async fetchTradableUniverse(): Promise<string[]> {
		const markets = await this.loadMarkets();
		const symbols: string[] = [];
		for (const [id, market] of markets) {
			if (
				market.spot !== false &&
				market.active !== false &&
				market.quote.toUpperCase() === this.quoteCurrency
			) {
				symbols.push(id);
			}
		}
		return symbols.sort();
	}

	async fetchHoldings(): Promise<Holdings> {
		const balance = await this.retrying("fetch_balance", () =>
			this.exchange.fetchBalance()
		);
		return parseFreeBalances(balance);
	}

	async fetchSymbolConstraints(
		symbol: string
	): Promise<SymbolConstraints | null> {
		const markets = await this.loadMarkets();
		const market = markets.get(symbol.toUpperCase());
		if (!market) {
			return null;
		}
		return constraintsFromMarket(market, this.precisionMode);
	}

	async fetchPrice(symbol: string): Promise<number> {
		const market = await this.requireMarket(symbol);
		const ticker = await this.retrying("fetch_ticker", () =>
			this.exchange.fetchTicker(market.symbol)
		);
		const price = positiveOrNull(ticker.last ?? ticker.close);
		if (price === null) {
			throw new DataUnavailableError(symbol, `No last price for ${symbol}`);
		}
		return price;
	}

	/**
	 * Orders are submitted once. A network failure here may still have
	 * reached the exchange, so it is reported rather than retried.
	 */
	async submitMarketOrder(
		symbol: string,
		side: OrderSide,
		quantity: number
	): Promise<FillConfirmation> {
		const market = await this.requireMarket(symbol);
		let order: SpotOrder;
		try {
			order = await this.exchange.createOrder(
				market.symbol,
				"market",
				side === "BUY" ? "buy" : "sell",
				quantity
			);
		} catch (error) {
			throw new ExchangeRejectionError(
				symbol,
				`Market ${side} of ${quantity} ${symbol} failed: ${errorMessage(error)}`,
				{ cause: error }
			);
		}
		return {
			orderId: order.id ?? "",
			symbol: market.id ?? symbol,
			side,
			quantity: positiveOrNull(order.filled) ?? order.amount ?? quantity,
			price: positiveOrNull(order.average) ?? positiveOrNull(order.price),
			cost: positiveOrNull(order.cost),
		};
	}

	private async requireMarket(symbol: string): Promise<SpotMarket> {
		const markets = await this.loadMarkets();
		const market = markets.get(symbol.toUpperCase());
		if (!market) {
			throw new DataUnavailableError(
				symbol,
				`Symbol ${symbol} is not listed on the spot market`
			);
		}
		return market;
	}

	private async loadMarkets(): Promise<Map<string, SpotMarket>> {
		const age = this.now() - this.marketsLoadedAt;
		if (this.marketsById && age < this.marketsTtlMs) {
			return this.marketsById;
		}
		const reload = this.marketsById !== null;
		const markets = await this.retrying("load_markets", () =>
			this.exchange.loadMarkets(reload)
		);
		const byId = new Map<string, SpotMarket>();
		for (const market of Object.values(markets)) {
			const id = (market.id ?? `${market.base}${market.quote}`).toUpperCase();
			if (market.spot !== false) {
				byId.set(id, market);
			}
		}
		this.marketsById = byId;
		this.marketsLoadedAt = this.now();
		binanceLogger.debug("markets_loaded", { markets: byId.size, reload });
		return byId;
	}

	private retrying<T>(operation: string, task: () => Promise<T>): Promise<T> {
		return withRetry(task, {
			maxRetries: this.options.maxRetries ?? 3,
			baseDelayMs: this.options.retryBaseDelayMs ?? 500,
			sleep: this.options.sleep,
			onRetry: (error, attempt, delayMs) =>
				binanceLogger.warn("exchange_call_retry", {
					operation,
					attempt,
					delayMs,
					...describeError(error),
				}),
		});
	}
}
