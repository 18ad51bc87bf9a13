import type { OHLCV } from "ccxt";
import { NetworkError } from "ccxt";
import { DataUnavailableError, ExchangeRejectionError } from "@rotator/core";
import { describe, expect, it, vi } from "vitest";
import {
	BinanceSpotGateway,
	parseFreeBalances,
	type SpotExchangeApi,
	type SpotOrder,
	type SpotTicker,
} from "./binanceSpotGateway";
import type { SpotMarket } from "./marketConstraints";

const DAY = 86_400_000;

const market = (base: string, quote = "USDT", extra: Partial<SpotMarket> = {}): SpotMarket => ({
	id: `${base}${quote}`,
	symbol: `${base}/${quote}`,
	base,
	quote,
	spot: true,
	active: true,
	precision: { amount: 0.01 },
	limits: { cost: { min: 5 } },
	info: {},
	...extra,
});

class FakeSpotExchange implements SpotExchangeApi {
	loadCalls: boolean[] = [];
	orders: Array<{ symbol: string; side: string; amount: number }> = [];
	ohlcv: OHLCV[] = [];
	ticker: SpotTicker = { last: 25 };
	balance: unknown = { free: {} };
	orderResult: SpotOrder | Error = { id: "1", filled: 2, average: 10, cost: 20 };

	constructor(private readonly markets: Record<string, SpotMarket>) {}

	async loadMarkets(reload?: boolean): Promise<Record<string, SpotMarket>> {
		this.loadCalls.push(reload ?? false);
		return this.markets;
	}

	async fetchOHLCV(): Promise<OHLCV[]> {
		return this.ohlcv;
	}

	async fetchBalance(): Promise<unknown> {
		return this.balance;
	}

	async fetchTicker(): Promise<SpotTicker> {
		return this.ticker;
	}

	async createOrder(
		symbol: string,
		_type: "market",
		side: "buy" | "sell",
		amount: number
	): Promise<SpotOrder> {
		this.orders.push({ symbol, side, amount });
		if (this.orderResult instanceof Error) {
			throw this.orderResult;
		}
		return this.orderResult;
	}
}

const createGateway = (
	exchange: FakeSpotExchange,
	now: () => number = () => 0
): BinanceSpotGateway =>
	new BinanceSpotGateway({
		quoteCurrency: "USDT",
		exchange,
		maxRetries: 2,
		retryBaseDelayMs: 1,
		sleep: async () => undefined,
		now,
	});

const defaultMarkets = (): Record<string, SpotMarket> => ({
	"ETH/USDT": market("ETH"),
	"SOL/USDT": market("SOL"),
	"ETH/BTC": market("ETH", "BTC", { id: "ETHBTC" }),
	"OLD/USDT": market("OLD", "USDT", { active: false }),
});

describe("BinanceSpotGateway", () => {
	it("lists active spot markets quoted in the quote currency", async () => {
		const gateway = createGateway(new FakeSpotExchange(defaultMarkets()));
		await expect(gateway.fetchTradableUniverse()).resolves.toEqual([
			"ETHUSDT",
			"SOLUSDT",
		]);
	});

	it("reuses loaded markets until the TTL expires", async () => {
		const exchange = new FakeSpotExchange(defaultMarkets());
		let clock = 0;
		const gateway = createGateway(exchange, () => clock);

		await gateway.fetchTradableUniverse();
		clock = 1_000;
		await gateway.fetchSymbolConstraints("ETHUSDT");
		clock = 2 * 60 * 60 * 1_000;
		await gateway.fetchTradableUniverse();

		expect(exchange.loadCalls).toEqual([false, true]);
	});

	it("builds a daily close series trimmed to the lookback", async () => {
		const exchange = new FakeSpotExchange(defaultMarkets());
		exchange.ohlcv = [
			[0, 1, 1, 1, 10, 5],
			[DAY, 1, 1, 1, 11, 5],
			[2 * DAY, 1, 1, 1, 12, 5],
		];
		const gateway = createGateway(exchange, () => 3 * DAY);

		const series = await gateway.fetchPriceSeries("ETHUSDT", 2);

		expect(series.symbol).toBe("ETHUSDT");
		expect(series.points).toEqual([
			{ timestamp: DAY, close: 11 },
			{ timestamp: 2 * DAY, close: 12 },
		]);
	});

	it("leaves out today's unfinished candle", async () => {
		const exchange = new FakeSpotExchange(defaultMarkets());
		exchange.ohlcv = [
			[0, 1, 1, 1, 10, 5],
			[DAY, 1, 1, 1, 11, 5],
			[2 * DAY, 1, 1, 1, 12.5, 5],
		];
		const fetchSpy = vi.spyOn(exchange, "fetchOHLCV");
		const gateway = createGateway(exchange, () => 2 * DAY + 60 * 60 * 1_000);

		const series = await gateway.fetchPriceSeries("ETHUSDT", 2);

		expect(fetchSpy).toHaveBeenCalledWith("ETH/USDT", "1d", undefined, 3);
		expect(series.points).toEqual([
			{ timestamp: 0, close: 10 },
			{ timestamp: DAY, close: 11 },
		]);
	});

	it("reports unknown symbols as unavailable data", async () => {
		const gateway = createGateway(new FakeSpotExchange(defaultMarkets()));
		await expect(gateway.fetchPriceSeries("NOPEUSDT", 5)).rejects.toBeInstanceOf(
			DataUnavailableError
		);
		await expect(gateway.fetchSymbolConstraints("NOPEUSDT")).resolves.toBeNull();
	});

	it("wraps candle failures after retrying network errors", async () => {
		const exchange = new FakeSpotExchange(defaultMarkets());
		const fetchSpy = vi
			.spyOn(exchange, "fetchOHLCV")
			.mockRejectedValue(new NetworkError("timeout"));
		const gateway = createGateway(exchange);

		await expect(gateway.fetchPriceSeries("ETHUSDT", 5)).rejects.toBeInstanceOf(
			DataUnavailableError
		);
		expect(fetchSpy).toHaveBeenCalledTimes(3);
	});

	it("returns positive free balances as holdings", async () => {
		const exchange = new FakeSpotExchange(defaultMarkets());
		exchange.balance = { free: { eth: 1.5, USDT: "40.5", DUST: 0 } };
		const gateway = createGateway(exchange);

		await expect(gateway.fetchHoldings()).resolves.toEqual({
			ETH: 1.5,
			USDT: 40.5,
		});
	});

	it("prefers the last traded price", async () => {
		const exchange = new FakeSpotExchange(defaultMarkets());
		exchange.ticker = { last: 31.5, close: 30 };
		const gateway = createGateway(exchange);
		await expect(gateway.fetchPrice("SOLUSDT")).resolves.toBe(31.5);
	});

	it("rejects a ticker without a usable price", async () => {
		const exchange = new FakeSpotExchange(defaultMarkets());
		exchange.ticker = {};
		const gateway = createGateway(exchange);
		await expect(gateway.fetchPrice("SOLUSDT")).rejects.toThrowError(
			"No last price for SOLUSDT"
		);
	});

	it("submits market orders against the unified symbol", async () => {
		const exchange = new FakeSpotExchange(defaultMarkets());
		const gateway = createGateway(exchange);

		const fill = await gateway.submitMarketOrder("ETHUSDT", "BUY", 2);

		expect(exchange.orders).toEqual([
			{ symbol: "ETH/USDT", side: "buy", amount: 2 },
		]);
		expect(fill).toEqual({
			orderId: "1",
			symbol: "ETHUSDT",
			side: "BUY",
			quantity: 2,
			price: 10,
			cost: 20,
		});
	});

	it("does not retry a failed order submission", async () => {
		const exchange = new FakeSpotExchange(defaultMarkets());
		exchange.orderResult = new NetworkError("socket hang up");
		const gateway = createGateway(exchange);

		await expect(
			gateway.submitMarketOrder("ETHUSDT", "SELL", 1)
		).rejects.toBeInstanceOf(ExchangeRejectionError);
		expect(exchange.orders).toHaveLength(1);
	});
});

describe("parseFreeBalances", () => {
	it("ignores malformed payloads", () => {
		expect(parseFreeBalances(null)).toEqual({});
		expect(parseFreeBalances({ free: [1, 2] })).toEqual({});
	});
});
