import type {
	FillConfirmation,
	Holdings,
	OrderSide,
	PriceSeries,
	SymbolConstraints,
} from "../types";

/**
 * Read-only market data used by the universe selector.
 */
export interface PriceSeriesProvider {
	/**
	 * Fetch daily closes for a symbol.
	 * @param lookbackDays - Number of most recent daily closes to request
	 */
	fetchPriceSeries(symbol: string, lookbackDays: number): Promise<PriceSeries>;

	/**
	 * Symbols currently open for spot trading, as exchange ids (`BTCUSDT`).
	 */
	fetchTradableUniverse(): Promise<string[]>;
}

/**
 * Exchange capabilities consumed by the rebalancing engine.
 *
 * Implementations own transport concerns: rate limiting, retries with backoff
 * and mapping exchange payloads into these shapes. Callers issue one request
 * at a time.
 */
export interface ExchangeGateway extends PriceSeriesProvider {
	fetchHoldings(): Promise<Holdings>;

	/**
	 * Quantity precision and minimum notional for a symbol.
	 * Resolves `null` when the exchange does not list the symbol; rejects when
	 * the metadata cannot be fetched at all.
	 */
	fetchSymbolConstraints(symbol: string): Promise<SymbolConstraints | null>;

	fetchPrice(symbol: string): Promise<number>;

	submitMarketOrder(
		symbol: string,
		side: OrderSide,
		quantity: number
	): Promise<FillConfirmation>;
}
