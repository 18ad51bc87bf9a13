export interface PricePoint {
	timestamp: number;
	close: number;
}

/**
 * Daily closes for one symbol, strictly increasing in time and never empty.
 * Frozen once built for a cycle.
 */
export interface PriceSeries {
	readonly symbol: string;
	readonly points: readonly PricePoint[];
}

export interface Signal {
	momentumReturn: number;
	discreteness: number;
}

export type RankedUniverse = Map<string, number>;

export type SelectedSet = readonly string[];

/** Free quantity per asset, e.g. `{ BTC: 0.5, USDT: 120 }`. */
export type Holdings = Readonly<Record<string, number>>;

export interface SymbolConstraints {
	symbol: string;
	baseAsset: string;
	quoteAsset: string;
	quantityPrecision: number;
	minNotional?: number;
}

export type OrderSide = "BUY" | "SELL";

export interface FillConfirmation {
	orderId: string;
	symbol: string;
	side: OrderSide;
	quantity: number;
	price: number | null;
	cost: number | null;
}
