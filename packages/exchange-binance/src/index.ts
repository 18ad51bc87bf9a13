export {
	BinanceSpotGateway,
	createCcxtBinanceSpot,
	parseFreeBalances,
} from "./binanceSpotGateway";
export type {
	BinanceSpotGatewayOptions,
	SpotExchangeApi,
	SpotOrder,
	SpotTicker,
} from "./binanceSpotGateway";
export { constraintsFromMarket, decimalsOfStep } from "./marketConstraints";
export type { AmountPrecisionMode, SpotMarket } from "./marketConstraints";
export {
	backoffDelay,
	isTransientExchangeError,
	withRetry,
} from "./retry";
export type { RetryOptions } from "./retry";
