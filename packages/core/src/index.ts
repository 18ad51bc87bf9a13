/**
 * Core package centralizes shared contracts, configuration and logging.
 * Everything else in the monorepo depends on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./symbols";
export type {
	ExchangeGateway,
	PriceSeriesProvider,
} from "./exchange/ExchangeGateway";
export { SECOND_MS, MINUTE_MS, HOUR_MS, DAY_MS, daysToMs } from "./time/constants";
export { sleep } from "./time/sleep";
export type { Sleep } from "./time/sleep";
export {
	createLogger,
	describeError,
	log,
	sanitizeLogPayload,
	silentLogger,
} from "./utils/logger";
export type { BaseLogPayload, LogLevel, ModuleLogger } from "./utils/logger";
