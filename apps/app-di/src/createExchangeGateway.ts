import {
	ConfigError,
	type EnvConfig,
	type ExchangeConfig,
	type ExchangeGateway,
	type ExecutionMode,
	type RotationConfig,
} from "@rotator/core";
import { BinanceSpotGateway } from "@rotator/exchange-binance";
import { PaperGateway } from "@rotator/execution-engine";

const isBinance = (id: string): boolean => id.toLowerCase().includes("binance");

export interface GatewayOverrides {
	executionMode?: ExecutionMode;
}

/**
 * Live mode trades on Binance spot with the configured credentials. Paper
 * mode reads the same public market data and simulates the account.
 */
export const createExchangeGateway = (
	env: EnvConfig,
	exchange: ExchangeConfig,
	rotation: RotationConfig,
	overrides: GatewayOverrides = {}
): ExchangeGateway => {
	if (!isBinance(exchange.exchange)) {
		throw new ConfigError(
			`Unsupported exchange "${exchange.exchange}"; only binance spot is available`
		);
	}
	const executionMode = overrides.executionMode ?? env.executionMode;
	const { apiKey, apiSecret } = exchange.credentials;

	if (executionMode === "live" && (!apiKey || !apiSecret)) {
		throw new ConfigError(
			"Live trading requires BINANCE_API_KEY and BINANCE_API_SECRET"
		);
	}

	const binance = new BinanceSpotGateway({
		quoteCurrency: rotation.quoteCurrency,
		apiKey,
		secret: apiSecret,
		testnet: exchange.testnet,
		maxRetries: exchange.maxRetries,
		retryBaseDelayMs: exchange.retryBaseDelayMs,
	});
	if (executionMode === "live") {
		return binance;
	}

	return new PaperGateway({
		marketData: binance,
		quoteCurrency: rotation.quoteCurrency,
		startingBalance: env.paperStartingBalance,
		commission: rotation.commission,
	});
};
