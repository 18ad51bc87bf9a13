import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { ConfigError } from "./errors";

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const CONFIG_META_SYMBOL = Symbol.for("rotator.config.meta");

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	if (!isRecord(meta) || typeof meta.source !== "string") {
		return null;
	}
	return {
		source:
			meta.source === "file" || meta.source === "merged"
				? meta.source
				: "embedded",
		path: typeof meta.path === "string" ? meta.path : undefined,
		profile: typeof meta.profile === "string" ? meta.profile : undefined,
	};
};

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = readConfigMetadata(config) ?? {};
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: { ...existing, ...metadata },
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const getConfigMetadata = (config: unknown): ConfigMetadata | null =>
	readConfigMetadata(config);

/**
 * Strategy parameters for one bot instance. Passed by value into every
 * cycle and never mutated.
 */
export interface RotationConfig {
	/** Days of history used for the momentum return. */
	lookback: number;
	/** Days between cycles; also pads the reference history window. */
	holdingDays: number;
	/** Minimum reference return required before rotating. */
	threshold: number;
	numberOfTokens: number;
	/** Reserved for sizing; only simulated fills charge it. */
	commission: number;
	notionalPerAsset: number;
	quoteCurrency: string;
	referenceSymbol: string;
	requestDelayMs: number;
	orderDelayMs: number;
	settlementDelayMs: number;
	failureCooldownMs: number;
	ignoredAssets: readonly string[];
	excludedBaseAssets: readonly string[];
}

export const DEFAULT_ROTATION_CONFIG: Readonly<RotationConfig> = Object.freeze({
	lookback: 30,
	holdingDays: 7,
	threshold: 0,
	numberOfTokens: 5,
	commission: 0.001,
	notionalPerAsset: 20,
	quoteCurrency: "USDT",
	referenceSymbol: "BTCUSDT",
	requestDelayMs: 250,
	orderDelayMs: 500,
	settlementDelayMs: 5_000,
	failureCooldownMs: 5 * 60_000,
	ignoredAssets: [],
	excludedBaseAssets: [],
});

export type ExecutionMode = "paper" | "live";

export interface EnvConfig {
	exchangeId: string;
	executionMode: ExecutionMode;
	apiKey: string;
	apiSecret: string;
	testnet: boolean;
	paperStartingBalance: number;
	rotationProfile: string;
}

export interface ExchangeConfig {
	id: string;
	exchange: string;
	market: "spot";
	testnet: boolean;
	maxRetries: number;
	retryBaseDelayMs: number;
	credentials: {
		apiKey: string;
		apiSecret: string;
	};
}

export interface RotatorConfig {
	env: EnvConfig;
	exchange: ExchangeConfig;
	rotation: RotationConfig;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	exchangeProfile?: string;
	rotationProfile?: string;
}

let envLoaded = false;
let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const isWorkspaceRoot = (dir: string): boolean => {
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	try {
		const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
		return isRecord(parsed) && Array.isArray(parsed.workspaces);
	} catch {
		return false;
	}
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

const getDefaultEnvPath = (): string => path.join(findWorkspaceRoot(), ".env");
export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const getEnvVar = (key: string, fallback: string): string => {
	const value = process.env[key]?.trim();
	return value !== undefined && value !== "" ? value : fallback;
};

const normalizeExecutionMode = (value: string | undefined): ExecutionMode =>
	value?.toLowerCase() === "live" ? "live" : "paper";

const parseEnvNumber = (key: string, fallback: number): number => {
	const raw = process.env[key]?.trim();
	if (!raw) {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new ConfigError(
			`Environment variable ${key} must be numeric, got "${raw}"`
		);
	}
	return value;
};

const readJsonFile = (filePath: string): unknown => {
	if (!fs.existsSync(filePath)) {
		throw new ConfigError(`Config file not found: ${filePath}`);
	}
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigError(
			`Config file ${filePath} is not valid JSON: ${
				error instanceof Error ? error.message : String(error)
			}`
		);
	}
};

export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	if (!envLoaded || loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		envLoaded = true;
		loadedEnvPath = envPath;
	}

	return {
		exchangeId: getEnvVar("EXCHANGE_ID", "binance"),
		executionMode: normalizeExecutionMode(getEnvVar("EXECUTION_MODE", "paper")),
		apiKey: getEnvVar("BINANCE_API_KEY", ""),
		apiSecret: getEnvVar("BINANCE_API_SECRET", ""),
		testnet: getEnvVar("BINANCE_TESTNET", "false").toLowerCase() === "true",
		paperStartingBalance: parseEnvNumber("PAPER_STARTING_BALANCE", 1_000),
		rotationProfile: getEnvVar("ROTATION_PROFILE", "momentum-rotation"),
	};
};

const ensureNumber = (
	file: Record<string, unknown>,
	field: string,
	fallback: number | undefined,
	check: (value: number) => boolean,
	requirement: string
): number => {
	const raw = file[field] ?? fallback;
	if (typeof raw !== "number" || !Number.isFinite(raw) || !check(raw)) {
		throw new ConfigError(`rotation.${field} must be ${requirement}`);
	}
	return raw;
};

const ensureString = (
	file: Record<string, unknown>,
	field: string,
	fallback: string
): string => {
	const raw = file[field] ?? fallback;
	if (typeof raw !== "string" || raw.trim().length === 0) {
		throw new ConfigError(`rotation.${field} must be a non-empty string`);
	}
	return raw.trim().toUpperCase();
};

const ensureAssetList = (
	file: Record<string, unknown>,
	field: string,
	fallback: readonly string[]
): readonly string[] => {
	const raw = file[field] ?? fallback;
	if (!Array.isArray(raw) || raw.some((item) => typeof item !== "string")) {
		throw new ConfigError(`rotation.${field} must be a list of asset names`);
	}
	return Object.freeze(raw.map((item) => String(item).trim().toUpperCase()));
};

const isPositiveInteger = (value: number): boolean =>
	Number.isInteger(value) && value >= 1;
const isNonNegativeInteger = (value: number): boolean =>
	Number.isInteger(value) && value >= 0;

const validateRotationConfig = (
	raw: unknown,
	defaults: Readonly<RotationConfig>
): RotationConfig => {
	if (!isRecord(raw)) {
		throw new ConfigError("Rotation config must be a JSON object");
	}
	const file = raw;
	const positiveInt = (field: string, fallback: number): number =>
		ensureNumber(file, field, fallback, isPositiveInteger, "an integer >= 1");
	const delay = (field: string, fallback: number): number =>
		ensureNumber(file, field, fallback, isNonNegativeInteger, "an integer >= 0");

	const config: RotationConfig = {
		lookback: positiveInt("lookback", defaults.lookback),
		holdingDays: positiveInt("holdingDays", defaults.holdingDays),
		threshold: ensureNumber(
			file,
			"threshold",
			defaults.threshold,
			() => true,
			"a finite number"
		),
		numberOfTokens: positiveInt("numberOfTokens", defaults.numberOfTokens),
		commission: ensureNumber(
			file,
			"commission",
			defaults.commission,
			(value) => value >= 0 && value < 1,
			"in [0, 1)"
		),
		notionalPerAsset: ensureNumber(
			file,
			"notionalPerAsset",
			defaults.notionalPerAsset,
			(value) => value > 0,
			"positive"
		),
		quoteCurrency: ensureString(file, "quoteCurrency", defaults.quoteCurrency),
		referenceSymbol: ensureString(
			file,
			"referenceSymbol",
			defaults.referenceSymbol
		),
		requestDelayMs: delay("requestDelayMs", defaults.requestDelayMs),
		orderDelayMs: delay("orderDelayMs", defaults.orderDelayMs),
		settlementDelayMs: delay("settlementDelayMs", defaults.settlementDelayMs),
		failureCooldownMs: delay("failureCooldownMs", defaults.failureCooldownMs),
		ignoredAssets: ensureAssetList(file, "ignoredAssets", defaults.ignoredAssets),
		excludedBaseAssets: ensureAssetList(
			file,
			"excludedBaseAssets",
			defaults.excludedBaseAssets
		),
	};
	if (!config.referenceSymbol.endsWith(config.quoteCurrency)) {
		throw new ConfigError(
			`rotation.referenceSymbol ${config.referenceSymbol} must be quoted in ${config.quoteCurrency}`
		);
	}
	return config;
};

/**
 * Validate a raw rotation profile, filling unspecified fields from
 * {@link DEFAULT_ROTATION_CONFIG}. The result is frozen.
 */
export const parseRotationConfig = (
	raw: unknown,
	defaults: Readonly<RotationConfig> = DEFAULT_ROTATION_CONFIG
): RotationConfig => Object.freeze(validateRotationConfig(raw, defaults));

export const resolveRotationConfigPath = (
	configDir: string,
	profile: string
): string => {
	const profileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidates = [
		path.join(configDir, "strategy", profileName),
		path.join(configDir, profileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new ConfigError(
		`Rotation config not found. Looked for ${candidates.join(", ")}`
	);
};

export const loadRotationConfig = (
	configDir = getDefaultConfigDir(),
	profile = "momentum-rotation"
): RotationConfig => {
	const configPath = resolveRotationConfigPath(configDir, profile);
	const config = validateRotationConfig(
		readJsonFile(configPath),
		DEFAULT_ROTATION_CONFIG
	);
	return Object.freeze(
		withConfigMetadata(config, {
			source: "file",
			path: configPath,
			profile,
		})
	);
};

export const loadExchangeConfig = (
	env: EnvConfig,
	configDir = getDefaultConfigDir(),
	exchangeProfile?: string
): ExchangeConfig => {
	const profile = exchangeProfile ?? env.exchangeId;
	const exchangePath = path.join(configDir, "exchange", `${profile}.json`);
	const file = readJsonFile(exchangePath);
	if (!isRecord(file)) {
		throw new ConfigError(
			`Exchange config at ${exchangePath} must be a JSON object`
		);
	}
	if (file.market !== undefined && file.market !== "spot") {
		throw new ConfigError(
			`Exchange config at ${exchangePath} must use the spot market`
		);
	}
	const maxRetries = file.maxRetries ?? 3;
	const retryBaseDelayMs = file.retryBaseDelayMs ?? 500;
	if (typeof maxRetries !== "number" || !isNonNegativeInteger(maxRetries)) {
		throw new ConfigError("exchange.maxRetries must be an integer >= 0");
	}
	if (
		typeof retryBaseDelayMs !== "number" ||
		!isNonNegativeInteger(retryBaseDelayMs)
	) {
		throw new ConfigError("exchange.retryBaseDelayMs must be an integer >= 0");
	}
	return withConfigMetadata(
		{
			id: profile,
			exchange: typeof file.exchange === "string" ? file.exchange : profile,
			market: "spot",
			testnet: env.testnet || file.testnet === true,
			maxRetries,
			retryBaseDelayMs,
			credentials: {
				apiKey: env.apiKey,
				apiSecret: env.apiSecret,
			},
		},
		{
			source: "file",
			path: exchangePath,
			profile,
		}
	);
};

export const loadRotatorConfig = (
	options: ConfigLoadOptions = {}
): RotatorConfig => {
	const workspaceRoot = findWorkspaceRoot();
	const envPath = options.envPath ?? path.join(workspaceRoot, ".env");
	const configDir = options.configDir ?? path.join(workspaceRoot, "config");
	const env = loadEnvConfig(envPath);
	return {
		env,
		exchange: loadExchangeConfig(env, configDir, options.exchangeProfile),
		rotation: loadRotationConfig(
			configDir,
			options.rotationProfile ?? env.rotationProfile
		),
	};
};
