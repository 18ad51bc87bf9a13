import { ConfigError, type ExecutionMode } from "@rotator/core";

type ArgValue = string | boolean;

export interface TraderCliOptions {
	/** Rotation profile under config/strategy. */
	profile?: string;
	/** Run a single cycle and exit. */
	once: boolean;
	mode?: ExecutionMode;
}

export const parseCliArgs = (argv: readonly string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			args[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length ? value : undefined;
};

export const parseTraderCliArgs = (argv: readonly string[]): TraderCliOptions => {
	const args = parseCliArgs(argv);
	const mode = getStringArg(args, "mode")?.toLowerCase();
	if (mode !== undefined && mode !== "paper" && mode !== "live") {
		throw new ConfigError(`--mode must be "paper" or "live", got "${mode}"`);
	}
	return {
		profile: getStringArg(args, "profile"),
		once: args.once === true || args.once === "true",
		mode,
	};
};
