import { createExchangeGateway } from "@rotator/app-di";
import { createLogger, describeError, loadRotatorConfig } from "@rotator/core";
import { PaperGateway } from "@rotator/execution-engine";
import { runScheduler } from "@rotator/runtime";
import { parseTraderCliArgs } from "./cliArgs";

const logger = createLogger("trader-cli");

const main = async (): Promise<void> => {
	const options = parseTraderCliArgs(process.argv.slice(2));
	const config = loadRotatorConfig({ rotationProfile: options.profile });
	const executionMode = options.mode ?? config.env.executionMode;
	const rotation = config.rotation;

	logger.info("cli_starting", {
		profile: options.profile ?? config.env.rotationProfile,
		executionMode,
		once: options.once,
		exchange: config.exchange.exchange,
		testnet: config.exchange.testnet,
		referenceSymbol: rotation.referenceSymbol,
		lookback: rotation.lookback,
		holdingDays: rotation.holdingDays,
		numberOfTokens: rotation.numberOfTokens,
	});

	const gateway = createExchangeGateway(
		config.env,
		config.exchange,
		rotation,
		{ executionMode }
	);

	const controller = new AbortController();
	const stop = (signal: NodeJS.Signals): void => {
		logger.info("cli_stop_requested", { signal });
		controller.abort();
	};
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);

	const summary = await runScheduler({
		config: rotation,
		deps: { gateway },
		maxCycles: options.once ? 1 : undefined,
		signal: controller.signal,
	});

	process.off("SIGINT", stop);
	process.off("SIGTERM", stop);

	if (gateway instanceof PaperGateway) {
		logger.info("paper_account_snapshot", { snapshot: gateway.snapshot() });
	}
	if (options.once && summary.lastOutcome?.status === "failed") {
		process.exitCode = 1;
	}
};

main().catch((error: unknown) => {
	logger.error("cli_unhandled_error", {
		...describeError(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
