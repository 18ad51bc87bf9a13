import {
	DataUnavailableError,
	createLogger,
	describeError,
	errorMessage,
	sleep as defaultSleep,
	type ModuleLogger,
	type PriceSeries,
	type PriceSeriesProvider,
	type RankedUniverse,
	type RotationConfig,
	type SelectedSet,
	type Signal,
	type Sleep,
} from "@rotator/core";
import {
	combine,
	computeSignal,
	momentumReturn,
	selectTop,
} from "@rotator/signals";

export type SelectionSettings = Pick<
	RotationConfig,
	| "lookback"
	| "holdingDays"
	| "threshold"
	| "numberOfTokens"
	| "referenceSymbol"
	| "requestDelayMs"
>;

export interface UniverseSelectionRequest {
	provider: PriceSeriesProvider;
	/** Candidate symbols, already filtered for tradability. */
	universe: readonly string[];
	settings: SelectionSettings;
	sleep?: Sleep;
	logger?: ModuleLogger;
}

export interface UniverseSelection {
	selected: SelectedSet;
	ranks: RankedUniverse;
	regimePassed: boolean;
	refReturn: number;
}

const fetchReferenceSeries = async (
	provider: PriceSeriesProvider,
	settings: SelectionSettings
): Promise<PriceSeries> => {
	const { referenceSymbol, lookback, holdingDays } = settings;
	let series: PriceSeries;
	try {
		series = await provider.fetchPriceSeries(
			referenceSymbol,
			lookback + holdingDays + 1
		);
	} catch (error) {
		if (error instanceof DataUnavailableError) {
			throw error;
		}
		throw new DataUnavailableError(
			referenceSymbol,
			`Reference series ${referenceSymbol} unavailable: ${errorMessage(error)}`,
			{ cause: error }
		);
	}
	if (series.points.length < lookback) {
		throw new DataUnavailableError(
			referenceSymbol,
			`Reference series ${referenceSymbol} has ${series.points.length} points, ${lookback} required`
		);
	}
	return series;
};

/**
 * Pick the symbols to hold for the next period.
 *
 * When the reference asset's return over the lookback does not beat the
 * threshold the selection is empty. Otherwise every candidate is fetched
 * one at a time, scored, and the `numberOfTokens` symbols with the largest
 * combined rank are selected. A candidate whose fetch or score fails, or
 * whose score is not finite, is skipped without affecting the others.
 */
export async function selectUniverse(
	request: UniverseSelectionRequest
): Promise<UniverseSelection> {
	const { provider, settings } = request;
	const sleep = request.sleep ?? defaultSleep;
	const logger = request.logger ?? createLogger("runtime:universe");

	const reference = await fetchReferenceSeries(provider, settings);
	const refReturn = momentumReturn(reference, settings.lookback);
	if (refReturn <= settings.threshold) {
		logger.info("regime_filter_blocked", {
			referenceSymbol: settings.referenceSymbol,
			refReturn,
			threshold: settings.threshold,
		});
		return { selected: [], ranks: new Map(), regimePassed: false, refReturn };
	}

	const referenceSymbol = settings.referenceSymbol.toUpperCase();
	const signals = new Map<string, Signal>();
	for (const symbol of request.universe) {
		if (symbol.toUpperCase() === referenceSymbol || signals.has(symbol)) {
			continue;
		}
		await sleep(settings.requestDelayMs);
		let series: PriceSeries;
		try {
			series = await provider.fetchPriceSeries(symbol, settings.lookback);
		} catch (error) {
			logger.warn("symbol_skipped", { symbol, ...describeError(error) });
			continue;
		}
		if (series.points.length < settings.lookback) {
			logger.warn("symbol_skipped", {
				symbol,
				message: `${series.points.length} points, ${settings.lookback} required`,
			});
			continue;
		}
		let signal: Signal;
		try {
			signal = computeSignal(series, settings.lookback);
		} catch (error) {
			logger.warn("symbol_skipped", { symbol, ...describeError(error) });
			continue;
		}
		if (
			!Number.isFinite(signal.momentumReturn) ||
			!Number.isFinite(signal.discreteness)
		) {
			logger.warn("symbol_skipped", {
				symbol,
				message: `Signal is not finite (momentum ${signal.momentumReturn}, discreteness ${signal.discreteness})`,
			});
			continue;
		}
		signals.set(symbol, signal);
	}

	const ranks = combine(signals);
	const selected = selectTop(ranks, settings.numberOfTokens);
	logger.info("universe_selected", {
		ranks: Object.fromEntries(ranks),
		selected,
		refReturn,
		candidates: request.universe.length,
		scored: signals.size,
	});
	return { selected, ranks, regimePassed: true, refReturn };
}
