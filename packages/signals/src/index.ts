export {
	computeSignal,
	discreteness,
	momentumReturn,
} from "./signalEngine";
export { combine, ordinalRanks, selectTop } from "./rankCombiner";
export type { SignalMap } from "./rankCombiner";
