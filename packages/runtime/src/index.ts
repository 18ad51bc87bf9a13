export { selectUniverse } from "./universeSelector";
export type {
	SelectionSettings,
	UniverseSelection,
	UniverseSelectionRequest,
} from "./universeSelector";
export { runCycle } from "./runCycle";
export type {
	CycleDependencies,
	CycleOutcome,
	CycleReport,
	CycleStage,
} from "./runCycle";
export { nextCycleDelay, runScheduler } from "./scheduler";
export type { SchedulerOptions, SchedulerSummary } from "./scheduler";
