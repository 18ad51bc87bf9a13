export {
	sizeLiquidation,
	sizeOrder,
	truncateToPrecision,
} from "./orderSizer";
export type {
	LiquidationSizing,
	SizingRejection,
	SizingResult,
} from "./orderSizer";
export { reconcile } from "./positionReconciler";
export type {
	ReconcileOptions,
	ReconcilePlan,
	SellInstruction,
} from "./positionReconciler";
export { RebalanceExecutor } from "./rebalanceExecutor";
export type {
	RebalanceExecutorOptions,
	RebalanceReport,
	RebalanceSettings,
	RebalanceState,
	SkippedOrder,
} from "./rebalanceExecutor";
export { PaperGateway } from "./paperGateway";
export type {
	MarketDataSource,
	PaperAccountSnapshot,
	PaperGatewayOptions,
} from "./paperGateway";
