export { SnapshotHost } from "./SnapshotHost";
export type {
	PortfolioPosition,
	PortfolioSnapshot,
	RecordedLog,
	SnapshotHostOptions,
	Subscription,
	WarmUpRequest,
} from "./SnapshotHost";
export {
	InMemoryHistorySource,
	MarketDataHistorySource,
} from "./historySource";
export type { HistorySource, MarketDataHistorySourceOptions } from "./historySource";
export { evaluateSnapshot } from "./evaluateSnapshot";
export type {
	EvaluateSnapshotOptions,
	ScheduledEventSummary,
	SnapshotEvaluation,
} from "./evaluateSnapshot";
