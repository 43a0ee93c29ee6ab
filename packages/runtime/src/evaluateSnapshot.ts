import {
	DateRule,
	OrderRequest,
	StrategyId,
	TimeRule,
	TradingAlgorithm,
	createLogger,
} from "@quantscripts/core";
import type { RecordedLog, SnapshotHost, Subscription, WarmUpRequest } from "./SnapshotHost";

const evaluationLogger = createLogger("runtime:evaluate");

export interface ScheduledEventSummary {
	name: string;
	dateRule: DateRule;
	timeRule: TimeRule;
	fired: boolean;
}

export interface SnapshotEvaluation {
	strategyId: StrategyId;
	/** ISO-8601 snapshot time. */
	asOf: string;
	subscriptions: Subscription[];
	warmUps: WarmUpRequest[];
	scheduled: ScheduledEventSummary[];
	orders: OrderRequest[];
	logs: RecordedLog[];
}

export interface EvaluateSnapshotOptions {
	strategy: TradingAlgorithm;
	host: SnapshotHost;
	/** Run every scheduled callback once before the bar is delivered. Defaults to true. */
	fireScheduled?: boolean;
}

/**
 * Runs one pass of a strategy against a snapshot host: initialize, price the
 * book, fire scheduled callbacks, then deliver the latest bars to `onData`.
 */
export const evaluateSnapshot = async (
	options: EvaluateSnapshotOptions
): Promise<SnapshotEvaluation> => {
	const { strategy, host } = options;
	const fireScheduled = options.fireScheduled ?? true;

	await strategy.initialize(host);
	await host.prepare();

	if (fireScheduled) {
		for (const event of host.scheduled) {
			evaluationLogger.debug("scheduled_event_fired", {
				strategyId: strategy.id,
				name: event.name,
			});
			await event.callback();
		}
	}

	const slice = host.latestSlice();
	if (slice.bars.size) {
		await strategy.onData(slice);
	} else {
		evaluationLogger.warn("slice_empty", {
			strategyId: strategy.id,
			asOf: new Date(host.time).toISOString(),
			subscriptions: host.subscriptions.map((subscription) => subscription.symbol),
		});
	}

	const evaluation: SnapshotEvaluation = {
		strategyId: strategy.id,
		asOf: new Date(host.time).toISOString(),
		subscriptions: [...host.subscriptions],
		warmUps: [...host.warmUps],
		scheduled: host.scheduled.map((event) => ({
			name: event.name,
			dateRule: event.dateRule,
			timeRule: event.timeRule,
			fired: fireScheduled,
		})),
		orders: [...host.orders],
		logs: [...host.logs],
	};

	evaluationLogger.info("evaluation_summary", {
		strategyId: evaluation.strategyId,
		asOf: evaluation.asOf,
		subscriptions: evaluation.subscriptions.length,
		scheduled: evaluation.scheduled.length,
		orders: evaluation.orders.length,
	});

	return evaluation;
};
