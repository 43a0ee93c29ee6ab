import {
	EnvConfig,
	StrategyId,
	createLogger,
	loadStrategy,
	resolveStrategySelection,
} from "@quantscripts/core";
import { MarketDataClient, createMarketDataClient } from "@quantscripts/data";
import {
	MarketDataHistorySource,
	PortfolioSnapshot,
	SnapshotEvaluation,
	SnapshotHost,
	evaluateSnapshot,
} from "@quantscripts/runtime";
import {
	ArgValue,
	readFlag,
	readNumberFlag,
	readStringFlag,
	readTimestampFlag,
} from "./cliArgs";
import { loadPortfolio } from "./portfolio";

const logger = createLogger("signal-cli");

export const DEFAULT_STRATEGY_ID: StrategyId = "dual_thrust";

export interface EvaluateRequest {
	strategyId: StrategyId;
	profile?: string;
	configPath?: string;
	client: MarketDataClient;
	asOf: number;
	portfolio: PortfolioSnapshot;
	fireScheduled: boolean;
}

export const runEvaluation = async (request: EvaluateRequest): Promise<SnapshotEvaluation> => {
	const { strategy } = loadStrategy({
		strategyId: request.strategyId,
		profile: request.profile,
		configPath: request.configPath,
	});
	const host = new SnapshotHost({
		asOf: request.asOf,
		portfolio: request.portfolio,
		history: new MarketDataHistorySource({ client: request.client }),
		label: request.strategyId,
	});
	return evaluateSnapshot({ strategy, host, fireScheduled: request.fireScheduled });
};

export const resolveStrategyId = (requested: string | undefined, env: EnvConfig): StrategyId => {
	const selection = resolveStrategySelection({
		requestedValue: requested,
		envValue: env.defaultStrategy,
		defaultStrategyId: DEFAULT_STRATEGY_ID,
	});
	for (const invalid of selection.invalidSources) {
		logger.warn("strategy_selection_invalid", {
			source: invalid.source,
			value: invalid.value,
			fallback: selection.resolvedStrategyId,
		});
	}
	return selection.resolvedStrategyId;
};

export const buildEvaluateRequest = (
	flags: Record<string, ArgValue>,
	env: EnvConfig,
	now = Date.now()
): EvaluateRequest => {
	const strategyId = resolveStrategyId(readStringFlag(flags, "strategy"), env);
	const client = createMarketDataClient({
		dataDir: readStringFlag(flags, "dataDir") ?? env.dataDir,
		exchange: readStringFlag(flags, "exchange") ?? env.dataExchange,
	});
	return {
		strategyId,
		profile: readStringFlag(flags, "profile"),
		configPath: readStringFlag(flags, "config"),
		client,
		asOf: readTimestampFlag(flags, "asOf") ?? now,
		portfolio: loadPortfolio({
			portfolioPath: readStringFlag(flags, "portfolio"),
			cash: readNumberFlag(flags, "cash"),
		}),
		fireScheduled: !readFlag(flags, "skipScheduled"),
	};
};
