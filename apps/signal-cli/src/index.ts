#!/usr/bin/env node

import process from "node:process";
import { createLogger, listStrategyDefinitions, loadEnvConfig } from "@quantscripts/core";
import { parseCliArgs, readFlag, readStringFlag } from "./cliArgs";
import { buildEvaluateRequest, runEvaluation } from "./evaluate";
import { formatEvaluation, formatStrategyTable, summarizeStrategies } from "./format";

const logger = createLogger("signal-cli");

const USAGE = `Usage:
  signal-cli list [--json]
  signal-cli evaluate [options]

Evaluate options:
  --strategy <id>          Strategy id (defaults to DEFAULT_STRATEGY, then dual_thrust)
  --profile <name>         Strategy profile under configs/strategies
  --config <path>          Strategy profile file; wins over --profile
  --dataDir <dir>          Directory of JSON candle files (defaults to DATA_DIR)
  --exchange <id>          ccxt exchange for candles (defaults to DATA_EXCHANGE)
  --asOf <iso>             Snapshot time (defaults to now)
  --portfolio <path>       JSON file with cash and positions
  --cash <usd>             Override portfolio cash
  --skipScheduled          Do not fire scheduled callbacks
  --envPath <path>         Custom .env path
  --json                   Print the full evaluation as JSON
  --help                   Show this message
`;

const runList = (json: boolean): void => {
	const summary = summarizeStrategies(listStrategyDefinitions());
	if (json) {
		console.log(JSON.stringify(summary, null, 2));
		return;
	}
	console.log("Registered strategies:\n");
	console.log(formatStrategyTable(summary));
	console.log("\nUse --json to export machine-readable output.");
};

const main = async (): Promise<void> => {
	const { positionals, flags } = parseCliArgs(process.argv.slice(2));
	const command = positionals[0];
	if (readFlag(flags, "help") || !command) {
		console.log(USAGE);
		return;
	}

	if (command === "list") {
		runList(readFlag(flags, "json"));
		return;
	}

	if (command !== "evaluate") {
		throw new Error(`Unknown command: ${command}. Expected list or evaluate`);
	}

	const env = loadEnvConfig(readStringFlag(flags, "envPath"));
	const request = buildEvaluateRequest(flags, env);
	logger.info("evaluation_started", {
		strategyId: request.strategyId,
		asOf: new Date(request.asOf).toISOString(),
		cash: request.portfolio.cash,
		positions: request.portfolio.positions.length,
	});
	const evaluation = await runEvaluation(request);
	console.log(readFlag(flags, "json") ? JSON.stringify(evaluation, null, 2) : formatEvaluation(evaluation));
};

main().catch((error) => {
	logger.error("cli_unhandled_error", {
		message: error instanceof Error ? error.message : String(error),
		stack: process.env.DEBUG && error instanceof Error ? error.stack : undefined,
	});
	process.exitCode = 1;
});
