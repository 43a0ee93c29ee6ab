import type { OrderRequest, StrategyRegistryEntry } from "@quantscripts/core";
import type { SnapshotEvaluation } from "@quantscripts/runtime";

export interface StrategySummaryRow {
	id: string;
	name: string;
}

export const summarizeStrategies = (
	definitions: readonly StrategyRegistryEntry[]
): StrategySummaryRow[] =>
	definitions.map((entry) => ({ id: entry.id, name: entry.manifest.name }));

const pad = (value: string, width: number): string => value.padEnd(width, " ");

export const formatStrategyTable = (rows: StrategySummaryRow[]): string => {
	if (!rows.length) {
		return "(no strategies registered)";
	}
	const idWidth = Math.max("Strategy ID".length, ...rows.map((row) => row.id.length));
	const nameWidth = Math.max("Name".length, ...rows.map((row) => row.name.length));
	const header = `${pad("Strategy ID", idWidth)} | ${pad("Name", nameWidth)}`;
	const divider = `${"-".repeat(idWidth)}-+-${"-".repeat(nameWidth)}`;
	const body = rows
		.map((row) => `${pad(row.id, idWidth)} | ${pad(row.name, nameWidth)}`)
		.join("\n");
	return `${header}\n${divider}\n${body}`;
};

export const formatOrder = (order: OrderRequest): string => {
	switch (order.kind) {
		case "set_holdings":
			return `SET_HOLDINGS ${order.symbol} ${order.weight}`;
		case "liquidate":
			return order.symbol ? `LIQUIDATE ${order.symbol}` : "LIQUIDATE ALL";
		case "market":
			return `MARKET ${order.symbol} ${order.quantity} (${order.orderId})`;
		case "stop_market":
			return `STOP_MARKET ${order.symbol} ${order.quantity} @ ${order.stopPrice} (${order.orderId})`;
		case "cancel":
			return `CANCEL ${order.orderId}`;
	}
};

export const formatEvaluation = (evaluation: SnapshotEvaluation): string => {
	const lines = [
		`Strategy: ${evaluation.strategyId}`,
		`As of: ${evaluation.asOf}`,
		`Subscriptions: ${
			evaluation.subscriptions
				.map((subscription) => `${subscription.symbol} (${subscription.resolution})`)
				.join(", ") || "none"
		}`,
	];
	for (const event of evaluation.scheduled) {
		lines.push(`Scheduled: ${event.name}${event.fired ? "" : " (not fired)"}`);
	}
	lines.push("---- Orders ----");
	lines.push(...(evaluation.orders.length ? evaluation.orders.map(formatOrder) : ["(none)"]));
	if (evaluation.logs.length) {
		lines.push("---- Log ----");
		lines.push(...evaluation.logs.map((entry) => entry.message));
	}
	return lines.join("\n");
};
