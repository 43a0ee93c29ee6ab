import type { AlgorithmHost, OrderAction } from "./types";

export const applyOrderActions = async (
	host: AlgorithmHost,
	symbol: string,
	actions: readonly OrderAction[]
): Promise<void> => {
	// sequential: a liquidate must settle before the new target is set
	for (const action of actions) {
		if (action.kind === "liquidate") {
			await host.liquidate(symbol);
		} else {
			await host.setHoldings(symbol, action.weight);
		}
	}
};
