import type { StrategyId } from "../strategies/ids";
import type { AlgorithmHost, Slice, TradingAlgorithm } from "./types";

export abstract class HostedAlgorithm implements TradingAlgorithm {
	private attachedHost: AlgorithmHost | null = null;

	abstract readonly id: StrategyId;

	initialize(host: AlgorithmHost): Promise<void> | void {
		this.attachedHost = host;
		return this.onInitialize(host);
	}

	protected abstract onInitialize(host: AlgorithmHost): Promise<void> | void;

	abstract onData(slice: Slice): Promise<void>;

	protected get host(): AlgorithmHost {
		if (!this.attachedHost) {
			throw new Error(
				`Strategy ${this.id} used before initialize() attached a host`
			);
		}
		return this.attachedHost;
	}
}
