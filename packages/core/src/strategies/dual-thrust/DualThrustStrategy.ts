import { createLogger } from "../../utils/logger";
import { HostedAlgorithm } from "../../host/HostedAlgorithm";
import { applyOrderActions } from "../../host/applyOrderActions";
import type { AlgorithmHost, Slice } from "../../host/types";
import { DUAL_THRUST_ID, DualThrustConfig } from "./config";
import {
	DualThrustTriggers,
	computeThrustRange,
	computeTriggers,
	decideDualThrust,
} from "./entryLogic";

const logger = createLogger("strategy:dual_thrust");

export const DUAL_THRUST_SIGNAL_EVENT = "dual_thrust_signal";

export class DualThrustStrategy extends HostedAlgorithm {
	readonly id = DUAL_THRUST_ID;
	private triggers: DualThrustTriggers | null = null;

	constructor(private readonly config: DualThrustConfig) {
		super();
	}

	getTriggers(): DualThrustTriggers | null {
		return this.triggers;
	}

	protected onInitialize(host: AlgorithmHost): void {
		const { symbol } = this.config;
		host.addSecurity(symbol, this.config.resolution);
		host.schedule({
			name: DUAL_THRUST_SIGNAL_EVENT,
			dateRule: { kind: "every_day", symbol },
			timeRule: { kind: "after_market_open", symbol, minutes: 0 },
			callback: () => this.setSignal(),
		});
	}

	async setSignal(): Promise<void> {
		const { symbol, lookbackDays, k1, k2 } = this.config;
		const history = await this.host.history(symbol, lookbackDays, "daily");
		const range = computeThrustRange(history);
		const currentOpen = this.host.portfolio.get(symbol).price;
		this.triggers = range ? computeTriggers(currentOpen, range.range, k1, k2) : null;

		if (!this.triggers) {
			logger.warn("triggers_unavailable", {
				symbol,
				bars: history.length,
				currentOpen,
			});
			return;
		}
		logger.debug("triggers_computed", {
			symbol,
			bars: history.length,
			...range,
			...this.triggers,
		});
	}

	async onData(slice: Slice): Promise<void> {
		if (this.host.isWarmingUp) {
			return;
		}
		const { symbol } = this.config;
		const bar = slice.bars.get(symbol);
		if (!bar || !this.triggers) {
			return;
		}

		const holdings = this.host.portfolio.get(symbol).quantity;
		const decision = decideDualThrust(
			bar.close,
			holdings,
			this.triggers,
			this.config.entryMode,
			this.config.targetWeight
		);
		await applyOrderActions(this.host, symbol, decision.actions);

		const { currentOpen, buyTrigger, sellTrigger } = this.triggers;
		this.host.log(`open: ${currentOpen} buy: ${buyTrigger} sell: ${sellTrigger}`, {
			price: bar.close,
			holdings,
			side: decision.side,
			reason: decision.reason,
		});
	}
}
