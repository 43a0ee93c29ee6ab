import { createLogger } from "../../utils/logger";
import { HostedAlgorithm } from "../../host/HostedAlgorithm";
import type { AlgorithmHost, DateRule, Slice } from "../../host/types";
import { MOMENTUM_ROTATION_ID, MomentumRotationConfig } from "./config";
import {
	RotationPlan,
	momentumScore,
	newcomerWeight,
	planRotation,
	rankByMomentum,
} from "./entryLogic";

const logger = createLogger("strategy:momentum_rotation");

export const MOMENTUM_REBALANCE_EVENT = "momentum_rebalance";

export class MomentumRotationStrategy extends HostedAlgorithm {
	readonly id = MOMENTUM_ROTATION_ID;

	constructor(private readonly config: MomentumRotationConfig) {
		super();
	}

	protected onInitialize(host: AlgorithmHost): void {
		const { universe, scheduleSymbol, momentumPeriod, rebalance } = this.config;
		host.setWarmUp(momentumPeriod, "daily");
		for (const symbol of universe) {
			host.addSecurity(symbol, "daily");
		}
		const dateRule: DateRule =
			rebalance === "monthly"
				? { kind: "month_start", symbol: scheduleSymbol }
				: { kind: "every_day", symbol: scheduleSymbol };
		host.schedule({
			name: MOMENTUM_REBALANCE_EVENT,
			dateRule,
			timeRule: { kind: "after_market_open", symbol: scheduleSymbol, minutes: 0 },
			callback: () => this.rebalance().then(() => undefined),
		});
	}

	async rebalance(): Promise<RotationPlan | null> {
		if (this.host.isWarmingUp) {
			return null;
		}
		const { universe, momentumPeriod, momentumMode, topCount, sizing } = this.config;

		const scores = new Map<string, number | null>();
		for (const symbol of universe) {
			const bars = await this.host.history(symbol, momentumPeriod + 1, "daily");
			scores.set(symbol, momentumScore(bars, momentumPeriod, momentumMode));
		}
		const top = rankByMomentum(scores, topCount);
		const invested = this.host.portfolio
			.holdings()
			.filter((holding) => holding.invested)
			.map((holding) => holding.symbol);
		const plan = planRotation(
			top.map((entry) => entry.symbol),
			invested
		);

		const { portfolio } = this.host;
		const proceeds = plan.liquidate.reduce((total, symbol) => {
			const holding = portfolio.get(symbol);
			return total + holding.quantity * holding.price;
		}, 0);
		const weight = newcomerWeight(
			sizing,
			plan.acquire.length,
			portfolio.cash + proceeds,
			portfolio.totalValue
		);

		for (const symbol of plan.liquidate) {
			await this.host.liquidate(symbol);
		}
		if (weight > 0) {
			for (const symbol of plan.acquire) {
				await this.host.setHoldings(symbol, weight);
			}
		}

		logger.info("rotation_planned", {
			ranked: top,
			unranked: [...scores].filter(([, score]) => score === null).map(([symbol]) => symbol),
			liquidate: plan.liquidate,
			acquire: plan.acquire,
			proceeds,
			weight,
		});
		this.host.log(
			`rebalance: top ${top.map((entry) => entry.symbol).join(",")} sell ${plan.liquidate.length} buy ${plan.acquire.length}`,
			{ weight }
		);
		return plan;
	}

	async onData(_slice: Slice): Promise<void> {
		// rebalancing happens only in the scheduled callback
	}
}
