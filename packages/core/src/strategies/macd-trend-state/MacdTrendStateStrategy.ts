import { macd } from "@quantscripts/indicators";
import { createLogger } from "../../utils/logger";
import { getZonedClock } from "../../time";
import { HostedAlgorithm } from "../../host/HostedAlgorithm";
import { applyOrderActions } from "../../host/applyOrderActions";
import type { AlgorithmHost, Slice } from "../../host/types";
import { MACD_TREND_STATE_ID, MacdTrendStateConfig } from "./config";
import { TrendState, nextTrendState, trendStateActions } from "./entryLogic";

const logger = createLogger("strategy:macd_trend_state");

export class MacdTrendStateStrategy extends HostedAlgorithm {
	readonly id = MACD_TREND_STATE_ID;
	private trendState: TrendState = 0;
	private previousHistogram = 0;
	private beforePreviousHistogram = 0;
	private lastEvaluatedDay: string | null = null;

	constructor(private readonly config: MacdTrendStateConfig) {
		super();
	}

	getTrendState(): TrendState {
		return this.trendState;
	}

	protected onInitialize(host: AlgorithmHost): void {
		const { symbol, resolution, warmupBars } = this.config;
		host.setWarmUp(warmupBars, resolution);
		host.addSecurity(symbol, resolution);
	}

	async onData(slice: Slice): Promise<void> {
		if (this.host.isWarmingUp) {
			return;
		}
		const { symbol, resolution, historyBars, exchangeTimeZone } = this.config;
		const bar = slice.bars.get(symbol);
		if (!bar) {
			return;
		}
		const { dateKey } = getZonedClock(bar.timestamp, exchangeTimeZone);
		if (dateKey === this.lastEvaluatedDay) {
			return;
		}

		const history = await this.host.history(symbol, historyBars, resolution);
		const { histogram } = macd(
			history.map((candle) => candle.close),
			this.config.fastPeriod,
			this.config.slowPeriod,
			this.config.signalPeriod
		);
		if (histogram === null) {
			logger.debug("macd_not_ready", { symbol, bars: history.length });
			return;
		}

		const previousState = this.trendState;
		this.trendState = nextTrendState(previousState, {
			histogram,
			previous: this.previousHistogram,
			beforePrevious: this.beforePreviousHistogram,
		});
		const quantity = this.host.portfolio.get(symbol).quantity;
		const actions = trendStateActions(this.trendState, quantity);
		await applyOrderActions(this.host, symbol, actions);

		this.host.log(`trend state ${previousState} -> ${this.trendState}`, {
			histogram,
			quantity,
			actions: actions.length,
		});

		this.lastEvaluatedDay = dateKey;
		this.beforePreviousHistogram = this.previousHistogram;
		this.previousHistogram = histogram;
	}
}
