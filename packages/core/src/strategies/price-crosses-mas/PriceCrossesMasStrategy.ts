import { createLogger } from "../../utils/logger";
import { getZonedClock } from "../../time";
import { HostedAlgorithm } from "../../host/HostedAlgorithm";
import { isOrderOpen } from "../../host/types";
import type { AlgorithmHost, OrderTicket, Slice } from "../../host/types";
import { PRICE_CROSSES_MAS_ID, PriceCrossesMasConfig } from "./config";
import { CrossDecision, computeCrossIndicators, decidePriceCross } from "./entryLogic";

const logger = createLogger("strategy:price_crosses_mas");

export class PriceCrossesMasStrategy extends HostedAlgorithm {
	readonly id = PRICE_CROSSES_MAS_ID;
	private stopTicket: OrderTicket | null = null;

	constructor(private readonly config: PriceCrossesMasConfig) {
		super();
	}

	getStopTicket(): OrderTicket | null {
		return this.stopTicket;
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

		const history = await this.host.history(symbol, historyBars, resolution);
		const indicators = computeCrossIndicators(history, this.config);
		if (!indicators) {
			logger.debug("indicators_not_ready", { symbol, bars: history.length });
			return;
		}

		const { quantity } = this.host.portfolio.get(symbol);
		const decision = decidePriceCross(
			{
				clock: getZonedClock(bar.timestamp, exchangeTimeZone),
				close: bar.close,
				quantity,
				cash: this.host.portfolio.cash,
				indicators,
			},
			this.config
		);
		await this.execute(decision);

		logger.debug("cross_evaluated", {
			symbol,
			close: bar.close,
			quantity,
			...indicators,
			decision: decision.kind,
			reason: decision.reason,
		});
	}

	private async execute(decision: CrossDecision): Promise<void> {
		const { symbol } = this.config;
		switch (decision.kind) {
			case "enter": {
				await this.host.marketOrder(symbol, decision.quantity);
				this.host.log("Market order sent. Buy.", { quantity: decision.quantity });
				this.stopTicket = await this.host.stopMarketOrder(
					symbol,
					-decision.quantity,
					decision.stopPrice
				);
				this.host.log("Stop loss order sent.", { stopPrice: decision.stopPrice });
				return;
			}
			case "flatten":
			case "exit": {
				await this.cancelOpenStop();
				const { quantity } = this.host.portfolio.get(symbol);
				await this.host.marketOrder(symbol, -quantity);
				this.host.log("Market order sent. Sell.", { quantity, reason: decision.reason });
				return;
			}
			case "hold":
				return;
		}
	}

	private async cancelOpenStop(): Promise<void> {
		const ticket = this.stopTicket;
		if (!ticket || !isOrderOpen(ticket.status)) {
			return;
		}
		await ticket.cancel();
		this.host.log("Cancelling stop loss order.", { orderId: ticket.id });
	}
}
