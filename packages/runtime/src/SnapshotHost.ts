import {
	AlgorithmHost,
	Candle,
	Holding,
	OrderRequest,
	OrderStatus,
	OrderTicket,
	OrderType,
	PortfolioView,
	Resolution,
	ScheduledEvent,
	Slice,
	createLogger,
	resolutionToTimeframe,
} from "@quantscripts/core";
import type { HistorySource } from "./historySource";

const hostLogger = createLogger("runtime:snapshot_host");

export interface PortfolioPosition {
	symbol: string;
	quantity: number;
	/** Used when no candle prices the symbol. */
	price?: number;
}

export interface PortfolioSnapshot {
	cash: number;
	positions: PortfolioPosition[];
}

export interface Subscription {
	symbol: string;
	resolution: Resolution;
}

export interface WarmUpRequest {
	bars: number;
	resolution: Resolution;
}

export interface RecordedLog {
	time: number;
	message: string;
	data?: Record<string, unknown>;
}

export interface SnapshotHostOptions {
	asOf: number;
	portfolio: PortfolioSnapshot;
	history: HistorySource;
	/** Tags log lines and order ids. */
	label?: string;
}

class SnapshotOrderTicket implements OrderTicket {
	private currentStatus: OrderStatus = "submitted";

	constructor(
		readonly id: string,
		readonly symbol: string,
		readonly type: OrderType,
		readonly quantity: number,
		private readonly onCancel: (ticket: SnapshotOrderTicket) => void,
		readonly stopPrice?: number
	) {}

	get status(): OrderStatus {
		return this.currentStatus;
	}

	async cancel(): Promise<void> {
		if (this.currentStatus === "canceled") {
			return;
		}
		this.currentStatus = "canceled";
		this.onCancel(this);
	}
}

/**
 * Host frozen at a single instant. Answers history and portfolio questions
 * from the supplied data and records order requests; nothing is filled, so
 * cash and positions never change.
 */
export class SnapshotHost implements AlgorithmHost {
	readonly time: number;
	readonly isWarmingUp = false;
	readonly subscriptions: Subscription[] = [];
	readonly warmUps: WarmUpRequest[] = [];
	readonly scheduled: ScheduledEvent[] = [];
	readonly orders: OrderRequest[] = [];
	readonly logs: RecordedLog[] = [];

	private readonly historySource: HistorySource;
	private readonly label: string;
	private readonly cash: number;
	private readonly quantities = new Map<string, number>();
	private readonly prices = new Map<string, number>();
	private readonly latestBars = new Map<string, Candle>();
	private nextOrderId = 1;

	constructor(options: SnapshotHostOptions) {
		if (!Number.isFinite(options.asOf)) {
			throw new Error(`Snapshot time must be a finite timestamp, got ${options.asOf}`);
		}
		if (!Number.isFinite(options.portfolio.cash)) {
			throw new Error(`Portfolio cash must be a finite number, got ${options.portfolio.cash}`);
		}
		this.time = options.asOf;
		this.historySource = options.history;
		this.label = options.label ?? "snapshot";
		this.cash = options.portfolio.cash;
		for (const position of options.portfolio.positions) {
			this.quantities.set(
				position.symbol,
				(this.quantities.get(position.symbol) ?? 0) + position.quantity
			);
			if (position.price !== undefined) {
				this.prices.set(position.symbol, position.price);
			}
		}
	}

	get portfolio(): PortfolioView {
		const cash = this.cash;
		const toHolding = (symbol: string): Holding => {
			const quantity = this.quantities.get(symbol) ?? 0;
			return {
				symbol,
				quantity,
				price: this.prices.get(symbol) ?? 0,
				invested: quantity !== 0,
			};
		};
		const holdings = (): Holding[] => [...this.quantities.keys()].map(toHolding);
		return {
			cash,
			totalValue: holdings().reduce(
				(total, holding) => total + holding.quantity * holding.price,
				cash
			),
			get: toHolding,
			holdings,
		};
	}

	/**
	 * Prices every subscribed and held symbol from the latest candle opened at
	 * or before the snapshot time, even one still forming. Call after
	 * `initialize` registered subscriptions.
	 */
	async prepare(): Promise<void> {
		const targets = new Map<string, Resolution>();
		for (const subscription of this.subscriptions) {
			targets.set(subscription.symbol, subscription.resolution);
		}
		for (const symbol of this.quantities.keys()) {
			if (!targets.has(symbol)) {
				targets.set(symbol, "daily");
			}
		}

		for (const [symbol, resolution] of targets) {
			const latest = await this.historySource.fetchLatest(
				symbol,
				resolutionToTimeframe(resolution),
				this.time
			);
			if (!latest) {
				hostLogger.warn("price_unavailable", { label: this.label, symbol, resolution });
				continue;
			}
			this.prices.set(symbol, latest.close);
			if (this.subscriptions.some((subscription) => subscription.symbol === symbol)) {
				this.latestBars.set(symbol, latest);
			}
		}
	}

	latestSlice(): Slice {
		return { time: this.time, bars: new Map(this.latestBars) };
	}

	addSecurity(symbol: string, resolution: Resolution): void {
		if (this.subscriptions.some((subscription) => subscription.symbol === symbol)) {
			hostLogger.warn("duplicate_subscription", { label: this.label, symbol, resolution });
			return;
		}
		this.subscriptions.push({ symbol, resolution });
	}

	setWarmUp(bars: number, resolution: Resolution): void {
		this.warmUps.push({ bars, resolution });
	}

	history(symbol: string, bars: number, resolution: Resolution): Promise<Candle[]> {
		return this.historySource.fetchHistory(
			symbol,
			resolutionToTimeframe(resolution),
			bars,
			this.time
		);
	}

	schedule(event: ScheduledEvent): void {
		this.scheduled.push(event);
	}

	async setHoldings(symbol: string, weight: number): Promise<void> {
		if (!Number.isFinite(weight)) {
			throw new Error(`setHoldings weight for ${symbol} must be finite, got ${weight}`);
		}
		this.record({ kind: "set_holdings", symbol, weight });
	}

	async liquidate(symbol?: string): Promise<void> {
		this.record(symbol === undefined ? { kind: "liquidate" } : { kind: "liquidate", symbol });
	}

	async marketOrder(symbol: string, quantity: number): Promise<OrderTicket> {
		const orderId = this.allocateOrderId();
		this.record({ kind: "market", symbol, quantity, orderId });
		return new SnapshotOrderTicket(orderId, symbol, "market", quantity, this.recordCancel);
	}

	async stopMarketOrder(
		symbol: string,
		quantity: number,
		stopPrice: number
	): Promise<OrderTicket> {
		const orderId = this.allocateOrderId();
		this.record({ kind: "stop_market", symbol, quantity, stopPrice, orderId });
		return new SnapshotOrderTicket(
			orderId,
			symbol,
			"stop_market",
			quantity,
			this.recordCancel,
			stopPrice
		);
	}

	log(message: string, data?: Record<string, unknown>): void {
		this.logs.push(data ? { time: this.time, message, data } : { time: this.time, message });
		hostLogger.info("strategy_log", { label: this.label, message, ...(data ?? {}) });
	}

	private readonly recordCancel = (ticket: SnapshotOrderTicket): void => {
		this.record({ kind: "cancel", orderId: ticket.id });
	};

	private record(request: OrderRequest): void {
		this.orders.push(request);
		hostLogger.info("order_request", { label: this.label, ...request });
	}

	private allocateOrderId(): string {
		const id = `${this.label}-${this.nextOrderId}`;
		this.nextOrderId += 1;
		return id;
	}
}
