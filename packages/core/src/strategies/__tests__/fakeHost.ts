import type { Candle, Resolution } from "../../types";
import type {
	AlgorithmHost,
	Holding,
	OrderRequest,
	OrderStatus,
	OrderTicket,
	OrderType,
	PortfolioView,
	ScheduledEvent,
} from "../../host/types";

interface FakePosition {
	quantity: number;
	price: number;
}

export interface FakeHostOptions {
	time?: number;
	cash?: number;
	warmingUp?: boolean;
	positions?: Record<string, FakePosition>;
	prices?: Record<string, number>;
	history?: Record<string, Candle[]>;
}

class FakeTicket implements OrderTicket {
	status: OrderStatus = "submitted";

	constructor(
		readonly id: string,
		readonly symbol: string,
		readonly type: OrderType,
		readonly quantity: number,
		private readonly onCancel: (ticket: FakeTicket) => void,
		readonly stopPrice?: number
	) {}

	async cancel(): Promise<void> {
		this.status = "canceled";
		this.onCancel(this);
	}
}

/** In-memory host: answers from fixed data and records every request. */
export class FakeHost implements AlgorithmHost {
	time: number;
	isWarmingUp: boolean;
	readonly requests: OrderRequest[] = [];
	readonly subscriptions: Array<{ symbol: string; resolution: Resolution }> = [];
	readonly warmUps: Array<{ bars: number; resolution: Resolution }> = [];
	readonly scheduled: ScheduledEvent[] = [];
	readonly logs: string[] = [];
	readonly historyCalls: Array<{ symbol: string; bars: number; resolution: Resolution }> = [];
	private readonly positions = new Map<string, FakePosition>();
	private readonly bars: Record<string, Candle[]>;
	private cash: number;
	private nextOrderId = 1;

	constructor(options: FakeHostOptions = {}) {
		this.time = options.time ?? Date.UTC(2018, 8, 6, 14, 0);
		this.isWarmingUp = options.warmingUp ?? false;
		this.cash = options.cash ?? 10_000;
		this.bars = options.history ?? {};
		for (const [symbol, position] of Object.entries(options.positions ?? {})) {
			this.positions.set(symbol, { ...position });
		}
		for (const [symbol, price] of Object.entries(options.prices ?? {})) {
			const existing = this.positions.get(symbol);
			this.positions.set(symbol, { quantity: existing?.quantity ?? 0, price });
		}
	}

	get portfolio(): PortfolioView {
		const toHolding = (symbol: string, position?: FakePosition): Holding => ({
			symbol,
			quantity: position?.quantity ?? 0,
			price: position?.price ?? 0,
			invested: (position?.quantity ?? 0) !== 0,
		});
		const positions = this.positions;
		const cash = this.cash;
		return {
			cash,
			totalValue:
				cash +
				[...positions.values()].reduce((sum, p) => sum + p.quantity * p.price, 0),
			get: (symbol) => toHolding(symbol, positions.get(symbol)),
			holdings: () =>
				[...positions.entries()].map(([symbol, position]) =>
					toHolding(symbol, position)
				),
		};
	}

	setCash(cash: number): void {
		this.cash = cash;
	}

	setPosition(symbol: string, quantity: number, price: number): void {
		this.positions.set(symbol, { quantity, price });
	}

	addSecurity(symbol: string, resolution: Resolution): void {
		this.subscriptions.push({ symbol, resolution });
	}

	setWarmUp(bars: number, resolution: Resolution): void {
		this.warmUps.push({ bars, resolution });
	}

	async history(symbol: string, bars: number, resolution: Resolution): Promise<Candle[]> {
		this.historyCalls.push({ symbol, bars, resolution });
		const series = this.bars[symbol] ?? [];
		return series.slice(Math.max(0, series.length - bars));
	}

	schedule(event: ScheduledEvent): void {
		this.scheduled.push(event);
	}

	async setHoldings(symbol: string, weight: number): Promise<void> {
		this.requests.push({ kind: "set_holdings", symbol, weight });
	}

	async liquidate(symbol?: string): Promise<void> {
		this.requests.push(symbol === undefined ? { kind: "liquidate" } : { kind: "liquidate", symbol });
	}

	async marketOrder(symbol: string, quantity: number): Promise<OrderTicket> {
		const orderId = this.allocateOrderId();
		this.requests.push({ kind: "market", symbol, quantity, orderId });
		return new FakeTicket(orderId, symbol, "market", quantity, this.recordCancel);
	}

	async stopMarketOrder(
		symbol: string,
		quantity: number,
		stopPrice: number
	): Promise<OrderTicket> {
		const orderId = this.allocateOrderId();
		this.requests.push({ kind: "stop_market", symbol, quantity, stopPrice, orderId });
		return new FakeTicket(
			orderId,
			symbol,
			"stop_market",
			quantity,
			this.recordCancel,
			stopPrice
		);
	}

	log(message: string): void {
		this.logs.push(message);
	}

	private readonly recordCancel = (ticket: FakeTicket): void => {
		this.requests.push({ kind: "cancel", orderId: ticket.id });
	};

	private allocateOrderId(): string {
		const id = `order-${this.nextOrderId}`;
		this.nextOrderId += 1;
		return id;
	}
}

export const makeBar = (
	symbol: string,
	timestamp: number,
	close: number,
	overrides: Partial<Candle> = {}
): Candle => ({
	symbol,
	timeframe: "1m",
	timestamp,
	open: close,
	high: close,
	low: close,
	close,
	volume: 1_000,
	...overrides,
});
