import type { Candle, Resolution } from "../types";
import type { StrategyId } from "../strategies/ids";

/**
 * Contract between a strategy and the framework that runs it. The host owns
 * market data, order execution, portfolio accounting and the clock; strategies
 * only read from it and ask it to trade.
 */

export interface Slice {
	time: number;
	bars: ReadonlyMap<string, Candle>;
}

export interface Holding {
	symbol: string;
	quantity: number;
	/** Last known price; 0 when the host has never priced the symbol. */
	price: number;
	invested: boolean;
}

export interface PortfolioView {
	readonly cash: number;
	readonly totalValue: number;
	/** Unknown symbols resolve to a zero holding. */
	get(symbol: string): Holding;
	holdings(): Holding[];
}

export type DateRule =
	| { kind: "every_day"; symbol: string }
	| { kind: "month_start"; symbol: string };

export type TimeRule =
	| { kind: "after_market_open"; symbol: string; minutes: number }
	| { kind: "before_market_close"; symbol: string; minutes: number };

export interface ScheduledEvent {
	name: string;
	dateRule: DateRule;
	timeRule: TimeRule;
	callback: () => Promise<void> | void;
}

export type OrderType = "market" | "stop_market";

export type OrderStatus =
	| "new"
	| "submitted"
	| "partially_filled"
	| "filled"
	| "canceled"
	| "cancel_pending"
	| "invalid";

const OPEN_ORDER_STATUSES: ReadonlySet<OrderStatus> = new Set<OrderStatus>([
	"new",
	"submitted",
	"partially_filled",
	"cancel_pending",
]);

export const isOrderOpen = (status: OrderStatus): boolean =>
	OPEN_ORDER_STATUSES.has(status);

export interface OrderTicket {
	readonly id: string;
	readonly symbol: string;
	readonly type: OrderType;
	readonly quantity: number;
	readonly stopPrice?: number;
	readonly status: OrderStatus;
	cancel(): Promise<void>;
}

export type OrderRequest =
	| { kind: "set_holdings"; symbol: string; weight: number }
	| { kind: "liquidate"; symbol?: string }
	| { kind: "market"; symbol: string; quantity: number; orderId: string }
	| {
			kind: "stop_market";
			symbol: string;
			quantity: number;
			stopPrice: number;
			orderId: string;
	  }
	| { kind: "cancel"; orderId: string };

export interface AlgorithmHost {
	/** Current algorithm time (UTC epoch ms). */
	readonly time: number;
	readonly isWarmingUp: boolean;
	readonly portfolio: PortfolioView;
	addSecurity(symbol: string, resolution: Resolution): void;
	setWarmUp(bars: number, resolution: Resolution): void;
	/** Most recent `bars` completed bars at or before `time`, oldest first. */
	history(symbol: string, bars: number, resolution: Resolution): Promise<Candle[]>;
	schedule(event: ScheduledEvent): void;
	/** `weight` is a signed fraction of total portfolio value. */
	setHoldings(symbol: string, weight: number): Promise<void>;
	/** Closes one position, or every position when no symbol is given. */
	liquidate(symbol?: string): Promise<void>;
	marketOrder(symbol: string, quantity: number): Promise<OrderTicket>;
	stopMarketOrder(
		symbol: string,
		quantity: number,
		stopPrice: number
	): Promise<OrderTicket>;
	log(message: string, data?: Record<string, unknown>): void;
}

export interface TradingAlgorithm {
	readonly id: StrategyId;
	initialize(host: AlgorithmHost): Promise<void> | void;
	onData(slice: Slice): Promise<void>;
}

export type OrderAction =
	| { kind: "liquidate" }
	| { kind: "set_holdings"; weight: number };
