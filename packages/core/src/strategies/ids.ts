export const STRATEGY_IDS = [
	"dual_thrust",
	"momentum_rotation",
	"price_crosses_mas",
	"macd_trend_state",
] as const;

export type StrategyId = (typeof STRATEGY_IDS)[number];

export const isStrategyId = (value: unknown): value is StrategyId => {
	return STRATEGY_IDS.some((id) => id === value);
};
