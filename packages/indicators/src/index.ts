/**
 * Pure indicator math over oldest-first series. Functions return null (or an
 * empty series) until they have enough input.
 */
export { sma } from "./sma";
export { ema, emaSeries } from "./ema";
export { macd } from "./macd";
export type { MacdResult } from "./macd";
export { calculateATR, calculateATRSeries } from "./atr";
export type { AtrSmoothing } from "./atr";
export type { AtrInput } from "./atr";
export { rsi, rsiSeries } from "./rsi";
export { momentum } from "./momentum";
export type { MomentumMode } from "./momentum";
