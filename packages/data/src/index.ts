export * from "./types";
export { MarketDataUnavailableError } from "./errors";
export { fetchHistoricalCandles } from "./historical";
export {
	CcxtMarketDataClient,
	CCXT_EXCHANGE_IDS,
	isCcxtExchangeId,
} from "./ccxtClient";
export type { CcxtExchangeId, CcxtMarketDataClientOptions } from "./ccxtClient";
export {
	JsonFileMarketDataClient,
	parseCandleRows,
	symbolToFileStem,
} from "./fileClient";
export type { JsonFileMarketDataClientOptions } from "./fileClient";
export { createMarketDataClient } from "./createMarketDataClient";
export type { MarketDataSourceOptions } from "./createMarketDataClient";
export { ccxtRowToCandle } from "./utils/ccxtMapper";
