import { CcxtMarketDataClient, isCcxtExchangeId, CCXT_EXCHANGE_IDS } from "./ccxtClient";
import { JsonFileMarketDataClient } from "./fileClient";
import type { MarketDataClient } from "./types";

export interface MarketDataSourceOptions {
	dataDir?: string;
	exchange?: string;
}

/** A data directory wins over an exchange when both are given. */
export const createMarketDataClient = (
	options: MarketDataSourceOptions
): MarketDataClient => {
	if (options.dataDir) {
		return new JsonFileMarketDataClient({ dataDir: options.dataDir });
	}
	if (options.exchange) {
		const exchangeId = options.exchange.trim().toLowerCase();
		if (!isCcxtExchangeId(exchangeId)) {
			throw new Error(
				`Unsupported exchange: ${options.exchange}. Expected one of ${CCXT_EXCHANGE_IDS.join(", ")}`
			);
		}
		return new CcxtMarketDataClient({ exchangeId });
	}
	throw new Error("No market data source configured: set a data directory or an exchange id");
};
