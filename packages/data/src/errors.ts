/** The source holds no candles for this symbol and timeframe. */
export class MarketDataUnavailableError extends Error {
	constructor(
		message: string,
		readonly symbol: string,
		readonly timeframe: string
	) {
		super(message);
		this.name = "MarketDataUnavailableError";
	}
}
