import { expectRecord, isRecord, readJsonFile, readNumber, readString } from "@quantscripts/core";
import type { PortfolioPosition, PortfolioSnapshot } from "@quantscripts/runtime";

export const DEFAULT_CASH = 100_000;

/**
 * Portfolio files look like
 * `{ "cash": 10000, "positions": [{ "symbol": "IVV", "quantity": 5, "price": 410 }] }`;
 * `price` is optional and only used when no candle prices the symbol.
 */
export const parsePortfolioSnapshot = (raw: unknown, source: string): PortfolioSnapshot => {
	if (!isRecord(raw)) {
		throw new Error(`Portfolio ${source} must be a JSON object`);
	}
	const cash = readNumber(raw, "cash", source, { fallback: DEFAULT_CASH });
	const entries = raw.positions ?? [];
	if (!Array.isArray(entries)) {
		throw new Error(`Field positions in ${source} must be an array`);
	}
	const positions = entries.map((entry, index): PortfolioPosition => {
		const label = `${source} positions[${index}]`;
		const record = expectRecord(entry, label);
		const position: PortfolioPosition = {
			symbol: readString(record, "symbol", label),
			quantity: readNumber(record, "quantity", label),
		};
		if (record.price !== undefined) {
			position.price = readNumber(record, "price", label, { min: 0 });
		}
		return position;
	});
	return { cash, positions };
};

export const loadPortfolio = (options: {
	portfolioPath?: string;
	cash?: number;
}): PortfolioSnapshot => {
	const snapshot = options.portfolioPath
		? parsePortfolioSnapshot(readJsonFile(options.portfolioPath), options.portfolioPath)
		: { cash: DEFAULT_CASH, positions: [] };
	return options.cash === undefined ? snapshot : { ...snapshot, cash: options.cash };
};
