export type MomentumMode = "absolute" | "percent";

/**
 * Trailing price change over `period` bars: the latest value minus the value
 * `period` bars earlier, or that change as a fraction of the earlier value.
 */
export function momentum(
	values: number[],
	period: number,
	mode: MomentumMode = "absolute"
): number | null {
	if (period <= 0 || values.length < period + 1) {
		return null;
	}
	const latest = values[values.length - 1];
	const base = values[values.length - 1 - period];
	if (mode === "absolute") {
		return latest - base;
	}
	return base === 0 ? null : (latest - base) / base;
}
