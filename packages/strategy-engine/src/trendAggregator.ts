import {
	INDICATOR_KEYS,
	readIndicator,
	type AlignmentVerdict,
	type BarStore,
	type HistoryConfig,
	type IndicatorSnapshot,
	type TimeframeConfig,
	type TrendState,
} from "@momentumx/core";

export type TrendRole = "slow" | "middle" | "fast";

export interface TimeframeTrendInput {
	/** Most recent snapshots, oldest first */
	snapshots: readonly IndicatorSnapshot[];
	barCount: number;
}

export type TrendAggregatorInput = Record<TrendRole, TimeframeTrendInput>;

export interface TrendAssessment {
	verdict: AlignmentVerdict;
	states: Record<TrendRole, TrendState>;
}

const signToTrend = (value: number | null): TrendState => {
	if (value === null) {
		return "UNKNOWN";
	}
	if (value > 0) return "BULLISH";
	if (value < 0) return "BEARISH";
	return "NEUTRAL";
};

/**
 * EMA alignment with a widening (or at least stable) gap. Needs the two most
 * recent snapshots.
 */
export const slowTrend = (input: TimeframeTrendInput, minBars: number): TrendState => {
	if (input.barCount < minBars || input.snapshots.length < 2) {
		return "UNKNOWN";
	}
	const previous = input.snapshots[input.snapshots.length - 2];
	const latest = input.snapshots[input.snapshots.length - 1];
	const fast = readIndicator(latest, INDICATOR_KEYS.emaFast);
	const slow = readIndicator(latest, INDICATOR_KEYS.emaSlow);
	const prevFast = readIndicator(previous, INDICATOR_KEYS.emaFast);
	const prevSlow = readIndicator(previous, INDICATOR_KEYS.emaSlow);
	if (fast === null || slow === null || prevFast === null || prevSlow === null) {
		return "UNKNOWN";
	}

	const gap = fast - slow;
	const previousGap = prevFast - prevSlow;
	if (gap > 0 && gap >= previousGap) {
		return "BULLISH";
	}
	if (gap < 0 && gap <= previousGap) {
		return "BEARISH";
	}
	return "NEUTRAL";
};

const latestSignTrend = (
	input: TimeframeTrendInput,
	minBars: number,
	key: string
): TrendState => {
	if (input.barCount < minBars) {
		return "UNKNOWN";
	}
	return signToTrend(
		readIndicator(input.snapshots[input.snapshots.length - 1], key)
	);
};

export const middleTrend = (input: TimeframeTrendInput, minBars: number): TrendState =>
	latestSignTrend(input, minBars, INDICATOR_KEYS.macdHistogram);

export const fastTrend = (input: TimeframeTrendInput, minBars: number): TrendState =>
	latestSignTrend(input, minBars, INDICATOR_KEYS.waeTrend);

export const combineTrends = (
	states: Record<TrendRole, TrendState>
): AlignmentVerdict => {
	const all = [states.slow, states.middle, states.fast];
	if (all.every((state) => state === "BULLISH")) {
		return "BULLISH";
	}
	if (all.every((state) => state === "BEARISH")) {
		return "BEARISH";
	}
	return "NO_TRADE";
};

/**
 * Stateless multi-timeframe alignment. Recomputed on every primary bar and
 * never cached between ticks.
 */
export class TimeframeTrendAggregator {
	constructor(private readonly history: HistoryConfig) {}

	evaluate(input: TrendAggregatorInput): TrendAssessment {
		const states: Record<TrendRole, TrendState> = {
			slow: slowTrend(input.slow, this.history.minBars.slow),
			middle: middleTrend(input.middle, this.history.minBars.middle),
			fast: fastTrend(input.fast, this.history.minBars.fast),
		};
		return { verdict: combineTrends(states), states };
	}
}

/** Reads the three higher timeframes out of an instrument's bar store. */
export const collectTrendInput = (
	store: BarStore,
	timeframes: TimeframeConfig
): TrendAggregatorInput => ({
	slow: {
		snapshots: store.getSnapshots(timeframes.slow, 2),
		barCount: store.barCount(timeframes.slow),
	},
	middle: {
		snapshots: store.getSnapshots(timeframes.middle, 1),
		barCount: store.barCount(timeframes.middle),
	},
	fast: {
		snapshots: store.getSnapshots(timeframes.fast, 1),
		barCount: store.barCount(timeframes.fast),
	},
});
