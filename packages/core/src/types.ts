export type Direction = "LONG" | "SHORT";

export const DIRECTIONS: readonly Direction[] = ["LONG", "SHORT"];

export const oppositeDirection = (direction: Direction): Direction =>
	direction === "LONG" ? "SHORT" : "LONG";

/** +1 for longs, -1 for shorts. Multiply a price delta by it to get the favorable move. */
export const directionSign = (direction: Direction): 1 | -1 =>
	direction === "LONG" ? 1 : -1;

export interface Bar {
	instrument: string;
	timeframe: string;
	openTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	/** Set by the feed when bars before this one are missing. */
	gap?: boolean;
}

export const INDICATOR_KEYS = {
	emaFast: "ema_fast",
	emaSlow: "ema_slow",
	macdHistogram: "macd_histogram",
	waeExplosion: "wae_explosion",
	waeTrend: "wae_trend",
	waeDeadZone: "wae_dead_zone",
	rsi: "rsi",
	atr: "atr",
	sar: "sar",
} as const;

export type PatternZoneKind = "fvg" | "ob";

export interface IndicatorSnapshot {
	instrument: string;
	timeframe: string;
	/** openTime of the bar these values were computed on */
	openTime: number;
	values: Readonly<Record<string, number>>;
}

export const readIndicator = (
	snapshot: IndicatorSnapshot | null | undefined,
	key: string
): number | null => {
	if (!snapshot) {
		return null;
	}
	const value = snapshot.values[key];
	return typeof value === "number" && Number.isFinite(value) ? value : null;
};

export type TrendState = "BULLISH" | "BEARISH" | "NEUTRAL" | "UNKNOWN";

export type AlignmentVerdict = "BULLISH" | "BEARISH" | "NO_TRADE";

export const verdictForDirection = (direction: Direction): AlignmentVerdict =>
	direction === "LONG" ? "BULLISH" : "BEARISH";

export type HysteresisPhase = "IDLE" | "ARMED" | "TRIGGERED";

export type SignalReason =
	| "trend_alignment"
	| "rsi_trigger_long"
	| "rsi_trigger_short"
	| "wae_explosion"
	| "fvg_zone"
	| "order_block_zone"
	| "price_break";

export interface CandidateSignal {
	instrument: string;
	direction: Direction;
	sourceBarTime: number;
	/** Close of the source bar; used to size the entry. */
	referencePrice: number;
	reasons: SignalReason[];
}

export type IcebergSide = "bid" | "ask";

export interface IcebergLevel {
	side: IcebergSide;
	price: number;
	refills?: number;
}

export interface OrderbookSample {
	instrument: string;
	timestamp: number;
	/** Bid volume / ask volume over the sampled depth; null when the book was unavailable. */
	imbalance: number | null;
	icebergs: IcebergLevel[];
	bidVolume: number | null;
	askVolume: number | null;
}

export type ConfirmationOutcome =
	| "PENDING"
	| "CONFIRMED"
	| "REJECTED"
	| "TIMED_OUT";

export type PositionStatus =
	| "PENDING"
	| "OPEN"
	| "TRAILING_ACTIVE"
	| "CLOSING"
	| "CLOSED"
	| "REJECTED";

export const TERMINAL_POSITION_STATUSES: readonly PositionStatus[] = [
	"CLOSED",
	"REJECTED",
];

export const isTerminalStatus = (status: PositionStatus): boolean =>
	TERMINAL_POSITION_STATUSES.includes(status);

export type ExitReason =
	| "STOP_LOSS"
	| "TARGET_HIT"
	| "TREND_REVERSAL"
	| "TIME_EXIT"
	| "SHUTDOWN";

export interface ExitDecision {
	positionId: string;
	instrument: string;
	reason: ExitReason;
	requestedAt: number;
	/** Price the decision was taken at (stop, target or last close). */
	price: number;
}
