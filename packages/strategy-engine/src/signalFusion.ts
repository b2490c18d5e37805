import {
	createLogger,
	DIRECTIONS,
	directionSign,
	INDICATOR_KEYS,
	readIndicator,
	verdictForDirection,
	type AlignmentVerdict,
	type Bar,
	type CandidateSignal,
	type Direction,
	type HysteresisPhase,
	type IndicatorSnapshot,
	type InstrumentSpec,
	type SignalConfig,
	type SignalReason,
} from "@momentumx/core";
import { DirectionalHysteresis, type HysteresisState } from "./hysteresis";
import { findTouchedZone, type PatternZone } from "./patternZones";

const logger = createLogger("signal_fusion");

export interface SignalFusionInput {
	bar: Bar;
	/** Snapshot computed on `bar` */
	snapshot: IndicatorSnapshot | undefined;
	previousBar: Bar | undefined;
	verdict: AlignmentVerdict;
	/** Latest snapshot of the pattern timeframe */
	patterns: IndicatorSnapshot | undefined;
	/** Reason new entries are blocked this tick, if any */
	entryBlock?: string | null;
	/** Blocks that only apply to one direction */
	directionBlocks?: Partial<Record<Direction, string>>;
}

export interface GateReport {
	trend: boolean;
	phase: HysteresisPhase;
	explosion: boolean;
	zone: PatternZone | null;
	priceBreak: boolean;
	entryBlock: string | null;
}

export type SignalFusionResult =
	| { status: "data_unavailable"; missing: string }
	| {
			status: "evaluated";
			candidates: CandidateSignal[];
			gates: Record<Direction, GateReport>;
	  };

export const explosionGate = (
	snapshot: IndicatorSnapshot | undefined,
	direction: Direction,
	sensitivity: number
): boolean => {
	const explosion = readIndicator(snapshot, INDICATOR_KEYS.waeExplosion);
	const trend = readIndicator(snapshot, INDICATOR_KEYS.waeTrend);
	const deadZone = readIndicator(snapshot, INDICATOR_KEYS.waeDeadZone);
	if (explosion === null || trend === null || deadZone === null) {
		return false;
	}
	return (
		explosion > Math.max(sensitivity, deadZone) &&
		Math.sign(trend) === directionSign(direction)
	);
};

export const priceBreakGate = (
	bar: Bar,
	previousBar: Bar | undefined,
	direction: Direction
): boolean => {
	if (!previousBar) {
		return false;
	}
	return direction === "LONG"
		? bar.close > previousBar.high
		: bar.close < previousBar.low;
};

/**
 * Per-instrument entry signal fusion. Owns both hysteresis machines and
 * emits a candidate only when every gate holds on the same primary bar.
 */
export class SignalFusionEngine {
	private readonly hysteresis: Record<Direction, DirectionalHysteresis>;

	constructor(
		private readonly instrument: InstrumentSpec,
		private readonly config: SignalConfig
	) {
		this.hysteresis = {
			LONG: new DirectionalHysteresis("LONG", {
				arm: config.rsiOversold,
				trigger: config.rsiLongTrigger,
				expiryBars: config.armExpiryBars,
			}),
			SHORT: new DirectionalHysteresis("SHORT", {
				arm: config.rsiOverbought,
				trigger: config.rsiShortTrigger,
				expiryBars: config.armExpiryBars,
			}),
		};
	}

	evaluate(input: SignalFusionInput): SignalFusionResult {
		const rsi = readIndicator(input.snapshot, INDICATOR_KEYS.rsi);
		if (rsi === null) {
			logger.debug("signal_data_unavailable", {
				instrument: this.instrument.symbol,
				openTime: input.bar.openTime,
				missing: INDICATOR_KEYS.rsi,
			});
			return { status: "data_unavailable", missing: INDICATOR_KEYS.rsi };
		}

		const tolerance = this.config.zoneToleranceTicks * this.instrument.tickSize;
		const assess = (direction: Direction): GateReport => ({
			trend: input.verdict === verdictForDirection(direction),
			phase: this.hysteresis[direction].update(rsi),
			explosion: explosionGate(
				input.snapshot,
				direction,
				this.config.explosionSensitivity
			),
			zone: findTouchedZone(input.bar, input.patterns, direction, tolerance),
			priceBreak: priceBreakGate(input.bar, input.previousBar, direction),
			entryBlock: input.entryBlock ?? input.directionBlocks?.[direction] ?? null,
		});
		const gates: Record<Direction, GateReport> = {
			LONG: assess("LONG"),
			SHORT: assess("SHORT"),
		};

		const candidates: CandidateSignal[] = [];
		for (const direction of DIRECTIONS) {
			const report = gates[direction];
			if (
				report.trend &&
				report.phase === "TRIGGERED" &&
				report.explosion &&
				report.zone &&
				report.priceBreak &&
				!report.entryBlock
			) {
				candidates.push({
					instrument: this.instrument.symbol,
					direction,
					sourceBarTime: input.bar.openTime,
					referencePrice: input.bar.close,
					reasons: this.reasonsFor(direction, report.zone),
				});
			}
		}

		if (candidates.length > 0) {
			this.resetAll();
		} else {
			for (const direction of DIRECTIONS) {
				if (gates[direction].phase === "TRIGGERED") {
					logger.debug("trigger_unconsumed", {
						instrument: this.instrument.symbol,
						direction,
						openTime: input.bar.openTime,
						gates: gates[direction],
					});
					this.hysteresis[direction].reset();
				}
			}
		}

		return { status: "evaluated", candidates, gates };
	}

	getHysteresis(direction: Direction): HysteresisState {
		return this.hysteresis[direction].snapshot();
	}

	resetAll(): void {
		for (const direction of DIRECTIONS) {
			this.hysteresis[direction].reset();
		}
	}

	private reasonsFor(direction: Direction, zone: PatternZone): SignalReason[] {
		return [
			"trend_alignment",
			direction === "LONG" ? "rsi_trigger_long" : "rsi_trigger_short",
			"wae_explosion",
			zone.kind === "fvg" ? "fvg_zone" : "order_block_zone",
			"price_break",
		];
	}
}
