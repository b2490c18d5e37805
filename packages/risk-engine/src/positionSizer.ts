export type SizingRejectReason =
	| "position_exists"
	| "invalid_equity"
	| "invalid_tick_value"
	| "invalid_stop_distance"
	| "size_below_one";

export interface SizingInput {
	accountEquity: number;
	riskFraction: number;
	stopDistanceTicks: number;
	tickValue: number;
	maxContracts: number;
	/** A non-terminal position already exists for this instrument and direction */
	hasLivePosition?: boolean;
}

export type SizingResult =
	| { ok: true; size: number; riskAmount: number }
	| { ok: false; reason: SizingRejectReason; computed?: number };

/**
 * floor(equity * riskFraction / (stopTicks * tickValue)), capped at
 * maxContracts. Anything below one contract is a rejection, never a
 * rounded-up order.
 */
export const computePositionSize = (input: SizingInput): SizingResult => {
	if (input.hasLivePosition) {
		return { ok: false, reason: "position_exists" };
	}
	if (!Number.isFinite(input.accountEquity) || input.accountEquity <= 0) {
		return { ok: false, reason: "invalid_equity" };
	}
	if (!Number.isFinite(input.tickValue) || input.tickValue <= 0) {
		return { ok: false, reason: "invalid_tick_value" };
	}
	if (!Number.isFinite(input.stopDistanceTicks) || input.stopDistanceTicks <= 0) {
		return { ok: false, reason: "invalid_stop_distance" };
	}

	const riskAmount = input.accountEquity * input.riskFraction;
	const raw = Math.floor(riskAmount / (input.stopDistanceTicks * input.tickValue));
	const size = Math.min(Math.max(raw, 0), input.maxContracts);
	if (size < 1) {
		return { ok: false, reason: "size_below_one", computed: size };
	}
	return { ok: true, size, riskAmount };
};
