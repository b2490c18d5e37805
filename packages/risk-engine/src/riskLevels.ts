import {
	directionSign,
	type Direction,
	type InstrumentSpec,
	type RiskConfig,
} from "@momentumx/core";

export interface RiskLevels {
	/** Price distance between entry and the initial stop */
	distance: number;
	distanceTicks: number;
	stopPrice: number;
	targetPrice: number;
}

const trimFloat = (value: number): number => parseFloat(value.toFixed(10));

export const roundToTick = (price: number, tickSize: number): number =>
	trimFloat(Math.round(price / tickSize) * tickSize);

/**
 * Initial stop distance: the tighter of the percentage and tick stops,
 * tightened again by ATR when a volatility stop applies. Snapped to the tick
 * grid and never less than one tick.
 */
export const initialRiskDistance = (
	entryPrice: number,
	instrument: InstrumentSpec,
	risk: RiskConfig,
	atr: number | null
): number => {
	let distance = Math.min(
		risk.stopPct * entryPrice,
		risk.stopTicks * instrument.tickSize
	);
	if (atr !== null && atr > 0 && risk.volatilityStopMultiple > 0) {
		distance = Math.min(distance, atr * risk.volatilityStopMultiple);
	}
	return Math.max(roundToTick(distance, instrument.tickSize), instrument.tickSize);
};

export const computeRiskLevels = (
	direction: Direction,
	entryPrice: number,
	instrument: InstrumentSpec,
	risk: RiskConfig,
	atr: number | null = null
): RiskLevels => {
	const distance = initialRiskDistance(entryPrice, instrument, risk, atr);
	const sign = directionSign(direction);
	return {
		distance,
		distanceTicks: Math.round(distance / instrument.tickSize),
		stopPrice: trimFloat(entryPrice - sign * distance),
		targetPrice: trimFloat(entryPrice + sign * risk.rewardRisk * distance),
	};
};
