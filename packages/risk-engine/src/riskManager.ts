import type {
	Direction,
	InstrumentSpec,
	RiskConfig,
} from "@momentumx/core";
import {
	computePositionSize,
	type SizingRejectReason,
} from "./positionSizer";
import { computeRiskLevels } from "./riskLevels";

export type OrderSide = "buy" | "sell";

export interface EntryPlan {
	instrument: string;
	direction: Direction;
	side: OrderSide;
	quantity: number;
	entryPrice: number;
	stopPrice: number;
	targetPrice: number;
	riskDistance: number;
	stopDistanceTicks: number;
}

export interface EntryRequest {
	instrument: InstrumentSpec;
	direction: Direction;
	entryPrice: number;
	accountEquity: number;
	atr: number | null;
	hasLivePosition: boolean;
}

export type EntryPlanResult =
	| { ok: true; plan: EntryPlan }
	| { ok: false; reason: SizingRejectReason };

export const orderSideFor = (
	direction: Direction,
	action: "OPEN" | "CLOSE"
): OrderSide => {
	if (action === "OPEN") {
		return direction === "LONG" ? "buy" : "sell";
	}
	return direction === "LONG" ? "sell" : "buy";
};

/** Turns a confirmed candidate into a sized bracket plan. */
export class RiskManager {
	constructor(private readonly config: RiskConfig) {}

	planEntry(request: EntryRequest): EntryPlanResult {
		const levels = computeRiskLevels(
			request.direction,
			request.entryPrice,
			request.instrument,
			this.config,
			request.atr
		);
		const sizing = computePositionSize({
			accountEquity: request.accountEquity,
			riskFraction: this.config.riskFraction,
			stopDistanceTicks: levels.distanceTicks,
			tickValue: request.instrument.tickValue,
			maxContracts: this.config.maxContractsPerPosition,
			hasLivePosition: request.hasLivePosition,
		});
		if (!sizing.ok) {
			return { ok: false, reason: sizing.reason };
		}

		return {
			ok: true,
			plan: {
				instrument: request.instrument.symbol,
				direction: request.direction,
				side: orderSideFor(request.direction, "OPEN"),
				quantity: sizing.size,
				entryPrice: request.entryPrice,
				stopPrice: levels.stopPrice,
				targetPrice: levels.targetPrice,
				riskDistance: levels.distance,
				stopDistanceTicks: levels.distanceTicks,
			},
		};
	}
}
