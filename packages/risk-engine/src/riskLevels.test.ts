import { describe, expect, it } from "vitest";
import { DEFAULT_ENGINE_CONFIG, type InstrumentSpec } from "@momentumx/core";
import { computeRiskLevels, initialRiskDistance, roundToTick } from "./riskLevels";

const RISK = DEFAULT_ENGINE_CONFIG.risk;
const ES: InstrumentSpec = { symbol: "ES", tickSize: 0.25, tickValue: 12.5 };
const WHOLE_TICK: InstrumentSpec = { symbol: "TEST", tickSize: 1, tickValue: 5 };

describe("risk levels", () => {
	it("places a 10-tick stop and a 20-tick target", () => {
		expect(computeRiskLevels("LONG", 4500, WHOLE_TICK, RISK)).toEqual({
			distance: 10,
			distanceTicks: 10,
			stopPrice: 4490,
			targetPrice: 4520,
		});
	});

	it("mirrors the bracket for shorts", () => {
		const levels = computeRiskLevels("SHORT", 4500, WHOLE_TICK, RISK);
		expect([levels.stopPrice, levels.targetPrice]).toEqual([4510, 4480]);
	});

	it("uses the percentage stop when it is tighter", () => {
		expect(initialRiskDistance(100, WHOLE_TICK, RISK, null)).toBe(1);
	});

	it("ignores ATR when it is absent or the multiple is off", () => {
		expect(initialRiskDistance(4500, ES, RISK, 0)).toBe(2.5);
		expect(
			initialRiskDistance(4500, ES, { ...RISK, volatilityStopMultiple: 0 }, 0.5)
		).toBe(2.5);
	});

	it("never goes below one tick", () => {
		expect(initialRiskDistance(4500, ES, RISK, 0.1)).toBe(0.25);
	});

	it("snaps prices to the tick grid", () => {
		expect(roundToTick(4500.13, 0.25)).toBe(4500.25);
		expect(roundToTick(4500.1, 0.25)).toBe(4500);
	});
});
