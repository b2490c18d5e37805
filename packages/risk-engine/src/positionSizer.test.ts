import { describe, expect, it } from "vitest";
import { computePositionSize, type SizingInput } from "./positionSizer";

const input = (overrides: Partial<SizingInput> = {}): SizingInput => ({
	accountEquity: 50_000,
	riskFraction: 0.005,
	stopDistanceTicks: 12,
	tickValue: 12.5,
	maxContracts: 10,
	...overrides,
});

describe("computePositionSize", () => {
	it("floors the risk budget over the per-contract risk", () => {
		expect(computePositionSize(input())).toEqual({
			ok: true,
			size: 1,
			riskAmount: 250,
		});
	});

	it("fails on a zero stop distance", () => {
		expect(computePositionSize(input({ stopDistanceTicks: 0 }))).toEqual({
			ok: false,
			reason: "invalid_stop_distance",
		});
	});

	it("fails below one contract instead of rounding up", () => {
		expect(computePositionSize(input({ accountEquity: 10_000 }))).toEqual({
			ok: false,
			reason: "size_below_one",
			computed: 0,
		});
	});

	it("clamps to the maximum contracts", () => {
		const result = computePositionSize(
			input({ accountEquity: 1_000_000, maxContracts: 3 })
		);
		expect(result.ok ? result.size : null).toBe(3);
	});

	it.each<[Partial<SizingInput>, string]>([
		[{ accountEquity: 0 }, "invalid_equity"],
		[{ accountEquity: Number.NaN }, "invalid_equity"],
		[{ tickValue: -1 }, "invalid_tick_value"],
		[{ hasLivePosition: true }, "position_exists"],
	])("rejects %o with %s", (overrides, reason) => {
		const result = computePositionSize(input(overrides));
		expect(result.ok ? null : result.reason).toBe(reason);
	});
});
