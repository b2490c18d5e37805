import { describe, expect, it } from "vitest";
import {
	alignedReturns,
	correlationBlock,
	pearsonCorrelation,
	trailingAverage,
	volumeBlock,
	type ClosePoint,
} from "./filters";

const points = (closes: number[], start = 0): ClosePoint[] =>
	closes.map((close, idx) => ({ openTime: (start + idx) * 15_000, close }));

describe("volume filter", () => {
	it("blocks without an average and below the threshold", () => {
		expect(volumeBlock(100, null, 0.2)).toBe("volume_unavailable");
		expect(volumeBlock(19, 100, 0.2)).toBe("volume_below_threshold");
		expect(volumeBlock(20, 100, 0.2)).toBeNull();
	});

	it("averages only a full lookback", () => {
		expect(trailingAverage([1, 2, 3, 4], 2)).toBe(3.5);
		expect(trailingAverage([1], 2)).toBeNull();
	});
});

describe("pearsonCorrelation", () => {
	it("is 1 and -1 for perfectly related series", () => {
		expect(pearsonCorrelation([1, 2, 3], [2, 4, 6])).toBe(1);
		expect(pearsonCorrelation([1, 2, 3], [6, 4, 2])).toBe(-1);
	});

	it("is undefined for flat or short series", () => {
		expect(pearsonCorrelation([1, 1, 1], [1, 2, 3])).toBeNull();
		expect(pearsonCorrelation([1, 2], [1, 2])).toBeNull();
	});
});

describe("correlation filter", () => {
	const own = points([100, 102, 101, 104, 103]);
	const twin = points([200, 204, 202, 208, 206]);

	it("pairs returns over shared bars and honours the lookback", () => {
		const [a, b] = alignedReturns(own, points([50, 51, 52], 2), 10);
		expect(a).toHaveLength(2);
		expect(b).toHaveLength(2);
		expect(alignedReturns(own, twin, 2)[0]).toHaveLength(2);
	});

	it("blocks when a same-direction peer moves in lockstep", () => {
		const block = correlationBlock(
			"LONG",
			own,
			[{ instrument: "NQ", direction: "LONG", closes: twin }],
			0.8,
			50
		);
		expect(block?.instrument).toBe("NQ");
		expect(block?.correlation).toBeCloseTo(1, 10);
	});

	it("ignores peers holding the other direction", () => {
		expect(
			correlationBlock(
				"LONG",
				own,
				[{ instrument: "NQ", direction: "SHORT", closes: twin }],
				0.8,
				50
			)
		).toBeNull();
	});
});
