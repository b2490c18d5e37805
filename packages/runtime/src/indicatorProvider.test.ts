import { describe, expect, it } from "vitest";
import { ManualClock, type Bar, type IndicatorSnapshot } from "@momentumx/core";
import { parseIndicatorLine, StreamedIndicatorProvider } from "./indicatorProvider";

const bar = (openTime: number): Bar => ({
	instrument: "ES",
	timeframe: "15s",
	openTime,
	open: 4500,
	high: 4501,
	low: 4499,
	close: 4500.5,
	volume: 300,
});

const snapshot = (openTime: number, rsi: number): IndicatorSnapshot => ({
	instrument: "ES",
	timeframe: "15s",
	openTime,
	values: { rsi },
});

const createProvider = (maxBuffered?: number) => {
	const clock = new ManualClock(30_000);
	const provider = new StreamedIndicatorProvider({ clock, waitMs: 500, maxBuffered });
	return { clock, provider };
};

describe("StreamedIndicatorProvider", () => {
	it("serves a snapshot that arrived before its bar", () => {
		const { provider } = createProvider();
		provider.push(snapshot(15_000, 31));

		expect(provider.compute("ES", "15s", [bar(0), bar(15_000)])).toEqual(snapshot(15_000, 31));
		expect(provider.size).toBe(0);
	});

	it("waits for a late snapshot", async () => {
		const { clock, provider } = createProvider();
		const pending = provider.compute("ES", "15s", [bar(15_000)]);

		provider.push(snapshot(15_000, 28));

		await expect(pending).resolves.toEqual(snapshot(15_000, 28));
		expect(clock.pendingTimers()).toBe(0);
	});

	it("gives up after the wait", async () => {
		const { clock, provider } = createProvider();
		const pending = provider.compute("ES", "15s", [bar(15_000)]);

		clock.advanceBy(500);

		await expect(pending).resolves.toBeNull();
		provider.push(snapshot(15_000, 28));
		expect(provider.size).toBe(1);
	});

	it("drops the oldest unclaimed snapshots", () => {
		const { provider } = createProvider(2);
		provider.push(snapshot(0, 40));
		provider.push(snapshot(15_000, 41));
		provider.push(snapshot(30_000, 42));

		expect(provider.size).toBe(2);
		expect(provider.compute("ES", "15s", [bar(15_000)])).toEqual(snapshot(15_000, 41));
	});
});

describe("parseIndicatorLine", () => {
	it("aligns the open time to its bar", () => {
		const line = '{"instrument":"ES","timeframe":"15s","openTime":15400,"values":{"rsi":"29.5","atr":1.25}}';

		expect(parseIndicatorLine(line)).toEqual({
			instrument: "ES",
			timeframe: "15s",
			openTime: 15_000,
			values: { rsi: 29.5, atr: 1.25 },
		});
	});

	it("skips blank and comment lines", () => {
		expect(parseIndicatorLine("   ")).toBeNull();
		expect(parseIndicatorLine("# warm-up")).toBeNull();
	});

	it("names the field that failed", () => {
		expect(() => parseIndicatorLine('{"timeframe":"15s","openTime":0,"values":{}}')).toThrow(
			"indicators.instrument: expected a symbol"
		);
		expect(() =>
			parseIndicatorLine('{"instrument":"ES","timeframe":"15s","openTime":0,"values":{"rsi":"x"}}')
		).toThrow("indicators.values.rsi");
	});
});
