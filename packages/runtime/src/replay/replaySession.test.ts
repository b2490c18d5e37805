import { describe, expect, it } from "vitest";
import {
	BoundaryParseError,
	DEFAULT_ENGINE_CONFIG,
	ManualClock,
	RecordingObservabilitySink,
} from "@momentumx/core";
import { PaperAccount, PaperExecutionProvider } from "@momentumx/execution-engine";
import { RecordedIndicatorProvider } from "../indicatorProvider";
import { StrategyOrchestrator } from "../orchestrator";
import { parseReplayLine, parseReplaySession } from "./replaySession";
import { runReplay } from "./runReplay";

const barLine = (openTime: number, close: number, indicators?: Record<string, number>) =>
	JSON.stringify({
		type: "bar",
		bar: {
			instrument: "ES",
			timeframe: "15s",
			openTime,
			open: close,
			high: close + 0.5,
			low: close - 0.5,
			close,
			volume: 400,
		},
		...(indicators ? { indicators } : {}),
	});

describe("parseReplayLine", () => {
	it("aligns bars to their bucket and stamps them at close", () => {
		const event = parseReplayLine(barLine(1_803_000, 4500, { rsi: 44 }), 1);

		expect(event).toEqual({
			type: "bar",
			at: 1_815_000,
			bar: {
				instrument: "ES",
				timeframe: "15s",
				openTime: 1_800_000,
				open: 4500,
				high: 4500.5,
				low: 4499.5,
				close: 4500,
				volume: 400,
			},
			snapshot: {
				instrument: "ES",
				timeframe: "15s",
				openTime: 1_800_000,
				values: { rsi: 44 },
			},
		});
	});

	it("reads order-book samples", () => {
		const line = JSON.stringify({
			type: "orderbook",
			sample: {
				instrument: "ES",
				timestamp: 1_816_000,
				imbalance: 1.8,
				icebergs: [{ side: "ask", price: 4501 }],
			},
		});

		expect(parseReplayLine(line, 3)).toMatchObject({
			type: "orderbook",
			at: 1_816_000,
			sample: { imbalance: 1.8, icebergs: [{ side: "ask", price: 4501 }] },
		});
	});

	it("skips blank and comment lines", () => {
		expect(parseReplayLine("   ", 1)).toBeNull();
		expect(parseReplayLine("# warm-up", 2)).toBeNull();
	});

	it("names the line of an invalid payload", () => {
		expect(() => parseReplayLine("{not json", 7)).toThrow(BoundaryParseError);
		expect(() => parseReplayLine(JSON.stringify({ type: "tick" }), 8)).toThrow(
			'line 8.type: unknown event type "tick"'
		);
	});
});

describe("runReplay", () => {
	it("feeds every event on virtual time", async () => {
		const content = [
			"# two primary bars and a sample",
			barLine(1_800_000, 4500, { rsi: 50 }),
			barLine(1_815_000, 4501),
			JSON.stringify({
				type: "orderbook",
				sample: { instrument: "ES", timestamp: 1_831_000, imbalance: 1 },
			}),
		].join("\n");
		const events = parseReplaySession(content);

		const clock = new ManualClock(0);
		const indicators = new RecordedIndicatorProvider();
		const sink = new RecordingObservabilitySink();
		const execution = new PaperExecutionProvider({
			account: new PaperAccount(50_000),
			instruments: DEFAULT_ENGINE_CONFIG.instruments,
			clock,
			priceSource: () => null,
		});
		const orchestrator = new StrategyOrchestrator(DEFAULT_ENGINE_CONFIG, {
			clock,
			execution,
			indicators,
			sink,
		});

		const summary = await runReplay(events, { orchestrator, clock, indicators });

		expect(summary).toEqual({
			bars: 2,
			samples: 1,
			outOfOrder: 0,
			startedAt: 1_815_000,
			endedAt: 1_831_000,
		});
		expect(orchestrator.currentPrice("ES")).toBe(4501);
		expect(sink.ofType("trend_verdict").map((event) => event.verdict)).toEqual([
			"NO_TRADE",
			"NO_TRADE",
		]);
		expect(indicators.size).toBe(0);
	});
});
