import { describe, expect, it } from "vitest";
import {
	DEFAULT_ENGINE_CONFIG,
	ManualClock,
	RecordingObservabilitySink,
	type Bar,
	type EngineConfig,
	type OrderbookSample,
} from "@momentumx/core";
import { PaperAccount, PaperExecutionProvider } from "@momentumx/execution-engine";
import { RecordedIndicatorProvider } from "./indicatorProvider";
import { StrategyOrchestrator } from "./orchestrator";

const CONFIG: EngineConfig = {
	...DEFAULT_ENGINE_CONFIG,
	instruments: [
		{ symbol: "ES", tickSize: 0.25, tickValue: 12.5 },
		{ symbol: "NQ", tickSize: 0.25, tickValue: 5 },
	],
	filters: { ...DEFAULT_ENGINE_CONFIG.filters, volumeLookbackBars: 1 },
};

const PRIMARY_START = 1_800_000;

const createHarness = (overrides: Partial<EngineConfig> = {}) => {
	const config: EngineConfig = { ...CONFIG, ...overrides };
	const clock = new ManualClock(0);
	const sink = new RecordingObservabilitySink();
	const indicators = new RecordedIndicatorProvider();
	const account = new PaperAccount(50_000);
	const execution = new PaperExecutionProvider({
		account,
		instruments: config.instruments,
		clock,
		priceSource: (instrument) => orchestrator.currentPrice(instrument),
	});
	const orchestrator: StrategyOrchestrator = new StrategyOrchestrator(config, {
		clock,
		execution,
		indicators,
		sink,
	});
	orchestrator.activate("ES");
	orchestrator.activate("NQ");

	const feed = async (
		timeframe: string,
		bar: Omit<Bar, "instrument" | "timeframe">,
		values: Record<string, number> | null,
		closeMs: number,
		instrument = "ES"
	) => {
		if (values) {
			indicators.record({ instrument, timeframe, openTime: bar.openTime, values });
		}
		clock.advanceTo(bar.openTime + closeMs);
		await orchestrator.onBar(instrument, timeframe, { instrument, timeframe, ...bar });
		await orchestrator.drain();
	};

	const sample = async (timestamp: number, imbalance: number, instrument = "ES") => {
		const payload: OrderbookSample = {
			instrument,
			timestamp,
			imbalance,
			icebergs: [],
			bidVolume: null,
			askVolume: null,
		};
		clock.advanceTo(timestamp);
		await orchestrator.onOrderbookSample(instrument, payload);
		await orchestrator.drain();
	};

	return { clock, sink, account, orchestrator, feed, sample };
};

type Harness = ReturnType<typeof createHarness>;

const flatBar = (openTime: number, volume = 500) => ({
	openTime,
	open: 4497,
	high: 4499,
	low: 4497,
	close: 4498,
	volume,
});

/** Bullish higher timeframes, a bullish FVG, and fast volume of 1000. */
const warmUp = async (h: Harness, instrument = "ES") => {
	await h.feed("15m", flatBar(0), { ema_fast: 4490, ema_slow: 4480 }, 900_000, instrument);
	await h.feed(
		"15m",
		flatBar(900_000),
		{ ema_fast: 4495, ema_slow: 4482 },
		900_000,
		instrument
	);
	await h.feed(
		"5m",
		flatBar(1_500_000),
		{ macd_histogram: 0.5, fvg_bull_top: 4500, fvg_bull_bottom: 4498 },
		300_000,
		instrument
	);
	await h.feed(
		"1m",
		flatBar(1_740_000, 1_000),
		{ wae_trend: 1, atr: 2 },
		60_000,
		instrument
	);
};

const TRIGGER_VALUES = { rsi: 41, wae_explosion: 150, wae_trend: 1, wae_dead_zone: 100 };

/** RSI 28, 29, 31, 35 then 41 on a bar closing above the prior high. */
const triggerLong = async (h: Harness, instrument = "ES", triggerVolume = 500) => {
	for (const [index, rsi] of [28, 29, 31, 35].entries()) {
		await h.feed(
			"15s",
			flatBar(PRIMARY_START + index * 15_000),
			{ rsi },
			15_000,
			instrument
		);
	}
	await h.feed(
		"15s",
		{
			openTime: PRIMARY_START + 60_000,
			open: 4498,
			high: 4500.5,
			low: 4498,
			close: 4500.25,
			volume: triggerVolume,
		},
		TRIGGER_VALUES,
		15_000,
		instrument
	);
};

/** Warms up, triggers and confirms a long of 2 at 4500.25 (stop 4498.25). */
const openLong = async (h: Harness) => {
	await warmUp(h);
	await triggerLong(h);
	await h.sample(1_876_000, 2);
};

describe("StrategyOrchestrator", () => {
	it("takes a confirmed long from signal to stop-out", async () => {
		const h = createHarness();
		await warmUp(h);
		await triggerLong(h);

		expect(h.sink.ofType("candidate_emitted").map((event) => event.signal.direction)).toEqual([
			"LONG",
		]);
		expect(h.orchestrator.liveWindows()).toHaveLength(1);

		await h.sample(1_876_000, 2);

		expect(h.sink.ofType("confirmation_outcome").map((event) => event.outcome)).toEqual([
			"CONFIRMED",
		]);
		expect(h.orchestrator.getPositions("ES")).toMatchObject([
			{
				id: "ES-LONG-1",
				status: "OPEN",
				size: 2,
				entryPrice: 4500.25,
				stopPrice: 4498.25,
				targetPrice: 4504.25,
			},
		]);

		await h.feed(
			"15s",
			{ openTime: 1_875_000, open: 4500, high: 4500, low: 4498, close: 4499, volume: 500 },
			null,
			15_000
		);

		expect(h.sink.ofType("exit_fired").map((event) => event.decision.reason)).toEqual([
			"STOP_LOSS",
		]);
		expect(h.orchestrator.getPositions("ES")).toMatchObject([
			{ status: "CLOSED", exitReason: "STOP_LOSS", exitPrice: 4498.25, realizedPnl: -200 },
		]);
		expect(h.account.snapshot(0).balance).toBe(49_800);
	});

	it("books a target hit at the target when the bar closes back lower", async () => {
		const h = createHarness();
		await openLong(h);

		await h.feed(
			"15s",
			{ openTime: 1_875_000, open: 4500, high: 4505, low: 4499, close: 4499, volume: 500 },
			null,
			15_000
		);

		expect(h.orchestrator.getPositions("ES")).toMatchObject([
			{ status: "CLOSED", exitReason: "TARGET_HIT", exitPrice: 4504.25, realizedPnl: 400 },
		]);
		expect(h.account.snapshot(0).balance).toBe(50_400);
	});

	it("keeps checking exits while another confirmation window is live", async () => {
		const h = createHarness({
			confirmation: { ...CONFIG.confirmation, windowMs: 60_000 },
		});
		await openLong(h);

		await h.feed(
			"15s",
			{ openTime: 1_875_000, open: 4499, high: 4499.5, low: 4498.5, close: 4499, volume: 500 },
			{ rsi: 29 },
			15_000
		);
		await h.feed(
			"15s",
			{
				openTime: 1_890_000,
				open: 4499,
				high: 4500.5,
				low: 4498.75,
				close: 4500.25,
				volume: 500,
			},
			TRIGGER_VALUES,
			15_000
		);
		expect(h.sink.ofType("candidate_emitted")).toHaveLength(2);
		expect(h.orchestrator.liveWindows()).toHaveLength(1);

		await h.feed(
			"15s",
			{ openTime: 1_905_000, open: 4500, high: 4500, low: 4498, close: 4499, volume: 500 },
			null,
			15_000
		);

		expect(h.orchestrator.liveWindows()).toHaveLength(1);
		expect(h.sink.ofType("exit_fired").map((event) => event.decision.reason)).toEqual([
			"STOP_LOSS",
		]);
		expect(h.orchestrator.getPositions("ES")).toMatchObject([
			{ status: "CLOSED", exitReason: "STOP_LOSS", exitPrice: 4498.25 },
		]);
	});

	it("does not enter when the feed goes stale before the window confirms", async () => {
		const h = createHarness({
			confirmation: { ...CONFIG.confirmation, windowMs: 120_000 },
		});
		await warmUp(h);
		await triggerLong(h);

		await h.orchestrator.heartbeat(1_875_000 + 60_001);
		await h.sample(1_936_000, 2);

		expect(h.sink.ofType("confirmation_outcome").map((event) => event.outcome)).toEqual([
			"CONFIRMED",
		]);
		expect(h.sink.ofType("entry_blocked")).toEqual([
			{ type: "entry_blocked", instrument: "ES", direction: "LONG", reason: "stale_feed" },
		]);
		expect(h.orchestrator.getPositions("ES")).toEqual([]);
	});

	it("re-checks the concurrent position cap when a window confirms", async () => {
		const h = createHarness({
			risk: { ...CONFIG.risk, maxConcurrentPositions: 1 },
		});
		await warmUp(h, "ES");
		await warmUp(h, "NQ");
		await triggerLong(h, "ES");
		await triggerLong(h, "NQ");
		expect(h.sink.ofType("candidate_emitted").map((event) => event.instrument)).toEqual([
			"ES",
			"NQ",
		]);

		await h.sample(1_876_000, 2, "ES");
		await h.sample(1_876_500, 2, "NQ");

		expect(h.orchestrator.getPositions("ES")).toHaveLength(1);
		expect(h.orchestrator.getPositions("NQ")).toEqual([]);
		expect(h.sink.ofType("entry_blocked")).toEqual([
			{
				type: "entry_blocked",
				instrument: "NQ",
				direction: "LONG",
				reason: "max_concurrent_positions",
			},
		]);
	});

	it("suppresses a trigger on a bar with too little volume", async () => {
		const h = createHarness();
		await warmUp(h);
		await triggerLong(h, "ES", 100);

		expect(h.sink.ofType("candidate_emitted")).toEqual([]);
		expect(h.orchestrator.liveWindows()).toEqual([]);
	});

	it("suppresses a long on an instrument moving with a peer already long", async () => {
		const h = createHarness();
		await openLong(h);

		await warmUp(h, "NQ");
		await triggerLong(h, "NQ");

		expect(h.sink.ofType("candidate_emitted").map((event) => event.instrument)).toEqual([
			"ES",
		]);
		expect(h.orchestrator.getPositions("NQ")).toEqual([]);
	});

	it("drops the candidate when the window times out", async () => {
		const h = createHarness();
		await warmUp(h);
		await triggerLong(h);

		h.clock.advanceTo(1_882_500);
		await h.orchestrator.drain();

		expect(h.sink.ofType("confirmation_outcome").map((event) => event.outcome)).toEqual([
			"TIMED_OUT",
		]);
		expect(h.orchestrator.getPositions("ES")).toEqual([]);
	});

	it("rejects on decisive ask pressure", async () => {
		const h = createHarness();
		await warmUp(h);
		await triggerLong(h);

		await h.sample(1_876_000, 0.5);

		expect(h.sink.ofType("confirmation_outcome").map((event) => event.outcome)).toEqual([
			"REJECTED",
		]);
		expect(h.orchestrator.getPositions("ES")).toEqual([]);
	});

	it("cancels live windows on deactivation without an outcome", async () => {
		const h = createHarness();
		await warmUp(h);
		await triggerLong(h);

		h.orchestrator.deactivate("ES");
		await h.sample(1_876_000, 2);

		expect(h.orchestrator.liveWindows()).toEqual([]);
		expect(h.sink.ofType("confirmation_outcome")).toEqual([]);
		expect(h.orchestrator.isActive("ES")).toBe(false);
	});

	it("processes each bar once", async () => {
		const h = createHarness();
		await h.feed("15s", flatBar(PRIMARY_START), { rsi: 50 }, 15_000);
		await h.feed("15s", flatBar(PRIMARY_START), { rsi: 50 }, 15_000);
		await h.feed("15s", flatBar(PRIMARY_START - 15_000), { rsi: 50 }, 15_000);

		expect(h.sink.ofType("trend_verdict")).toHaveLength(1);
	});

	it("blocks entries while the primary feed is gapped", async () => {
		const h = createHarness();
		await warmUp(h);
		for (const [index, rsi] of [28, 29, 31].entries()) {
			await h.feed("15s", flatBar(PRIMARY_START + index * 15_000), { rsi }, 15_000);
		}
		// 1_845_000 is skipped
		await h.feed(
			"15s",
			{
				openTime: PRIMARY_START + 60_000,
				open: 4498,
				high: 4500.5,
				low: 4498,
				close: 4500.25,
				volume: 500,
			},
			{ rsi: 41, wae_explosion: 150, wae_trend: 1, wae_dead_zone: 100 },
			15_000
		);

		expect(h.sink.ofType("stale_feed")).toEqual([
			{ type: "stale_feed", instrument: "ES", stale: true, reason: "gap" },
		]);
		expect(h.sink.ofType("candidate_emitted")).toEqual([]);
	});

	it("flags silence on the heartbeat", async () => {
		const h = createHarness();
		await h.feed("15s", flatBar(PRIMARY_START), { rsi: 50 }, 15_000);

		await h.orchestrator.heartbeat(PRIMARY_START + 15_000 + 60_001);

		expect(h.sink.ofType("stale_feed")).toEqual([
			{ type: "stale_feed", instrument: "ES", stale: true, reason: "silence" },
		]);
	});

	it("flattens live positions at the last price", async () => {
		const h = createHarness();
		await openLong(h);

		const decisions = await h.orchestrator.flatten();
		await h.orchestrator.drain();

		expect(decisions).toMatchObject([{ reason: "SHUTDOWN", price: 4500.25 }]);
		expect(h.orchestrator.getPositions("ES")).toMatchObject([
			{ status: "CLOSED", exitReason: "SHUTDOWN", realizedPnl: 0 },
		]);
		await h.orchestrator.stop();
	});
});
