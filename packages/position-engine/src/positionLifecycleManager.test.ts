import { describe, expect, it, vi } from "vitest";
import {
	DEFAULT_ENGINE_CONFIG,
	ManualClock,
	RecordingObservabilitySink,
	type AlignmentVerdict,
	type Bar,
	type InstrumentSpec,
} from "@momentumx/core";
import type {
	ExecutionAck,
	ExecutionProvider,
	ExecutionRequest,
	ExecutionResult,
} from "@momentumx/execution-engine";
import type { EntryPlan } from "@momentumx/risk-engine";
import type { Position } from "./position";
import { PositionLifecycleManager, type LifecycleConfig } from "./positionLifecycleManager";

const TST: InstrumentSpec = { symbol: "TST", tickSize: 1, tickValue: 5 };

class RecordingProvider implements ExecutionProvider {
	readonly requests: ExecutionRequest[] = [];
	failSubmit = false;

	async submit(request: ExecutionRequest): Promise<void> {
		this.requests.push(request);
		if (this.failSubmit) {
			throw new Error("gateway offline");
		}
	}

	onAck(): () => void {
		return () => undefined;
	}

	async accountEquity(): Promise<number> {
		return 50_000;
	}

	last(): ExecutionRequest {
		const request = this.requests[this.requests.length - 1];
		if (!request) {
			throw new Error("no request submitted");
		}
		return request;
	}
}

const LONG_PLAN: EntryPlan = {
	instrument: "TST",
	direction: "LONG",
	side: "buy",
	quantity: 2,
	entryPrice: 4500,
	stopPrice: 4490,
	targetPrice: 4520,
	riskDistance: 10,
	stopDistanceTicks: 10,
};

const setup = (overrides: Partial<LifecycleConfig> = {}) => {
	const clock = new ManualClock(1_000);
	const provider = new RecordingProvider();
	const sink = new RecordingObservabilitySink();
	const closed: Position[] = [];
	const manager = new PositionLifecycleManager(
		TST,
		{
			exits: DEFAULT_ENGINE_CONFIG.exits,
			execution: DEFAULT_ENGINE_CONFIG.execution,
			risk: DEFAULT_ENGINE_CONFIG.risk,
			...overrides,
		},
		{ execution: provider, clock, sink, onClosed: (position) => closed.push(position) }
	);
	return { clock, provider, sink, closed, manager };
};

const ackFor = (request: ExecutionRequest, result: ExecutionResult): ExecutionAck => ({
	requestId: request.requestId,
	positionId: request.positionId,
	instrument: request.instrument,
	kind: request.kind,
	result,
});

const bar = (close: number, high: number, low: number): Bar => ({
	instrument: "TST",
	timeframe: "15s",
	openTime: 0,
	open: close,
	high,
	low,
	close,
	volume: 100,
});

const openFilled = async (setupResult: ReturnType<typeof setup>, fillPrice = 4500) => {
	const { manager, provider } = setupResult;
	await manager.open(LONG_PLAN);
	await manager.handleAck(
		ackFor(provider.last(), { ok: true, fillPrice, filledAt: 1_000 })
	);
};

const evaluate = (
	manager: PositionLifecycleManager,
	input: Bar,
	sar: number | null = null,
	verdict: AlignmentVerdict = "BULLISH"
) => manager.evaluate({ bar: input, verdict, sar });

describe("PositionLifecycleManager", () => {
	it("submits a bracket entry and opens on fill at the fill price", async () => {
		const { manager, provider, sink } = setup();
		const pending = await manager.open(LONG_PLAN);

		expect(pending?.status).toBe("PENDING");
		expect(provider.last()).toMatchObject({
			kind: "entry",
			requestId: "TST-LONG-1:entry:1",
			positionId: "TST-LONG-1",
			side: "buy",
			quantity: 2,
			stopPrice: 4490,
			targetPrice: 4520,
		});

		await manager.handleAck(
			ackFor(provider.last(), { ok: true, fillPrice: 4501, filledAt: 2_000 })
		);

		expect(manager.getPosition("TST-LONG-1")).toMatchObject({
			status: "OPEN",
			entryPrice: 4501,
			stopPrice: 4491,
			targetPrice: 4521,
			openedAt: 2_000,
		});
		expect(sink.ofType("position_transition").map((event) => event.to)).toEqual([
			"PENDING",
			"OPEN",
		]);
		expect(provider.requests.slice(1)).toMatchObject([
			{ kind: "modify_stop", requestId: "TST-LONG-1:modify_stop:2", stopPrice: 4491 },
			{ kind: "modify_target", requestId: "TST-LONG-1:modify_target:3", targetPrice: 4521 },
		]);
	});

	it("leaves the resting bracket alone when the fill matches the plan", async () => {
		const state = setup();
		await openFilled(state, 4500);

		expect(state.provider.requests.map((request) => request.kind)).toEqual(["entry"]);
	});

	it("refuses a second live position in the same direction", async () => {
		const { manager } = setup();
		await manager.open(LONG_PLAN);
		expect(await manager.open(LONG_PLAN)).toBeNull();
	});

	it("activates trailing and only ever tightens the stop", async () => {
		const state = setup();
		const { manager, provider, closed } = state;
		await openFilled(state);

		expect(await evaluate(manager, bar(4505, 4506, 4503), 4495)).toEqual([]);
		expect(manager.getPosition("TST-LONG-1")?.stopPrice).toBe(4490);

		await evaluate(manager, bar(4510, 4511, 4508), 4502);
		expect(manager.getPosition("TST-LONG-1")).toMatchObject({
			status: "TRAILING_ACTIVE",
			stopPrice: 4502,
		});
		expect(provider.last()).toMatchObject({ kind: "modify_stop", stopPrice: 4502 });

		const before = provider.requests.length;
		await evaluate(manager, bar(4512, 4513, 4509), 4500);
		expect(manager.getPosition("TST-LONG-1")?.stopPrice).toBe(4502);
		expect(provider.requests).toHaveLength(before);

		await evaluate(manager, bar(4514, 4515, 4511), 4505);
		expect(manager.getPosition("TST-LONG-1")?.stopPrice).toBe(4505);

		const decisions = await evaluate(manager, bar(4506, 4508, 4504), 4505);
		expect(decisions).toEqual([
			{
				positionId: "TST-LONG-1",
				instrument: "TST",
				reason: "STOP_LOSS",
				requestedAt: 1_000,
				price: 4505,
			},
		]);
		expect(provider.last()).toMatchObject({
			kind: "close",
			side: "sell",
			reason: "STOP_LOSS",
			referencePrice: 4505,
		});

		await manager.handleAck(
			ackFor(provider.last(), { ok: true, fillPrice: 4505, filledAt: 3_000 })
		);
		expect(closed).toHaveLength(1);
		expect(closed[0]).toMatchObject({ status: "CLOSED", realizedPnl: 50, exitPrice: 4505 });
		expect(manager.hasLivePosition()).toBe(false);
	});

	it("locks breakeven ticks on activation when configured", async () => {
		const state = setup({
			exits: { ...DEFAULT_ENGINE_CONFIG.exits, breakevenLockTicks: 2 },
		});
		await openFilled(state);

		await evaluate(state.manager, bar(4510, 4511, 4508));
		expect(state.manager.getPosition("TST-LONG-1")?.stopPrice).toBe(4502);
	});

	it("prefers the stop when a bar breaches both stop and target", async () => {
		const state = setup();
		await openFilled(state);

		const [decision] = await evaluate(state.manager, bar(4500, 4525, 4485));
		expect(decision?.reason).toBe("STOP_LOSS");
		expect(decision?.price).toBe(4490);
	});

	it("takes the target ahead of a due time exit", async () => {
		const state = setup();
		await openFilled(state);
		state.clock.advanceTo(301_001);

		const [decision] = await evaluate(state.manager, bar(4500, 4520, 4499));
		expect(decision?.reason).toBe("TARGET_HIT");
		expect(decision?.price).toBe(4520);
	});

	it("exits on a trend reversal at the close", async () => {
		const state = setup();
		await openFilled(state);

		const [decision] = await evaluate(state.manager, bar(4498, 4501, 4497), null, "BEARISH");
		expect(decision).toMatchObject({ reason: "TREND_REVERSAL", price: 4498 });
	});

	it("time-exits only positions at or below the breakeven threshold", async () => {
		const profitable = setup();
		await openFilled(profitable);
		profitable.clock.advanceTo(301_001);
		expect(await evaluate(profitable.manager, bar(4503, 4504, 4502))).toEqual([]);

		const flat = setup();
		await openFilled(flat);
		flat.clock.advanceTo(301_001);
		const [decision] = await evaluate(flat.manager, bar(4500, 4501, 4499));
		expect(decision).toMatchObject({ reason: "TIME_EXIT", price: 4500 });
	});

	it("reverts failed closes and rejects once retries run out", async () => {
		const state = setup();
		const { manager, provider, sink } = state;
		await openFilled(state);

		for (let attempt = 1; attempt <= 3; attempt += 1) {
			const decisions = await evaluate(manager, bar(4489, 4492, 4488));
			expect(decisions).toHaveLength(1);
			await manager.handleAck(ackFor(provider.last(), { ok: false, error: "broker_down" }));
			if (attempt < 3) {
				expect(manager.getPosition("TST-LONG-1")).toMatchObject({
					status: "OPEN",
					retryCount: attempt,
					exitReason: null,
				});
			}
		}

		expect(manager.getPosition("TST-LONG-1")?.status).toBe("REJECTED");
		expect(manager.hasLivePosition()).toBe(false);
		expect(sink.ofType("alert")).toEqual([
			{
				type: "alert",
				instrument: "TST",
				positionId: "TST-LONG-1",
				message: "execution retries exhausted for TST-LONG-1: broker_down",
			},
		]);
	});

	it("resubmits a failed entry and ignores acks for superseded requests", async () => {
		const { manager, provider } = setup();
		await manager.open(LONG_PLAN);
		const first = provider.last();

		await manager.handleAck(ackFor(first, { ok: false, error: "rejected" }));
		expect(provider.last().requestId).toBe("TST-LONG-1:entry:2");
		expect(manager.getPosition("TST-LONG-1")).toMatchObject({
			status: "PENDING",
			retryCount: 1,
		});

		expect(
			await manager.handleAck(ackFor(first, { ok: true, fillPrice: 4500, filledAt: 1_500 }))
		).toBe(false);
		expect(manager.getPosition("TST-LONG-1")?.status).toBe("PENDING");
	});

	it("treats a missing ack as a failure after the timeout", async () => {
		const { manager, provider, clock } = setup();
		await manager.open(LONG_PLAN);

		clock.advanceTo(10_999);
		expect(await manager.expireStaleRequests()).toBe(0);

		clock.advanceTo(11_000);
		expect(await manager.expireStaleRequests()).toBe(1);
		expect(provider.requests).toHaveLength(2);
		expect(manager.getPosition("TST-LONG-1")?.retryCount).toBe(1);
	});

	it("counts a throwing submit as a failed attempt", async () => {
		const { manager, provider } = setup({
			execution: { ...DEFAULT_ENGINE_CONFIG.execution, maxRetries: 2 },
		});
		provider.failSubmit = true;
		const submit = vi.spyOn(provider, "submit");

		const position = await manager.open(LONG_PLAN);
		expect(submit).toHaveBeenCalledTimes(2);
		expect(position?.status).toBe("REJECTED");
	});

	it("flattens open positions with shutdown exits", async () => {
		const state = setup();
		await openFilled(state);

		const decisions = await state.manager.flatten(4503);
		expect(decisions).toMatchObject([{ reason: "SHUTDOWN", price: 4503 }]);
		expect(state.provider.last()).toMatchObject({ kind: "close", reason: "SHUTDOWN" });
		expect(state.manager.getPosition("TST-LONG-1")?.status).toBe("CLOSING");
	});
});
