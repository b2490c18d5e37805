import {
	BarStore,
	bucketTimestamp,
	createLogger,
	DIRECTIONS,
	emitSafely,
	errorMessage,
	INDICATOR_KEYS,
	readIndicator,
	timeframeToMs,
	type AlignmentVerdict,
	type Bar,
	type CandidateSignal,
	type Clock,
	type Direction,
	type EngineConfig,
	type ExitDecision,
	type ExitReason,
	type InstrumentSpec,
	type ObservabilitySink,
	type OrderbookSample,
} from "@momentumx/core";
import {
	OrderbookConfirmationGate,
	OrderbookSampler,
	type ConfirmationResult,
	type ConfirmationWindow,
	type OrderbookProvider,
} from "@momentumx/confirmation";
import type { ExecutionAck, ExecutionProvider } from "@momentumx/execution-engine";
import { PositionLifecycleManager, type Position } from "@momentumx/position-engine";
import {
	correlationBlock,
	RiskGuardrails,
	RiskManager,
	volumeBlock,
} from "@momentumx/risk-engine";
import {
	collectTrendInput,
	SignalFusionEngine,
	TimeframeTrendAggregator,
} from "@momentumx/strategy-engine";
import { FeedHealth, type FeedHealthChange } from "./feedHealth";
import type { IndicatorProvider } from "./indicatorProvider";
import { InstrumentLoop } from "./loop/InstrumentLoop";
import { MarketStats } from "./marketStats";

const logger = createLogger("strategy_orchestrator");

export interface StrategyOrchestratorDeps {
	clock: Clock;
	execution: ExecutionProvider;
	indicators: IndicatorProvider;
	/** Without a provider, samples must be pushed through onOrderbookSample */
	orderbook?: OrderbookProvider;
	sink?: ObservabilitySink;
}

interface InstrumentContext {
	spec: InstrumentSpec;
	loop: InstrumentLoop;
	store: BarStore;
	fusion: SignalFusionEngine;
	positions: PositionLifecycleManager;
	health: FeedHealth;
	sampler: OrderbookSampler | null;
	/** Last processed openTime per timeframe */
	lastOpenTime: Map<string, number>;
	lastVerdict: AlignmentVerdict;
	active: boolean;
}

const yieldToMacrotasks = (): Promise<void> =>
	new Promise((resolve) => setImmediate(resolve));

/**
 * Wires the per-instrument pipeline: bars feed the trend aggregator and
 * signal fusion, candidates wait on the shared confirmation gate, confirmed
 * candidates are sized and handed to the position lifecycle manager.
 */
export class StrategyOrchestrator {
	private readonly contexts = new Map<string, InstrumentContext>();
	private readonly aggregator: TimeframeTrendAggregator;
	private readonly gate: OrderbookConfirmationGate;
	private readonly riskManager: RiskManager;
	private readonly guardrails: RiskGuardrails;
	private readonly stats: MarketStats;
	private readonly primaryMs: number;
	private readonly unsubscribeAcks: () => void;
	private stopped = false;

	constructor(
		private readonly config: EngineConfig,
		private readonly deps: StrategyOrchestratorDeps
	) {
		this.primaryMs = timeframeToMs(config.timeframes.primary);
		this.aggregator = new TimeframeTrendAggregator(config.history);
		this.riskManager = new RiskManager(config.risk);
		this.guardrails = new RiskGuardrails(config.risk, config.execution.startingEquity);
		this.stats = new MarketStats(
			Math.max(
				config.filters.volumeLookbackBars,
				config.filters.correlationLookbackBars + 1,
				config.history.maxBars
			)
		);
		this.gate = new OrderbookConfirmationGate(config.confirmation, {
			clock: deps.clock,
			sink: deps.sink,
			onOutcome: (result) => this.onConfirmation(result),
		});

		for (const spec of config.instruments) {
			this.contexts.set(spec.symbol, this.createContext(spec));
		}
		this.unsubscribeAcks = deps.execution.onAck((ack) => {
			void this.onExecutionAck(ack);
		});
	}

	/** Allows new entries for the instrument. */
	activate(instrument: string): void {
		const ctx = this.requireContext(instrument);
		if (!ctx.active) {
			ctx.active = true;
			logger.info("instrument_activated", { instrument });
		}
	}

	/**
	 * Stops new entries and discards live confirmation windows. Positions
	 * keep being managed until they close.
	 */
	deactivate(instrument: string): void {
		const ctx = this.requireContext(instrument);
		if (!ctx.active) {
			return;
		}
		ctx.active = false;
		ctx.sampler?.stop();
		const cancelled = this.gate.cancelInstrument(instrument);
		logger.info("instrument_deactivated", { instrument, cancelledWindows: cancelled });
	}

	isActive(instrument: string): boolean {
		return this.requireContext(instrument).active;
	}

	onBar(instrument: string, timeframe: string, bar: Bar): Promise<void> {
		const ctx = this.requireContext(instrument);
		return ctx.loop.enqueue("bar", () => this.handleBar(ctx, timeframe, bar));
	}

	onOrderbookSample(instrument: string, sample: OrderbookSample): Promise<void> {
		const ctx = this.requireContext(instrument);
		return ctx.loop.enqueue("orderbook", () => {
			ctx.health.touch(this.deps.clock.now());
			this.gate.onSample(sample);
		});
	}

	/** Routes an execution ack to its instrument's loop. */
	onExecutionAck(ack: ExecutionAck): Promise<void> {
		const ctx = this.contexts.get(ack.instrument);
		if (!ctx) {
			logger.warn("ack_unknown_instrument", {
				requestId: ack.requestId,
				instrument: ack.instrument,
			});
			return Promise.resolve();
		}
		return ctx.loop.enqueue("ack", async () => {
			await ctx.positions.handleAck(ack);
			this.syncExposure(ctx);
		});
	}

	/**
	 * Timer tick: silence detection, ack timeouts, and exit checks on the
	 * last known price while a feed is stale.
	 */
	heartbeat(now: number = this.deps.clock.now()): Promise<void> {
		return Promise.all(
			Array.from(this.contexts.values(), (ctx) =>
				ctx.loop.enqueue("timer", () => this.handleTimer(ctx, now))
			)
		).then(() => undefined);
	}

	getPositions(instrument: string): Position[] {
		return this.requireContext(instrument).positions.getPositions();
	}

	currentPrice(instrument: string): number | null {
		const ctx = this.requireContext(instrument);
		return ctx.store.getLatestBar(this.config.timeframes.primary)?.close ?? null;
	}

	liveWindows(): Readonly<ConfirmationWindow>[] {
		return this.gate.liveWindows();
	}

	/** Issues exits for every live position of every instrument at its last price. */
	flatten(reason: ExitReason = "SHUTDOWN"): Promise<ExitDecision[]> {
		return Promise.all(
			Array.from(this.contexts.values(), async (ctx) => {
				let decisions: ExitDecision[] = [];
				await ctx.loop.enqueue("timer", async () => {
					const price = this.currentPrice(ctx.spec.symbol);
					if (price === null) {
						return;
					}
					decisions = await ctx.positions.flatten(price, reason);
					this.syncExposure(ctx);
				});
				return decisions;
			})
		).then((perInstrument) => perInstrument.flat());
	}

	/** Waits until every loop, sampler poll and pending ack has been processed. */
	async drain(): Promise<void> {
		for (;;) {
			await Promise.all(
				Array.from(this.contexts.values(), async (ctx) => {
					await ctx.sampler?.whenIdle();
					await ctx.loop.whenIdle();
				})
			);
			await yieldToMacrotasks();
			const busy = Array.from(this.contexts.values()).some((ctx) => !ctx.loop.idle);
			if (!busy) {
				return;
			}
		}
	}

	async stop(): Promise<void> {
		if (this.stopped) {
			return;
		}
		this.stopped = true;
		for (const ctx of this.contexts.values()) {
			this.deactivate(ctx.spec.symbol);
		}
		await this.drain();
		this.unsubscribeAcks();
		logger.info("orchestrator_stopped", {
			instruments: Array.from(this.contexts.keys()),
		});
	}

	private createContext(spec: InstrumentSpec): InstrumentContext {
		const store = new BarStore({ defaultMaxBars: this.config.history.maxBars });
		const ctx: InstrumentContext = {
			spec,
			loop: new InstrumentLoop(spec.symbol),
			store,
			fusion: new SignalFusionEngine(spec, this.config.signal),
			positions: new PositionLifecycleManager(
				spec,
				{
					exits: this.config.exits,
					execution: this.config.execution,
					risk: this.config.risk,
				},
				{
					execution: this.deps.execution,
					clock: this.deps.clock,
					sink: this.deps.sink,
					onClosed: (position) => {
						if (position.realizedPnl !== null) {
							this.guardrails.recordRealized(
								position.realizedPnl,
								position.closedAt ?? this.deps.clock.now()
							);
						}
					},
				}
			),
			health: new FeedHealth(spec.symbol, this.config.feed, this.primaryMs),
			sampler: null,
			lastOpenTime: new Map(),
			lastVerdict: "NO_TRADE",
			active: false,
		};

		const provider = this.deps.orderbook;
		if (provider) {
			ctx.sampler = new OrderbookSampler(spec.symbol, this.config.confirmation, {
				provider,
				clock: this.deps.clock,
				isActive: () => ctx.active && this.gate.hasLiveWindow(spec.symbol),
				onSample: (sample) => {
					void this.onOrderbookSample(spec.symbol, sample);
				},
			});
		}
		return ctx;
	}

	private async handleBar(
		ctx: InstrumentContext,
		timeframe: string,
		raw: Bar
	): Promise<void> {
		const instrument = ctx.spec.symbol;
		const tfMs = timeframeToMs(timeframe);
		const openTime = bucketTimestamp(raw.openTime, tfMs);
		const last = ctx.lastOpenTime.get(timeframe);
		if (last !== undefined && openTime <= last) {
			logger.debug("bar_already_processed", { instrument, timeframe, openTime, last });
			return;
		}
		ctx.lastOpenTime.set(timeframe, openTime);

		const now = this.deps.clock.now();
		const bar = ctx.store.ingest({ ...raw, instrument, timeframe });
		const snapshot = await this.deps.indicators.compute(
			instrument,
			timeframe,
			ctx.store.getSeries(timeframe)
		);
		if (snapshot) {
			ctx.store.attachSnapshot(snapshot);
		}

		if (timeframe === this.config.timeframes.fast) {
			this.stats.recordVolume(instrument, bar.volume);
		}
		if (timeframe !== this.config.timeframes.primary) {
			ctx.health.touch(now);
			return;
		}

		this.reportHealth(ctx, ctx.health.onPrimaryBar(bar, now));
		this.stats.recordClose(instrument, { openTime: bar.openTime, close: bar.close });

		const assessment = this.aggregator.evaluate(
			collectTrendInput(ctx.store, this.config.timeframes)
		);
		ctx.lastVerdict = assessment.verdict;
		emitSafely(this.deps.sink, {
			type: "trend_verdict",
			instrument,
			at: bar.openTime,
			verdict: assessment.verdict,
			states: assessment.states,
		});

		const primarySnapshot = ctx.store.getLatestSnapshot(timeframe);
		const barSnapshot =
			primarySnapshot?.openTime === bar.openTime ? primarySnapshot : undefined;
		const fusion = ctx.fusion.evaluate({
			bar,
			snapshot: barSnapshot,
			previousBar: ctx.store.getPreviousBar(timeframe),
			verdict: assessment.verdict,
			patterns: ctx.store.getLatestSnapshot(this.config.timeframes.patterns),
			entryBlock: this.entryBlock(ctx, bar, now),
			directionBlocks: this.directionBlocks(ctx),
		});
		if (fusion.status === "evaluated") {
			for (const candidate of fusion.candidates) {
				this.openWindow(ctx, candidate);
			}
		}

		await ctx.positions.evaluate({
			bar,
			verdict: assessment.verdict,
			sar: readIndicator(barSnapshot, INDICATOR_KEYS.sar),
		});
		await ctx.positions.expireStaleRequests(now);
		this.syncExposure(ctx);
	}

	/**
	 * First reason new entries are blocked on this bar, or null. Checked when
	 * the candidate is emitted and again when its window confirms.
	 */
	private entryBlock(ctx: InstrumentContext, bar: Bar, now: number): string | null {
		if (!ctx.active) {
			return "instrument_inactive";
		}
		if (ctx.health.stale) {
			return "stale_feed";
		}

		const { filters } = this.config;
		const volume = volumeBlock(
			bar.volume,
			this.stats.averageVolume(ctx.spec.symbol, filters.volumeLookbackBars),
			filters.volumeThresholdFraction
		);
		if (volume) {
			return volume;
		}

		const guardrail = this.guardrails.entryBlock(now, this.stats.livePositionCount());
		if (guardrail) {
			return guardrail;
		}

		return null;
	}

	/** Correlation blocks apply only to the direction a peer already holds. */
	private directionBlocks(ctx: InstrumentContext): Partial<Record<Direction, string>> {
		const { filters } = this.config;
		const closes = this.stats.closes(ctx.spec.symbol);
		const peers = this.stats.peerExposures(ctx.spec.symbol);
		const blocks: Partial<Record<Direction, string>> = {};
		for (const direction of DIRECTIONS) {
			const blocked = correlationBlock(
				direction,
				closes,
				peers,
				filters.correlationThreshold,
				filters.correlationLookbackBars
			);
			if (blocked) {
				logger.debug("correlation_block", {
					instrument: ctx.spec.symbol,
					direction,
					peer: blocked.instrument,
					correlation: blocked.correlation,
				});
				blocks[direction] = `correlated_with_${blocked.instrument}`;
			}
		}
		return blocks;
	}

	private openWindow(ctx: InstrumentContext, candidate: CandidateSignal): void {
		emitSafely(this.deps.sink, {
			type: "candidate_emitted",
			instrument: candidate.instrument,
			signal: candidate,
		});
		logger.info("candidate_emitted", {
			instrument: candidate.instrument,
			direction: candidate.direction,
			reasons: candidate.reasons,
			referencePrice: candidate.referencePrice,
		});

		if (this.gate.open(candidate)) {
			ctx.sampler?.start();
		}
	}

	private onConfirmation(result: ConfirmationResult): void {
		const ctx = this.contexts.get(result.window.instrument);
		if (!ctx) {
			return;
		}
		void ctx.loop.enqueue("confirmation", () => this.handleConfirmation(ctx, result));
	}

	private async handleConfirmation(
		ctx: InstrumentContext,
		result: ConfirmationResult
	): Promise<void> {
		const { candidate } = result.window;
		if (result.outcome !== "CONFIRMED") {
			logger.info("candidate_dropped", {
				instrument: candidate.instrument,
				direction: candidate.direction,
				outcome: result.outcome,
				reason: result.reason,
			});
			return;
		}
		let accountEquity: number;
		try {
			accountEquity = await this.deps.execution.accountEquity();
		} catch (error) {
			logger.warn("equity_lookup_failed", {
				instrument: candidate.instrument,
				error: errorMessage(error),
			});
			accountEquity = this.config.execution.startingEquity;
		}

		// Blocks are re-read after the last await so that no other loop can
		// open a position between the check and the open below.
		const latest = ctx.store.getLatestBar(this.config.timeframes.primary);
		const now = this.deps.clock.now();
		const block =
			(latest ? this.entryBlock(ctx, latest, now) : "no_primary_bar") ??
			this.directionBlocks(ctx)[candidate.direction] ??
			null;
		if (block) {
			logger.info("confirmed_candidate_blocked", {
				instrument: candidate.instrument,
				direction: candidate.direction,
				reason: block,
			});
			emitSafely(this.deps.sink, {
				type: "entry_blocked",
				instrument: candidate.instrument,
				direction: candidate.direction,
				reason: block,
			});
			return;
		}

		const atr = readIndicator(
			ctx.store.getLatestSnapshot(this.config.timeframes.fast),
			INDICATOR_KEYS.atr
		);
		const planned = this.riskManager.planEntry({
			instrument: ctx.spec,
			direction: candidate.direction,
			entryPrice: this.currentPrice(ctx.spec.symbol) ?? candidate.referencePrice,
			accountEquity,
			atr,
			hasLivePosition: ctx.positions.hasLivePosition(candidate.direction),
		});
		if (!planned.ok) {
			logger.warn("sizing_rejected", {
				instrument: candidate.instrument,
				direction: candidate.direction,
				reason: planned.reason,
				accountEquity,
			});
			emitSafely(this.deps.sink, {
				type: "sizing_rejected",
				instrument: candidate.instrument,
				direction: candidate.direction,
				reason: planned.reason,
			});
			return;
		}

		const opening = ctx.positions.open(planned.plan, atr);
		this.syncExposure(ctx);
		await opening;
		this.syncExposure(ctx);
	}

	private async handleTimer(ctx: InstrumentContext, now: number): Promise<void> {
		this.reportHealth(ctx, ctx.health.check(now));
		await ctx.positions.expireStaleRequests(now);

		const price = this.currentPrice(ctx.spec.symbol);
		if (ctx.health.stale && price !== null) {
			await ctx.positions.evaluate({
				bar: {
					instrument: ctx.spec.symbol,
					timeframe: this.config.timeframes.primary,
					openTime: bucketTimestamp(now, this.primaryMs),
					open: price,
					high: price,
					low: price,
					close: price,
					volume: 0,
				},
				verdict: ctx.lastVerdict,
				sar: null,
			});
		}
		this.syncExposure(ctx);
	}

	private reportHealth(ctx: InstrumentContext, change: FeedHealthChange | null): void {
		if (!change) {
			return;
		}
		emitSafely(this.deps.sink, {
			type: "stale_feed",
			instrument: ctx.spec.symbol,
			stale: change.stale,
			reason: change.reason,
		});
	}

	private syncExposure(ctx: InstrumentContext): void {
		this.stats.setLiveDirections(
			ctx.spec.symbol,
			ctx.positions.getLivePositions().map((position) => position.direction)
		);
	}

	private requireContext(instrument: string): InstrumentContext {
		const ctx = this.contexts.get(instrument);
		if (!ctx) {
			throw new Error(`Unknown instrument ${instrument}`);
		}
		return ctx;
	}
}
