import readline from "node:readline";
import {
	createLogger,
	errorMessage,
	LoggerObservabilitySink,
	SystemClock,
	type Clock,
	type EngineConfig,
	type ObservabilitySink,
	type TimerHandle,
} from "@momentumx/core";
import {
	PaperAccount,
	PaperExecutionProvider,
	type ExecutionProvider,
} from "@momentumx/execution-engine";
import {
	CcxtBarSource,
	CcxtExecutionProvider,
	CcxtOrderbookProvider,
	type CcxtExchangeClient,
	type MarketSymbolMap,
} from "@momentumx/exchange-ccxt";
import type { Position } from "@momentumx/position-engine";
import {
	parseIndicatorLine,
	StreamedIndicatorProvider,
	StrategyOrchestrator,
} from "@momentumx/runtime";

const logger = createLogger("trader_cli");

/** Default wait for a bar's snapshot from the indicator stream */
const DEFAULT_INDICATOR_WAIT_MS = 2_000;

export interface LiveCommandOptions {
	config: EngineConfig;
	client: CcxtExchangeClient;
	clock?: Clock;
	markets?: MarketSymbolMap;
	pollIntervalMs?: number;
	indicatorWaitMs?: number;
	sink?: ObservabilitySink;
}

export interface LiveReport {
	flattened: number;
	positions: Position[];
}

export interface LiveSession {
	readonly orchestrator: StrategyOrchestrator;
	readonly indicators: StreamedIndicatorProvider;
	readonly execution: ExecutionProvider;
	/** Stops polling and the heartbeat, flattens open positions and drains. */
	stop(): Promise<LiveReport>;
}

const uniqueTimeframes = (config: EngineConfig): string[] =>
	Array.from(new Set(Object.values(config.timeframes)));

/**
 * Trades live market data: bars and order books are polled through ccxt,
 * indicator snapshots are pushed in by an external process, and orders go
 * to the exchange when `execution.mode` is "live", to a paper account
 * otherwise.
 */
export const startLiveSession = (options: LiveCommandOptions): LiveSession => {
	const { config, client, markets } = options;
	const clock = options.clock ?? new SystemClock();
	const indicators = new StreamedIndicatorProvider({
		clock,
		waitMs: options.indicatorWaitMs ?? DEFAULT_INDICATOR_WAIT_MS,
	});
	const execution: ExecutionProvider =
		config.execution.mode === "live"
			? new CcxtExecutionProvider({ client, clock, markets })
			: new PaperExecutionProvider({
					account: new PaperAccount(config.execution.startingEquity),
					instruments: config.instruments,
					clock,
					priceSource: (instrument) => orchestrator.currentPrice(instrument),
				});
	const orchestrator = new StrategyOrchestrator(config, {
		clock,
		execution,
		indicators,
		orderbook: new CcxtOrderbookProvider({ client, clock, markets }),
		sink: options.sink ?? new LoggerObservabilitySink(),
	});

	const sources = config.instruments.flatMap((instrument) =>
		uniqueTimeframes(config).map(
			(timeframe) =>
				new CcxtBarSource({
					client,
					clock,
					instrument: instrument.symbol,
					timeframe,
					markets,
					pollIntervalMs: options.pollIntervalMs,
				})
		)
	);

	for (const instrument of config.instruments) {
		orchestrator.activate(instrument.symbol);
	}
	for (const source of sources) {
		source.start((bar) => {
			void orchestrator.onBar(bar.instrument, bar.timeframe, bar);
		});
	}

	let heartbeat: TimerHandle | null = null;
	let stopping: Promise<LiveReport> | null = null;
	const scheduleHeartbeat = (): void => {
		heartbeat = clock.setTimer(config.feed.heartbeatMs, () => {
			scheduleHeartbeat();
			void orchestrator.heartbeat();
		});
	};
	scheduleHeartbeat();

	logger.info("live_session_started", {
		mode: config.execution.mode,
		instruments: config.instruments.map((instrument) => instrument.symbol),
		sources: sources.length,
		heartbeatMs: config.feed.heartbeatMs,
	});

	const shutdown = async (): Promise<LiveReport> => {
		for (const source of sources) {
			source.stop();
		}
		if (heartbeat) {
			clock.clearTimer(heartbeat);
			heartbeat = null;
		}
		const flattened = await orchestrator.flatten("SHUTDOWN");
		await orchestrator.drain();
		await orchestrator.stop();
		const positions = config.instruments.flatMap((instrument) =>
			orchestrator.getPositions(instrument.symbol)
		);
		logger.info("live_session_stopped", {
			flattened: flattened.length,
			positions: positions.length,
		});
		return { flattened: flattened.length, positions };
	};

	return {
		orchestrator,
		indicators,
		execution,
		stop: () => {
			if (!stopping) {
				stopping = shutdown();
			}
			return stopping;
		},
	};
};

/**
 * Feeds newline-delimited snapshots into the provider until the stream
 * ends. Malformed lines are logged and skipped; returns how many were
 * accepted.
 */
export const pipeIndicatorStream = async (
	input: NodeJS.ReadableStream,
	indicators: StreamedIndicatorProvider
): Promise<number> => {
	const lines = readline.createInterface({ input, crlfDelay: Infinity });
	let accepted = 0;
	let lineNumber = 0;
	for await (const line of lines) {
		lineNumber += 1;
		try {
			const snapshot = parseIndicatorLine(line, `line ${lineNumber}`);
			if (snapshot) {
				indicators.push(snapshot);
				accepted += 1;
			}
		} catch (error) {
			logger.warn("indicator_line_rejected", {
				line: lineNumber,
				error: errorMessage(error),
			});
		}
	}
	return accepted;
};
