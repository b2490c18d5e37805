import {
	createLogger,
	LoggerObservabilitySink,
	ManualClock,
	type EngineConfig,
	type ObservabilitySink,
} from "@momentumx/core";
import {
	PaperAccount,
	PaperExecutionProvider,
	type PaperAccountSnapshot,
} from "@momentumx/execution-engine";
import type { Position } from "@momentumx/position-engine";
import {
	readReplaySession,
	RecordedIndicatorProvider,
	runReplay,
	StrategyOrchestrator,
	type ReplaySummary,
} from "@momentumx/runtime";

const logger = createLogger("trader_cli");

export interface ReplayCommandOptions {
	sessionPath: string;
	config: EngineConfig;
	sink?: ObservabilitySink;
}

export interface ReplayReport {
	summary: ReplaySummary;
	account: PaperAccountSnapshot;
	positions: Position[];
}

/**
 * Replays a recorded session against the paper provider, flattens whatever
 * is still open at the last price and reports the account.
 */
export const runReplayCommand = async (
	options: ReplayCommandOptions
): Promise<ReplayReport> => {
	const { config } = options;
	const events = readReplaySession(options.sessionPath);
	const clock = new ManualClock(0);
	const indicators = new RecordedIndicatorProvider();
	const execution = new PaperExecutionProvider({
		account: new PaperAccount(config.execution.startingEquity),
		instruments: config.instruments,
		clock,
		priceSource: (instrument) => orchestrator.currentPrice(instrument),
	});
	const orchestrator: StrategyOrchestrator = new StrategyOrchestrator(config, {
		clock,
		execution,
		indicators,
		sink: options.sink ?? new LoggerObservabilitySink(),
	});

	for (const instrument of config.instruments) {
		orchestrator.activate(instrument.symbol);
	}

	logger.info("replay_starting", {
		session: options.sessionPath,
		events: events.length,
		instruments: config.instruments.map((instrument) => instrument.symbol),
	});

	const summary = await runReplay(events, { orchestrator, clock, indicators });
	const flattened = await orchestrator.flatten("SHUTDOWN");
	await orchestrator.drain();
	await orchestrator.stop();

	const account = execution.snapshotAccount();
	const positions = config.instruments.flatMap((instrument) =>
		orchestrator.getPositions(instrument.symbol)
	);
	logger.info("paper_account_snapshot", {
		...account,
		flattened: flattened.length,
		positions: positions.length,
	});
	return { summary, account, positions };
};
