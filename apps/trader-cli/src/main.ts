import fs from "node:fs";
import path from "node:path";
import type { Readable } from "node:stream";
import { createLogger, errorMessage, loadEngineConfig, type EngineConfig } from "@momentumx/core";
import {
	createCcxtClient,
	isCcxtExchangeId,
	type CcxtClientOptions,
} from "@momentumx/exchange-ccxt";
import {
	getNumberArg,
	getStringArg,
	parseCliArgs,
	parseMarketMap,
	type ArgValue,
} from "./cliArgs";
import { pipeIndicatorStream, startLiveSession } from "./liveCommand";
import { runReplayCommand } from "./replayCommand";

const logger = createLogger("trader_cli");

const USAGE = [
	"usage: trader-cli replay --session <file.ndjson> [--profile default] [--env .env]",
	"       trader-cli live [--exchange binanceusdm] [--market-type swap] [--markets ES=ES/USDT:USDT]",
	"                       [--indicators <file.ndjson>] [--poll-ms 10000] [--wait-ms 2000] [--profile default] [--env .env]",
].join("\n");

type Args = Record<string, ArgValue>;

const MARKET_TYPES = ["spot", "swap", "future"] as const;
type MarketType = NonNullable<CcxtClientOptions["defaultType"]>;

const isMarketType = (value: string): value is MarketType =>
	MARKET_TYPES.some((type) => type === value);

const loadConfig = (args: Args): EngineConfig => {
	const envPath = getStringArg(args, "env");
	return loadEngineConfig({
		profile: getStringArg(args, "profile"),
		envPath: envPath ? path.resolve(envPath) : undefined,
	});
};

const runReplay = async (args: Args): Promise<void> => {
	const session = getStringArg(args, "session");
	if (!session) {
		logger.error("cli_missing_session", { usage: USAGE });
		process.exitCode = 1;
		return;
	}

	const report = await runReplayCommand({
		sessionPath: path.resolve(session),
		config: loadConfig(args),
	});
	logger.info("cli_finished", {
		bars: report.summary.bars,
		samples: report.summary.samples,
		balance: report.account.balance,
		trades: report.account.trades,
	});
};

const waitForShutdownSignal = (): Promise<NodeJS.Signals> =>
	new Promise((resolve) => {
		process.once("SIGINT", resolve);
		process.once("SIGTERM", resolve);
	});

const runLive = async (args: Args): Promise<void> => {
	// Loaded first so the exchange keys below can come from the same .env.
	const config = loadConfig(args);
	const exchangeId = getStringArg(args, "exchange") ?? process.env.EXCHANGE_ID ?? "binanceusdm";
	const marketType = getStringArg(args, "market-type") ?? process.env.EXCHANGE_MARKET_TYPE ?? "swap";
	if (!isCcxtExchangeId(exchangeId) || !isMarketType(marketType)) {
		logger.error("cli_invalid_exchange", { exchangeId, marketType, usage: USAGE });
		process.exitCode = 1;
		return;
	}

	const client = createCcxtClient({
		exchangeId,
		apiKey: process.env.EXCHANGE_API_KEY,
		secret: process.env.EXCHANGE_API_SECRET,
		defaultType: marketType,
	});
	const session = startLiveSession({
		config,
		client,
		markets: parseMarketMap(getStringArg(args, "markets") ?? process.env.EXCHANGE_MARKETS),
		pollIntervalMs: getNumberArg(args, "poll-ms"),
		indicatorWaitMs: getNumberArg(args, "wait-ms"),
	});

	const indicatorFile = getStringArg(args, "indicators");
	const input: Readable = indicatorFile
		? fs.createReadStream(path.resolve(indicatorFile))
		: process.stdin;
	void pipeIndicatorStream(input, session.indicators)
		.then((accepted) => logger.info("indicator_stream_ended", { accepted }))
		.catch((error) => {
			logger.error("indicator_stream_failed", { message: errorMessage(error) });
		});

	const signal = await waitForShutdownSignal();
	logger.info("live_shutdown_requested", { signal });
	const report = await session.stop();
	input.destroy();
	logger.info("cli_finished", {
		flattened: report.flattened,
		positions: report.positions.length,
	});
};

const main = async (): Promise<void> => {
	const { command, args } = parseCliArgs(process.argv.slice(2));
	switch (command) {
		case "replay":
			return runReplay(args);
		case "live":
			return runLive(args);
		default:
			logger.error("cli_unknown_command", { command: command ?? null, usage: USAGE });
			process.exitCode = 1;
	}
};

main().catch((error) => {
	logger.error("cli_unhandled_error", {
		message: errorMessage(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exitCode = 1;
});
