import {
	createLogger,
	errorMessage,
	parseBar,
	timeframeToMs,
	type Bar,
	type Clock,
	type TimerHandle,
} from "@momentumx/core";
import { resolveMarketSymbol, type CcxtMarketClient, type MarketSymbolMap } from "./ccxtClient";

const sourceLogger = createLogger("ccxt_bar_source");

const DEFAULT_POLL_INTERVAL_MS = 10_000;
const FETCH_LIMIT = 5;

export interface CcxtBarSourceOptions {
	client: CcxtMarketClient;
	clock: Clock;
	instrument: string;
	timeframe: string;
	markets?: MarketSymbolMap;
	pollIntervalMs?: number;
}

/** Maps a ccxt OHLCV row; rows with missing fields are rejected by parseBar. */
export const mapOhlcvRow = (
	row: ReadonlyArray<number | undefined>,
	instrument: string,
	timeframe: string
): Bar => {
	const [openTime, open, high, low, close, volume] = row;
	return parseBar(
		{ instrument, timeframe, openTime, open, high, low, close, volume },
		`${instrument}.${timeframe}`
	);
};

/**
 * Polls OHLCV for one instrument and timeframe and emits each closed bar
 * once, oldest first. A bar arriving more than one interval after the last
 * emitted one is flagged as a gap.
 */
export class CcxtBarSource {
	private readonly timeframeMs: number;
	private readonly pollIntervalMs: number;
	private timer: TimerHandle | null = null;
	private running = false;
	private lastOpenTime: number | null = null;
	private onBar: ((bar: Bar) => void) | null = null;

	constructor(private readonly options: CcxtBarSourceOptions) {
		this.timeframeMs = timeframeToMs(options.timeframe);
		this.pollIntervalMs = Math.max(
			options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
			1_000
		);
	}

	start(onBar: (bar: Bar) => void): void {
		if (this.running) {
			throw new Error("CcxtBarSource already running");
		}
		this.running = true;
		this.onBar = onBar;
		sourceLogger.info("polling_source_started", {
			instrument: this.options.instrument,
			timeframe: this.options.timeframe,
			pollIntervalMs: this.pollIntervalMs,
		});
		this.schedulePoll();
	}

	stop(): void {
		if (!this.running) {
			return;
		}
		this.running = false;
		this.onBar = null;
		if (this.timer) {
			this.options.clock.clearTimer(this.timer);
			this.timer = null;
		}
		sourceLogger.info("polling_source_stopped", {
			instrument: this.options.instrument,
			timeframe: this.options.timeframe,
		});
	}

	/** Fetches once and emits any new closed bars; returns how many were emitted. */
	async pollOnce(): Promise<number> {
		const { client, clock, instrument, timeframe } = this.options;
		const rows = await client.fetchOHLCV(
			resolveMarketSymbol(this.options.markets, instrument),
			timeframe,
			undefined,
			FETCH_LIMIT
		);
		const now = clock.now();
		const closed = rows
			.map((row) => mapOhlcvRow(row, instrument, timeframe))
			.filter((bar) => bar.openTime + this.timeframeMs <= now)
			.sort((a, b) => a.openTime - b.openTime);

		let emitted = 0;
		for (const bar of closed) {
			if (this.lastOpenTime !== null && bar.openTime <= this.lastOpenTime) {
				continue;
			}
			const gap =
				this.lastOpenTime !== null &&
				bar.openTime - this.lastOpenTime > this.timeframeMs;
			this.lastOpenTime = bar.openTime;
			emitted += 1;
			this.onBar?.(gap ? { ...bar, gap } : bar);
		}
		return emitted;
	}

	private schedulePoll(): void {
		if (!this.running) {
			return;
		}
		this.timer = this.options.clock.setTimer(this.pollIntervalMs, () => {
			this.timer = null;
			void this.pollOnce()
				.catch((error) => {
					sourceLogger.error("polling_source_error", {
						instrument: this.options.instrument,
						timeframe: this.options.timeframe,
						message: errorMessage(error),
					});
				})
				.finally(() => this.schedulePoll());
		});
	}
}
