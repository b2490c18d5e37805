import {
	BoundaryParseError,
	bucketTimestamp,
	createLogger,
	errorMessage,
	parseIndicatorValues,
	timeframeToMs,
	toFiniteNumber,
	type Bar,
	type Clock,
	type IndicatorSnapshot,
} from "@momentumx/core";

const logger = createLogger("indicator_provider");

/**
 * Computes the snapshot for the newest bar of a series. Returns null when
 * the provider has nothing for that bar yet.
 */
export interface IndicatorProvider {
	compute(
		instrument: string,
		timeframe: string,
		bars: readonly Bar[]
	): IndicatorSnapshot | null | Promise<IndicatorSnapshot | null>;
}

const snapshotKey = (instrument: string, timeframe: string, openTime: number): string =>
	`${instrument}:${timeframe}:${openTime}`;

/** Serves snapshots recorded alongside a session's bars. */
export class RecordedIndicatorProvider implements IndicatorProvider {
	private readonly snapshots = new Map<string, IndicatorSnapshot>();

	record(snapshot: IndicatorSnapshot): void {
		this.snapshots.set(
			snapshotKey(snapshot.instrument, snapshot.timeframe, snapshot.openTime),
			snapshot
		);
	}

	compute(
		instrument: string,
		timeframe: string,
		bars: readonly Bar[]
	): IndicatorSnapshot | null {
		const latest = bars[bars.length - 1];
		if (!latest) {
			return null;
		}
		const key = snapshotKey(instrument, timeframe, latest.openTime);
		const snapshot = this.snapshots.get(key);
		if (snapshot) {
			this.snapshots.delete(key);
		}
		return snapshot ?? null;
	}

	get size(): number {
		return this.snapshots.size;
	}
}

export interface StreamedIndicatorOptions {
	clock: Clock;
	/** How long compute waits for a snapshot that has not arrived yet */
	waitMs: number;
	/** Unclaimed snapshots kept before the oldest are dropped */
	maxBuffered?: number;
}

const DEFAULT_MAX_BUFFERED = 1_000;

/**
 * Serves snapshots pushed by an external indicator process. A bar whose
 * snapshot is late waits up to `waitMs` for it, then evaluates without one.
 */
export class StreamedIndicatorProvider implements IndicatorProvider {
	private readonly buffered = new Map<string, IndicatorSnapshot>();
	private readonly waiting = new Map<string, (snapshot: IndicatorSnapshot) => void>();

	constructor(private readonly options: StreamedIndicatorOptions) {}

	push(snapshot: IndicatorSnapshot): void {
		const key = snapshotKey(snapshot.instrument, snapshot.timeframe, snapshot.openTime);
		const waiter = this.waiting.get(key);
		if (waiter) {
			this.waiting.delete(key);
			waiter(snapshot);
			return;
		}
		this.buffered.set(key, snapshot);
		const limit = this.options.maxBuffered ?? DEFAULT_MAX_BUFFERED;
		for (const oldest of this.buffered.keys()) {
			if (this.buffered.size <= limit) {
				break;
			}
			this.buffered.delete(oldest);
		}
	}

	compute(
		instrument: string,
		timeframe: string,
		bars: readonly Bar[]
	): IndicatorSnapshot | null | Promise<IndicatorSnapshot | null> {
		const latest = bars[bars.length - 1];
		if (!latest) {
			return null;
		}
		const key = snapshotKey(instrument, timeframe, latest.openTime);
		const ready = this.buffered.get(key);
		if (ready) {
			this.buffered.delete(key);
			return ready;
		}
		return new Promise((resolve) => {
			const timer = this.options.clock.setTimer(this.options.waitMs, () => {
				this.waiting.delete(key);
				logger.warn("indicator_snapshot_late", {
					instrument,
					timeframe,
					openTime: latest.openTime,
					waitMs: this.options.waitMs,
				});
				resolve(null);
			});
			this.waiting.set(key, (snapshot) => {
				this.options.clock.clearTimer(timer);
				resolve(snapshot);
			});
		});
	}

	get size(): number {
		return this.buffered.size;
	}
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Parses one streamed snapshot line:
 * `{"instrument":"ES","timeframe":"15s","openTime":0,"values":{...}}`.
 * Blank lines and `#` comments yield null.
 */
export const parseIndicatorLine = (line: string, field = "indicators"): IndicatorSnapshot | null => {
	const trimmed = line.trim();
	if (!trimmed || trimmed.startsWith("#")) {
		return null;
	}
	let payload: unknown;
	try {
		payload = JSON.parse(trimmed);
	} catch (error) {
		throw new BoundaryParseError(
			field,
			`invalid JSON (${errorMessage(error)})`
		);
	}
	if (!isRecord(payload)) {
		throw new BoundaryParseError(field, "expected an object");
	}
	const { instrument, timeframe } = payload;
	if (typeof instrument !== "string" || !instrument) {
		throw new BoundaryParseError(`${field}.instrument`, "expected a symbol");
	}
	if (typeof timeframe !== "string") {
		throw new BoundaryParseError(`${field}.timeframe`, "expected a timeframe");
	}
	const openTime = toFiniteNumber(payload.openTime);
	if (openTime === null) {
		throw new BoundaryParseError(`${field}.openTime`, "expected a timestamp");
	}
	return {
		instrument,
		timeframe,
		openTime: bucketTimestamp(openTime, timeframeToMs(timeframe)),
		values: parseIndicatorValues(payload.values, `${field}.values`),
	};
};
