import type { Bar, IndicatorSnapshot } from "../types";
import { bucketTimestamp, timeframeToMs } from "../time";

export interface BarStoreOptions {
	/** Maximum bars per timeframe (can be overridden per TF) */
	maxBarsByTimeframe?: Record<string, number>;
	/** Default maximum bars if not specified per timeframe */
	defaultMaxBars: number;
}

interface Timestamped {
	openTime: number;
}

/**
 * Per-instrument history of closed bars and the indicator snapshots computed
 * on them.
 *
 * - Bars and snapshots are kept by timeframe in ascending openTime order
 * - openTime is normalized to the timeframe bucket
 * - A second write for the same openTime replaces the first
 * - Each series is trimmed to its window limit
 */
export class BarStore {
	private readonly bars = new Map<string, Bar[]>();
	private readonly snapshots = new Map<string, IndicatorSnapshot[]>();
	private readonly maxBars: Map<string, number>;
	private readonly defaultMax: number;

	constructor(options: BarStoreOptions) {
		this.defaultMax = Math.max(options.defaultMaxBars, 1);
		this.maxBars = new Map();
		if (options.maxBarsByTimeframe) {
			for (const [tf, max] of Object.entries(options.maxBarsByTimeframe)) {
				this.maxBars.set(tf, Math.max(max, 1));
			}
		}
	}

	ingest(bar: Bar): Bar {
		const normalized: Bar = {
			...bar,
			openTime: bucketTimestamp(bar.openTime, timeframeToMs(bar.timeframe)),
		};
		this.insert(this.bars, bar.timeframe, normalized);
		return normalized;
	}

	attachSnapshot(snapshot: IndicatorSnapshot): void {
		const normalized: IndicatorSnapshot = {
			...snapshot,
			openTime: bucketTimestamp(
				snapshot.openTime,
				timeframeToMs(snapshot.timeframe)
			),
		};
		this.insert(this.snapshots, snapshot.timeframe, normalized);
	}

	/** Defensive copy of the bar series */
	getSeries(timeframe: string): Bar[] {
		return [...(this.bars.get(timeframe) ?? [])];
	}

	getLatestBar(timeframe: string): Bar | undefined {
		const series = this.bars.get(timeframe);
		return series?.[series.length - 1];
	}

	/** The bar immediately before the latest one */
	getPreviousBar(timeframe: string): Bar | undefined {
		const series = this.bars.get(timeframe);
		return series?.[series.length - 2];
	}

	barCount(timeframe: string): number {
		return this.bars.get(timeframe)?.length ?? 0;
	}

	/** Last `count` snapshots, oldest first */
	getSnapshots(timeframe: string, count: number): IndicatorSnapshot[] {
		const series = this.snapshots.get(timeframe) ?? [];
		return series.slice(Math.max(series.length - Math.max(count, 0), 0));
	}

	getLatestSnapshot(timeframe: string): IndicatorSnapshot | undefined {
		const series = this.snapshots.get(timeframe);
		return series?.[series.length - 1];
	}

	getTimeframes(): string[] {
		return Array.from(this.bars.keys());
	}

	clear(): void {
		this.bars.clear();
		this.snapshots.clear();
	}

	private insert<T extends Timestamped>(
		store: Map<string, T[]>,
		timeframe: string,
		item: T
	): void {
		let series = store.get(timeframe);
		if (!series) {
			series = [];
			store.set(timeframe, series);
		}

		let insertIdx = 0;
		for (let i = series.length - 1; i >= 0; i--) {
			const existing = series[i];
			if (!existing) continue;

			if (existing.openTime === item.openTime) {
				series[i] = item;
				return;
			}
			if (existing.openTime < item.openTime) {
				insertIdx = i + 1;
				break;
			}
		}

		series.splice(insertIdx, 0, item);
		const limit = this.maxBars.get(timeframe) ?? this.defaultMax;
		if (series.length > limit) {
			series.splice(0, series.length - limit);
		}
	}
}
