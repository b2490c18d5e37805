import { createLogger, type Bar, type FeedConfig } from "@momentumx/core";

const logger = createLogger("feed_health");

export type StaleReason = "gap" | "silence";

export interface FeedHealthChange {
	stale: boolean;
	reason: string;
}

/**
 * Tracks whether an instrument's primary feed can be trusted for new
 * entries. A feed goes stale on a gap in the primary series or when nothing
 * arrives for staleAfterMs, and recovers on the next contiguous bar.
 */
export class FeedHealth {
	private lastDataAt: number | null = null;
	private lastPrimaryOpenTime: number | null = null;
	private staleReason: StaleReason | null = null;

	constructor(
		private readonly instrument: string,
		private readonly config: FeedConfig,
		private readonly primaryMs: number
	) {}

	get stale(): boolean {
		return this.staleReason !== null;
	}

	get reason(): StaleReason | null {
		return this.staleReason;
	}

	/** Any data counts as a heartbeat. */
	touch(now: number): void {
		this.lastDataAt = now;
	}

	/** Records a primary bar (already bucket-aligned) and returns a state change, if any. */
	onPrimaryBar(bar: Bar, now: number): FeedHealthChange | null {
		this.touch(now);
		const previous = this.lastPrimaryOpenTime;
		this.lastPrimaryOpenTime = bar.openTime;

		const gapped =
			bar.gap === true ||
			(previous !== null && bar.openTime - previous > this.primaryMs);
		if (gapped) {
			logger.warn("primary_gap_detected", {
				instrument: this.instrument,
				openTime: bar.openTime,
				previousOpenTime: previous,
			});
			return this.markStale("gap");
		}
		return this.markFresh();
	}

	/** Silence check run on timer ticks. */
	check(now: number): FeedHealthChange | null {
		if (this.lastDataAt === null || this.staleReason !== null) {
			return null;
		}
		if (now - this.lastDataAt > this.config.staleAfterMs) {
			return this.markStale("silence");
		}
		return null;
	}

	private markStale(reason: StaleReason): FeedHealthChange | null {
		if (this.staleReason === reason) {
			return null;
		}
		this.staleReason = reason;
		return { stale: true, reason };
	}

	private markFresh(): FeedHealthChange | null {
		if (this.staleReason === null) {
			return null;
		}
		const reason = `recovered_from_${this.staleReason}`;
		this.staleReason = null;
		return { stale: false, reason };
	}
}
