import { createLogger, DAY_MS, type RiskConfig } from "@momentumx/core";

const logger = createLogger("risk_guardrails");

export type GuardrailBlock =
	| "daily_loss_limit"
	| "weekly_loss_limit"
	| "max_concurrent_positions";

export interface GuardrailMetrics {
	dailyPnl: number;
	weeklyPnl: number;
	dailyLimit: number;
	weeklyLimit: number;
	livePositions: number;
	maxPositions: number;
}

const dayIndex = (ts: number): number => Math.floor(ts / DAY_MS);

/** Weeks start on Monday (epoch day 0 was a Thursday). */
const weekIndex = (ts: number): number => Math.floor((dayIndex(ts) + 3) / 7);

/**
 * Realized-loss and exposure limits shared by every instrument. Losses are
 * measured against the reference equity the engine started with.
 */
export class RiskGuardrails {
	private dailyKey = -1;
	private weeklyKey = -1;
	private dailyPnl = 0;
	private weeklyPnl = 0;

	constructor(
		private readonly config: RiskConfig,
		private readonly referenceEquity: number
	) {}

	recordRealized(pnl: number, at: number): void {
		this.roll(at);
		this.dailyPnl += pnl;
		this.weeklyPnl += pnl;
		logger.debug("realized_pnl_recorded", {
			pnl,
			dailyPnl: this.dailyPnl,
			weeklyPnl: this.weeklyPnl,
		});
	}

	entryBlock(now: number, livePositions: number): GuardrailBlock | null {
		const metrics = this.metrics(now, livePositions);
		if (metrics.dailyPnl <= -metrics.dailyLimit) {
			return "daily_loss_limit";
		}
		if (metrics.weeklyPnl <= -metrics.weeklyLimit) {
			return "weekly_loss_limit";
		}
		if (livePositions >= this.config.maxConcurrentPositions) {
			return "max_concurrent_positions";
		}
		return null;
	}

	metrics(now: number, livePositions: number): GuardrailMetrics {
		this.roll(now);
		return {
			dailyPnl: this.dailyPnl,
			weeklyPnl: this.weeklyPnl,
			dailyLimit: this.config.maxDailyLossPct * this.referenceEquity,
			weeklyLimit: this.config.maxWeeklyLossPct * this.referenceEquity,
			livePositions,
			maxPositions: this.config.maxConcurrentPositions,
		};
	}

	private roll(ts: number): void {
		const day = dayIndex(ts);
		if (day !== this.dailyKey) {
			this.dailyKey = day;
			this.dailyPnl = 0;
		}
		const week = weekIndex(ts);
		if (week !== this.weeklyKey) {
			this.weeklyKey = week;
			this.weeklyPnl = 0;
		}
	}
}
