/**
 * Pure time utilities for deterministic timestamp handling
 * All functions operate on UTC epoch milliseconds only (no timezone conversion)
 */
import { DAY_MS, HOUR_MS, MINUTE_MS, SECOND_MS } from "./constants";

export type TimeframeUnit = "s" | "m" | "h" | "d";

export interface ParsedTimeframe {
	unit: TimeframeUnit;
	n: number;
	ms: number;
}

const UNIT_MS: Record<TimeframeUnit, number> = {
	s: SECOND_MS,
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
};

const TIMEFRAME_PATTERN = /^(\d+)(s|sec|m|min|h|d)$/;

const toUnit = (token: string): TimeframeUnit | null => {
	switch (token) {
		case "s":
		case "sec":
			return "s";
		case "m":
		case "min":
			return "m";
		case "h":
			return "h";
		case "d":
			return "d";
		default:
			return null;
	}
};

/**
 * Parse timeframe string into structured format
 * @param timeframe - Format: "15s", "1m", "5m", "15m", "1h", "1d" ("15sec" and "5min" are accepted too)
 * @throws Error if timeframe format is invalid
 */
export const parseTimeframe = (timeframe: string): ParsedTimeframe => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const trimmed = timeframe.trim().toLowerCase();
	const match = trimmed.match(TIMEFRAME_PATTERN);
	const unit = match?.[2] ? toUnit(match[2]) : null;

	if (!match?.[1] || !unit) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "15s", "1m", "5m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	return { unit, n, ms: n * UNIT_MS[unit] };
};

/**
 * Parse timeframe string to milliseconds
 * @throws Error if timeframe format is invalid
 */
export const timeframeToMs = (timeframe: string): number =>
	parseTimeframe(timeframe).ms;

/**
 * Bucket a timestamp to the start of its timeframe period
 * @example bucketTimestamp(1735690261234, 60000) => 1735690260000
 */
export const bucketTimestamp = (ts: number, tfMs: number): number => {
	if (!Number.isFinite(ts) || ts < 0) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	if (!Number.isFinite(tfMs) || tfMs <= 0) {
		throw new Error(`Invalid timeframe ms: ${tfMs}`);
	}
	return Math.floor(ts / tfMs) * tfMs;
};

export const isBucketAligned = (ts: number, tfMs: number): boolean => {
	return ts === bucketTimestamp(ts, tfMs);
};
