import fs from "node:fs";
import {
	BoundaryParseError,
	bucketTimestamp,
	parseBar,
	parseIndicatorSnapshot,
	parseOrderbookSample,
	timeframeToMs,
	type Bar,
	type IndicatorSnapshot,
	type OrderbookSample,
} from "@momentumx/core";

export type ReplayEvent =
	| {
			type: "bar";
			/** Close time of the bar; the replay clock is advanced to it */
			at: number;
			bar: Bar;
			snapshot: IndicatorSnapshot | null;
	  }
	| { type: "orderbook"; at: number; sample: OrderbookSample };

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const parseBarLine = (record: Record<string, unknown>, field: string): ReplayEvent => {
	const parsed = parseBar(record.bar, `${field}.bar`);
	const tfMs = timeframeToMs(parsed.timeframe);
	const bar: Bar = { ...parsed, openTime: bucketTimestamp(parsed.openTime, tfMs) };
	const snapshot =
		record.indicators === undefined
			? null
			: parseIndicatorSnapshot(bar, record.indicators, `${field}.indicators`);
	return { type: "bar", at: bar.openTime + tfMs, bar, snapshot };
};

/**
 * Parses one session line. Blank lines and lines starting with `#` yield
 * null.
 */
export const parseReplayLine = (line: string, lineNumber: number): ReplayEvent | null => {
	const trimmed = line.trim();
	if (!trimmed || trimmed.startsWith("#")) {
		return null;
	}

	const field = `line ${lineNumber}`;
	let payload: unknown;
	try {
		payload = JSON.parse(trimmed);
	} catch (error) {
		throw new BoundaryParseError(
			field,
			`invalid JSON (${error instanceof Error ? error.message : String(error)})`
		);
	}
	if (!isRecord(payload)) {
		throw new BoundaryParseError(field, "expected an object");
	}

	switch (payload.type) {
		case "bar":
			return parseBarLine(payload, field);
		case "orderbook": {
			const sample = parseOrderbookSample(payload.sample, `${field}.sample`);
			return { type: "orderbook", at: sample.timestamp, sample };
		}
		default:
			throw new BoundaryParseError(
				`${field}.type`,
				`unknown event type ${JSON.stringify(payload.type)}`
			);
	}
};

export const parseReplaySession = (content: string): ReplayEvent[] => {
	const events: ReplayEvent[] = [];
	content.split(/\r?\n/).forEach((line, index) => {
		const event = parseReplayLine(line, index + 1);
		if (event) {
			events.push(event);
		}
	});
	return events;
};

export const readReplaySession = (filePath: string): ReplayEvent[] =>
	parseReplaySession(fs.readFileSync(filePath, "utf8"));
