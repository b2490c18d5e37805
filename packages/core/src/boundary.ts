import { BoundaryParseError } from "./errors";
import type { Bar, IcebergLevel, IndicatorSnapshot, OrderbookSample } from "./types";

type Loose = Record<string, unknown>;

const isRecord = (value: unknown): value is Loose =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const expectRecord = (value: unknown, field: string): Loose => {
	if (!isRecord(value)) {
		throw new BoundaryParseError(field, "expected an object");
	}
	return value;
};

/** Accepts numbers and numeric strings (exchange payloads send both). */
export const toFiniteNumber = (value: unknown): number | null => {
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : null;
	}
	if (typeof value === "string" && value.trim().length > 0) {
		const parsed = Number(value);
		return Number.isFinite(parsed) ? parsed : null;
	}
	return null;
};

const requireNumber = (record: Loose, key: string, field: string): number => {
	const value = toFiniteNumber(record[key]);
	if (value === null) {
		throw new BoundaryParseError(
			`${field}.${key}`,
			`expected a finite number, got ${JSON.stringify(record[key])}`
		);
	}
	return value;
};

const optionalNumber = (record: Loose, key: string, field: string): number | null => {
	if (record[key] === undefined || record[key] === null) {
		return null;
	}
	return requireNumber(record, key, field);
};

const requireString = (record: Loose, key: string, field: string): string => {
	const value = record[key];
	if (typeof value !== "string" || value.trim().length === 0) {
		throw new BoundaryParseError(`${field}.${key}`, "expected a non-empty string");
	}
	return value;
};

export const parseBar = (payload: unknown, field = "bar"): Bar => {
	const record = expectRecord(payload, field);
	const bar: Bar = {
		instrument: requireString(record, "instrument", field),
		timeframe: requireString(record, "timeframe", field),
		openTime: requireNumber(record, "openTime", field),
		open: requireNumber(record, "open", field),
		high: requireNumber(record, "high", field),
		low: requireNumber(record, "low", field),
		close: requireNumber(record, "close", field),
		volume: requireNumber(record, "volume", field),
	};

	if (bar.high < bar.low) {
		throw new BoundaryParseError(
			`${field}.high`,
			`high ${bar.high} is below low ${bar.low}`
		);
	}
	if (bar.volume < 0) {
		throw new BoundaryParseError(`${field}.volume`, "volume must not be negative");
	}
	if (record.gap === true) {
		bar.gap = true;
	}
	return bar;
};

/**
 * Indicator values keyed by name. Null entries are dropped so that the core
 * treats them as "not available".
 */
export const parseIndicatorValues = (
	payload: unknown,
	field = "indicators"
): Record<string, number> => {
	const record = expectRecord(payload, field);
	const values: Record<string, number> = {};
	for (const [key, raw] of Object.entries(record)) {
		if (raw === null || raw === undefined) {
			continue;
		}
		const value = toFiniteNumber(raw);
		if (value === null) {
			throw new BoundaryParseError(
				`${field}.${key}`,
				`expected a finite number, got ${JSON.stringify(raw)}`
			);
		}
		values[key] = value;
	}
	return values;
};

export const parseIndicatorSnapshot = (
	bar: Bar,
	payload: unknown,
	field = "indicators"
): IndicatorSnapshot => ({
	instrument: bar.instrument,
	timeframe: bar.timeframe,
	openTime: bar.openTime,
	values: parseIndicatorValues(payload, field),
});

const parseIceberg = (payload: unknown, field: string): IcebergLevel => {
	const record = expectRecord(payload, field);
	const side = record.side;
	if (side !== "bid" && side !== "ask") {
		throw new BoundaryParseError(`${field}.side`, `expected "bid" or "ask"`);
	}
	const refills = optionalNumber(record, "refills", field);
	return {
		side,
		price: requireNumber(record, "price", field),
		...(refills !== null ? { refills } : {}),
	};
};

export const parseOrderbookSample = (
	payload: unknown,
	field = "orderbook"
): OrderbookSample => {
	const record = expectRecord(payload, field);
	const rawIcebergs = record.icebergs ?? [];
	if (!Array.isArray(rawIcebergs)) {
		throw new BoundaryParseError(`${field}.icebergs`, "expected an array");
	}

	const imbalance = optionalNumber(record, "imbalance", field);
	if (imbalance !== null && imbalance < 0) {
		throw new BoundaryParseError(
			`${field}.imbalance`,
			"imbalance must not be negative"
		);
	}

	return {
		instrument: requireString(record, "instrument", field),
		timestamp: requireNumber(record, "timestamp", field),
		imbalance,
		icebergs: rawIcebergs.map((entry, idx) =>
			parseIceberg(entry, `${field}.icebergs[${idx}]`)
		),
		bidVolume: optionalNumber(record, "bidVolume", field),
		askVolume: optionalNumber(record, "askVolume", field),
	};
};
