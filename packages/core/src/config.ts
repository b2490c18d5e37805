import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigurationError } from "./errors";
import { timeframeToMs } from "./time";

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

export type ExecutionMode = "paper" | "live";

export type TimeframeRole = "primary" | "fast" | "middle" | "slow";

export interface InstrumentSpec {
	readonly symbol: string;
	readonly tickSize: number;
	readonly tickValue: number;
}

export interface TimeframeConfig {
	/** Bars that drive evaluation (hysteresis, breaks, exits) */
	readonly primary: string;
	/** Explosion-trend verification; also volume and ATR source */
	readonly fast: string;
	/** Momentum histogram */
	readonly middle: string;
	/** EMA alignment */
	readonly slow: string;
	/** Timeframe whose snapshot carries FVG / order-block zones */
	readonly patterns: string;
}

export interface HistoryConfig {
	readonly minBars: Readonly<Record<TimeframeRole, number>>;
	readonly maxBars: number;
}

export interface RiskConfig {
	readonly riskFraction: number;
	readonly maxConcurrentPositions: number;
	readonly maxContractsPerPosition: number;
	readonly stopPct: number;
	readonly stopTicks: number;
	readonly rewardRisk: number;
	readonly volatilityStopMultiple: number;
	readonly maxDailyLossPct: number;
	readonly maxWeeklyLossPct: number;
}

export interface SignalConfig {
	readonly rsiOversold: number;
	readonly rsiLongTrigger: number;
	readonly rsiOverbought: number;
	readonly rsiShortTrigger: number;
	readonly armExpiryBars: number;
	readonly explosionSensitivity: number;
	readonly zoneToleranceTicks: number;
}

export interface ConfirmationConfig {
	readonly imbalanceLong: number;
	readonly imbalanceShort: number;
	readonly rejectionMargin: number;
	readonly windowMs: number;
	readonly sampleIntervalMs: number;
	readonly depthLevels: number;
	readonly icebergCheck: boolean;
}

export interface ExitConfig {
	readonly timeExitMs: number;
	readonly breakevenThresholdTicks: number;
	readonly trailingActivationMultiple: number;
	readonly breakevenLockTicks: number | null;
}

export interface ExecutionConfig {
	readonly mode: ExecutionMode;
	readonly maxRetries: number;
	readonly ackTimeoutMs: number;
	readonly startingEquity: number;
}

export interface FilterConfig {
	readonly volumeThresholdFraction: number;
	readonly volumeLookbackBars: number;
	readonly correlationThreshold: number;
	readonly correlationLookbackBars: number;
}

export interface FeedConfig {
	readonly staleAfterMs: number;
	readonly heartbeatMs: number;
}

export interface EngineConfig {
	readonly instruments: readonly InstrumentSpec[];
	readonly timeframes: TimeframeConfig;
	readonly history: HistoryConfig;
	readonly risk: RiskConfig;
	readonly signal: SignalConfig;
	readonly confirmation: ConfirmationConfig;
	readonly exits: ExitConfig;
	readonly execution: ExecutionConfig;
	readonly filters: FilterConfig;
	readonly feed: FeedConfig;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	instruments: [{ symbol: "ES", tickSize: 0.25, tickValue: 12.5 }],
	timeframes: {
		primary: "15s",
		fast: "1m",
		middle: "5m",
		slow: "15m",
		patterns: "5m",
	},
	history: {
		minBars: { primary: 2, fast: 1, middle: 1, slow: 2 },
		maxBars: 500,
	},
	risk: {
		riskFraction: 0.005,
		maxConcurrentPositions: 3,
		maxContractsPerPosition: 10,
		stopPct: 0.01,
		stopTicks: 10,
		rewardRisk: 2,
		volatilityStopMultiple: 1,
		maxDailyLossPct: 0.03,
		maxWeeklyLossPct: 0.05,
	},
	signal: {
		rsiOversold: 30,
		rsiLongTrigger: 40,
		rsiOverbought: 70,
		rsiShortTrigger: 60,
		armExpiryBars: 20,
		explosionSensitivity: 0,
		zoneToleranceTicks: 2,
	},
	confirmation: {
		imbalanceLong: 1.5,
		imbalanceShort: 0.6667,
		rejectionMargin: 0.1,
		windowMs: 7_500,
		sampleIntervalMs: 500,
		depthLevels: 5,
		icebergCheck: true,
	},
	exits: {
		timeExitMs: 300_000,
		breakevenThresholdTicks: 0,
		trailingActivationMultiple: 1,
		breakevenLockTicks: null,
	},
	execution: {
		mode: "paper",
		maxRetries: 3,
		ackTimeoutMs: 10_000,
		startingEquity: 50_000,
	},
	filters: {
		volumeThresholdFraction: 0.2,
		volumeLookbackBars: 20,
		correlationThreshold: 0.8,
		correlationLookbackBars: 50,
	},
	feed: {
		staleAfterMs: 60_000,
		heartbeatMs: 1_000,
	},
};

/** Values taken from the environment; each wins over the profile file. */
export interface EngineEnvOverrides {
	profile?: string;
	mode?: string;
	instrument?: string;
	riskFraction?: string;
	maxConcurrentPositions?: string;
	imbalanceLong?: string;
	imbalanceShort?: string;
	windowMs?: string;
	timeExitMinutes?: string;
	maxRetries?: string;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	profile?: string;
}

const configMetadata = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = configMetadata.get(config);
	configMetadata.set(config, { ...existing, ...metadata });
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null =>
	configMetadata.get(config) ?? null;

let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isWorkspaceRoot = (dir: string): boolean => {
	if (fs.existsSync(path.join(dir, ".git"))) {
		return true;
	}
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
	return isRecord(parsed) && Array.isArray(parsed.workspaces);
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();
	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

const readOptionalEnvVar = (
	env: NodeJS.ProcessEnv,
	key: string
): string | undefined => {
	const value = env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

export const readEnvOverrides = (
	env: NodeJS.ProcessEnv = process.env
): EngineEnvOverrides => ({
	profile: readOptionalEnvVar(env, "ENGINE_PROFILE"),
	mode: readOptionalEnvVar(env, "TRADING_MODE"),
	instrument: readOptionalEnvVar(env, "TRADING_INSTRUMENT"),
	riskFraction: readOptionalEnvVar(env, "RISK_PER_TRADE"),
	maxConcurrentPositions: readOptionalEnvVar(env, "MAX_CONCURRENT_TRADES"),
	imbalanceLong: readOptionalEnvVar(env, "IMBALANCE_LONG"),
	imbalanceShort: readOptionalEnvVar(env, "IMBALANCE_SHORT"),
	windowMs: readOptionalEnvVar(env, "CONFIRMATION_WINDOW_MS"),
	timeExitMinutes: readOptionalEnvVar(env, "TIME_EXIT_MINUTES"),
	maxRetries: readOptionalEnvVar(env, "MAX_EXECUTION_RETRIES"),
});

export const loadEnvConfig = (
	envPath = path.join(findWorkspaceRoot(), ".env")
): EngineEnvOverrides => {
	if (loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		loadedEnvPath = envPath;
	}
	return readEnvOverrides(process.env);
};

/**
 * Collects every problem in one pass so a bad profile reports all of its
 * fields at once instead of failing on the first.
 */
class ConfigReader {
	readonly issues: string[] = [];

	section(source: Record<string, unknown>, key: string): Record<string, unknown> {
		const value = source[key];
		if (value === undefined) {
			return {};
		}
		if (!isRecord(value)) {
			this.issues.push(`${key} must be an object`);
			return {};
		}
		return value;
	}

	number(
		source: Record<string, unknown>,
		key: string,
		field: string,
		fallback: number
	): number {
		const value = source[key];
		if (value === undefined) {
			return fallback;
		}
		if (typeof value !== "number" || !Number.isFinite(value)) {
			this.issues.push(`${field} must be a finite number`);
			return fallback;
		}
		return value;
	}

	nullableNumber(
		source: Record<string, unknown>,
		key: string,
		field: string,
		fallback: number | null
	): number | null {
		const value = source[key];
		if (value === undefined) {
			return fallback;
		}
		if (value === null) {
			return null;
		}
		return this.number(source, key, field, 0);
	}

	string(
		source: Record<string, unknown>,
		key: string,
		field: string,
		fallback: string
	): string {
		const value = source[key];
		if (value === undefined) {
			return fallback;
		}
		if (typeof value !== "string" || value.trim().length === 0) {
			this.issues.push(`${field} must be a non-empty string`);
			return fallback;
		}
		return value.trim();
	}

	boolean(
		source: Record<string, unknown>,
		key: string,
		field: string,
		fallback: boolean
	): boolean {
		const value = source[key];
		if (value === undefined) {
			return fallback;
		}
		if (typeof value !== "boolean") {
			this.issues.push(`${field} must be a boolean`);
			return fallback;
		}
		return value;
	}

	envNumber(raw: string | undefined, name: string, fallback: number): number {
		if (raw === undefined) {
			return fallback;
		}
		const parsed = Number(raw);
		if (!Number.isFinite(parsed)) {
			this.issues.push(`${name} must be numeric, got "${raw}"`);
			return fallback;
		}
		return parsed;
	}

	check(condition: boolean, message: string): void {
		if (!condition) {
			this.issues.push(message);
		}
	}
}

const readInstruments = (
	reader: ConfigReader,
	value: unknown
): InstrumentSpec[] => {
	if (value === undefined) {
		return DEFAULT_ENGINE_CONFIG.instruments.map((spec) => ({ ...spec }));
	}
	if (!Array.isArray(value)) {
		reader.issues.push("instruments must be an array");
		return [];
	}
	return value.map((entry: unknown, index) => {
		const field = `instruments[${index}]`;
		const source = isRecord(entry) ? entry : {};
		if (!isRecord(entry)) {
			reader.issues.push(`${field} must be an object`);
		}
		return {
			symbol: reader.string(source, "symbol", `${field}.symbol`, ""),
			tickSize: reader.number(source, "tickSize", `${field}.tickSize`, 0),
			tickValue: reader.number(source, "tickValue", `${field}.tickValue`, 0),
		};
	});
};

const isPositiveInteger = (value: number): boolean =>
	Number.isInteger(value) && value >= 1;

const validTimeframeMs = (reader: ConfigReader, field: string, value: string): number => {
	try {
		return timeframeToMs(value);
	} catch (error) {
		reader.issues.push(
			`${field}: ${error instanceof Error ? error.message : String(error)}`
		);
		return 0;
	}
};

const validate = (reader: ConfigReader, config: EngineConfig): void => {
	const check = reader.check.bind(reader);

	check(config.instruments.length > 0, "at least one instrument is required");
	const symbols = new Set<string>();
	config.instruments.forEach((spec, index) => {
		check(spec.symbol.length > 0, `instruments[${index}].symbol is required`);
		check(!symbols.has(spec.symbol), `instrument ${spec.symbol} is listed twice`);
		symbols.add(spec.symbol);
		check(spec.tickSize > 0, `instruments[${index}].tickSize must be > 0`);
		check(spec.tickValue > 0, `instruments[${index}].tickValue must be > 0`);
	});

	const { timeframes } = config;
	const primaryMs = validTimeframeMs(reader, "timeframes.primary", timeframes.primary);
	const fastMs = validTimeframeMs(reader, "timeframes.fast", timeframes.fast);
	const middleMs = validTimeframeMs(reader, "timeframes.middle", timeframes.middle);
	const slowMs = validTimeframeMs(reader, "timeframes.slow", timeframes.slow);
	validTimeframeMs(reader, "timeframes.patterns", timeframes.patterns);
	if (primaryMs && fastMs && middleMs && slowMs) {
		check(
			primaryMs < fastMs && fastMs < middleMs && middleMs < slowMs,
			"timeframes must be strictly increasing: primary < fast < middle < slow"
		);
	}

	for (const [role, count] of Object.entries(config.history.minBars)) {
		check(
			Number.isInteger(count) && count >= 0,
			`history.minBars.${role} must be a non-negative integer`
		);
	}
	check(
		config.history.minBars.slow >= 2,
		"history.minBars.slow must be at least 2 (the EMA gap needs two observations)"
	);
	check(isPositiveInteger(config.history.maxBars), "history.maxBars must be a positive integer");

	const { risk } = config;
	check(risk.riskFraction > 0 && risk.riskFraction <= 1, "risk.riskFraction must be in (0, 1]");
	check(isPositiveInteger(risk.maxConcurrentPositions), "risk.maxConcurrentPositions must be a positive integer");
	check(isPositiveInteger(risk.maxContractsPerPosition), "risk.maxContractsPerPosition must be a positive integer");
	check(risk.stopPct > 0 && risk.stopPct < 1, "risk.stopPct must be in (0, 1)");
	check(risk.stopTicks > 0, "risk.stopTicks must be > 0");
	check(risk.rewardRisk > 0, "risk.rewardRisk must be > 0");
	check(risk.volatilityStopMultiple >= 0, "risk.volatilityStopMultiple must be >= 0");
	check(risk.maxDailyLossPct > 0 && risk.maxDailyLossPct <= 1, "risk.maxDailyLossPct must be in (0, 1]");
	check(risk.maxWeeklyLossPct > 0 && risk.maxWeeklyLossPct <= 1, "risk.maxWeeklyLossPct must be in (0, 1]");

	const { signal } = config;
	const inRsiRange = (value: number): boolean => value >= 0 && value <= 100;
	check(
		[signal.rsiOversold, signal.rsiLongTrigger, signal.rsiOverbought, signal.rsiShortTrigger].every(inRsiRange),
		"signal RSI thresholds must be within [0, 100]"
	);
	check(signal.rsiOversold < signal.rsiLongTrigger, "signal.rsiOversold must be below signal.rsiLongTrigger");
	check(signal.rsiOverbought > signal.rsiShortTrigger, "signal.rsiOverbought must be above signal.rsiShortTrigger");
	check(Number.isInteger(signal.armExpiryBars) && signal.armExpiryBars >= 0, "signal.armExpiryBars must be a non-negative integer");
	check(signal.explosionSensitivity >= 0, "signal.explosionSensitivity must be >= 0");
	check(signal.zoneToleranceTicks >= 0, "signal.zoneToleranceTicks must be >= 0");

	const { confirmation } = config;
	check(confirmation.imbalanceShort > 0, "confirmation.imbalanceShort must be > 0");
	check(
		confirmation.imbalanceLong > confirmation.imbalanceShort,
		"confirmation.imbalanceLong must be above confirmation.imbalanceShort"
	);
	check(
		confirmation.rejectionMargin >= 0 && confirmation.rejectionMargin < 1,
		"confirmation.rejectionMargin must be in [0, 1)"
	);
	check(confirmation.windowMs > 0, "confirmation.windowMs must be > 0");
	check(confirmation.sampleIntervalMs > 0, "confirmation.sampleIntervalMs must be > 0");
	check(isPositiveInteger(confirmation.depthLevels), "confirmation.depthLevels must be a positive integer");

	const { exits } = config;
	check(exits.timeExitMs > 0, "exits.timeExitMs must be > 0");
	check(exits.trailingActivationMultiple > 0, "exits.trailingActivationMultiple must be > 0");
	check(
		exits.breakevenLockTicks === null || exits.breakevenLockTicks >= 0,
		"exits.breakevenLockTicks must be null or >= 0"
	);

	const { execution } = config;
	check(isPositiveInteger(execution.maxRetries), "execution.maxRetries must be a positive integer");
	check(execution.ackTimeoutMs > 0, "execution.ackTimeoutMs must be > 0");
	check(execution.startingEquity > 0, "execution.startingEquity must be > 0");

	const { filters } = config;
	check(filters.volumeThresholdFraction >= 0, "filters.volumeThresholdFraction must be >= 0");
	check(isPositiveInteger(filters.volumeLookbackBars), "filters.volumeLookbackBars must be a positive integer");
	check(
		filters.correlationThreshold > 0 && filters.correlationThreshold <= 1,
		"filters.correlationThreshold must be in (0, 1]"
	);
	check(
		Number.isInteger(filters.correlationLookbackBars) && filters.correlationLookbackBars >= 3,
		"filters.correlationLookbackBars must be an integer >= 3"
	);

	check(config.feed.staleAfterMs > 0, "feed.staleAfterMs must be > 0");
	check(config.feed.heartbeatMs > 0, "feed.heartbeatMs must be > 0");
};

const deepFreeze = <T>(value: T): T => {
	if (value && typeof value === "object" && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const nested of Object.values(value)) {
			deepFreeze(nested);
		}
	}
	return value;
};

const toExecutionMode = (reader: ConfigReader, value: string): ExecutionMode => {
	const normalized = value.toLowerCase();
	if (normalized === "paper" || normalized === "live") {
		return normalized;
	}
	reader.issues.push(`execution.mode must be "paper" or "live", got "${value}"`);
	return "paper";
};

/**
 * Builds the immutable engine configuration from a parsed profile and the
 * environment overrides. Throws ConfigurationError listing every invalid field.
 */
export const buildEngineConfig = (
	raw: unknown,
	overrides: EngineEnvOverrides = {},
	source?: string
): EngineConfig => {
	const reader = new ConfigReader();
	const root = isRecord(raw) ? raw : {};
	if (!isRecord(raw)) {
		reader.issues.push("profile must be a JSON object");
	}
	const defaults = DEFAULT_ENGINE_CONFIG;

	const timeframesSrc = reader.section(root, "timeframes");
	const historySrc = reader.section(root, "history");
	const minBarsSrc = reader.section(historySrc, "minBars");
	const riskSrc = reader.section(root, "risk");
	const signalSrc = reader.section(root, "signal");
	const confirmationSrc = reader.section(root, "confirmation");
	const exitsSrc = reader.section(root, "exits");
	const executionSrc = reader.section(root, "execution");
	const filtersSrc = reader.section(root, "filters");
	const feedSrc = reader.section(root, "feed");

	let instruments = readInstruments(reader, root.instruments);
	if (overrides.instrument) {
		const selected = instruments.filter(
			(spec) => spec.symbol === overrides.instrument
		);
		if (!selected.length) {
			reader.issues.push(
				`TRADING_INSTRUMENT ${overrides.instrument} is not defined in the profile`
			);
		}
		instruments = selected;
	}

	const tf = (key: keyof TimeframeConfig): string =>
		reader.string(timeframesSrc, key, `timeframes.${key}`, defaults.timeframes[key]);
	const minBars = (role: TimeframeRole): number =>
		reader.number(minBarsSrc, role, `history.minBars.${role}`, defaults.history.minBars[role]);
	const num = (
		src: Record<string, unknown>,
		group: string,
		key: string,
		fallback: number
	): number => reader.number(src, key, `${group}.${key}`, fallback);

	const config: EngineConfig = {
		instruments,
		timeframes: {
			primary: tf("primary"),
			fast: tf("fast"),
			middle: tf("middle"),
			slow: tf("slow"),
			patterns: tf("patterns"),
		},
		history: {
			minBars: {
				primary: minBars("primary"),
				fast: minBars("fast"),
				middle: minBars("middle"),
				slow: minBars("slow"),
			},
			maxBars: num(historySrc, "history", "maxBars", defaults.history.maxBars),
		},
		risk: {
			riskFraction: reader.envNumber(
				overrides.riskFraction,
				"RISK_PER_TRADE",
				num(riskSrc, "risk", "riskFraction", defaults.risk.riskFraction)
			),
			maxConcurrentPositions: reader.envNumber(
				overrides.maxConcurrentPositions,
				"MAX_CONCURRENT_TRADES",
				num(riskSrc, "risk", "maxConcurrentPositions", defaults.risk.maxConcurrentPositions)
			),
			maxContractsPerPosition: num(riskSrc, "risk", "maxContractsPerPosition", defaults.risk.maxContractsPerPosition),
			stopPct: num(riskSrc, "risk", "stopPct", defaults.risk.stopPct),
			stopTicks: num(riskSrc, "risk", "stopTicks", defaults.risk.stopTicks),
			rewardRisk: num(riskSrc, "risk", "rewardRisk", defaults.risk.rewardRisk),
			volatilityStopMultiple: num(riskSrc, "risk", "volatilityStopMultiple", defaults.risk.volatilityStopMultiple),
			maxDailyLossPct: num(riskSrc, "risk", "maxDailyLossPct", defaults.risk.maxDailyLossPct),
			maxWeeklyLossPct: num(riskSrc, "risk", "maxWeeklyLossPct", defaults.risk.maxWeeklyLossPct),
		},
		signal: {
			rsiOversold: num(signalSrc, "signal", "rsiOversold", defaults.signal.rsiOversold),
			rsiLongTrigger: num(signalSrc, "signal", "rsiLongTrigger", defaults.signal.rsiLongTrigger),
			rsiOverbought: num(signalSrc, "signal", "rsiOverbought", defaults.signal.rsiOverbought),
			rsiShortTrigger: num(signalSrc, "signal", "rsiShortTrigger", defaults.signal.rsiShortTrigger),
			armExpiryBars: num(signalSrc, "signal", "armExpiryBars", defaults.signal.armExpiryBars),
			explosionSensitivity: num(signalSrc, "signal", "explosionSensitivity", defaults.signal.explosionSensitivity),
			zoneToleranceTicks: num(signalSrc, "signal", "zoneToleranceTicks", defaults.signal.zoneToleranceTicks),
		},
		confirmation: {
			imbalanceLong: reader.envNumber(
				overrides.imbalanceLong,
				"IMBALANCE_LONG",
				num(confirmationSrc, "confirmation", "imbalanceLong", defaults.confirmation.imbalanceLong)
			),
			imbalanceShort: reader.envNumber(
				overrides.imbalanceShort,
				"IMBALANCE_SHORT",
				num(confirmationSrc, "confirmation", "imbalanceShort", defaults.confirmation.imbalanceShort)
			),
			rejectionMargin: num(confirmationSrc, "confirmation", "rejectionMargin", defaults.confirmation.rejectionMargin),
			windowMs: reader.envNumber(
				overrides.windowMs,
				"CONFIRMATION_WINDOW_MS",
				num(confirmationSrc, "confirmation", "windowMs", defaults.confirmation.windowMs)
			),
			sampleIntervalMs: num(confirmationSrc, "confirmation", "sampleIntervalMs", defaults.confirmation.sampleIntervalMs),
			depthLevels: num(confirmationSrc, "confirmation", "depthLevels", defaults.confirmation.depthLevels),
			icebergCheck: reader.boolean(
				confirmationSrc,
				"icebergCheck",
				"confirmation.icebergCheck",
				defaults.confirmation.icebergCheck
			),
		},
		exits: {
			timeExitMs:
				overrides.timeExitMinutes === undefined
					? num(exitsSrc, "exits", "timeExitMs", defaults.exits.timeExitMs)
					: reader.envNumber(overrides.timeExitMinutes, "TIME_EXIT_MINUTES", 0) * 60_000,
			breakevenThresholdTicks: num(exitsSrc, "exits", "breakevenThresholdTicks", defaults.exits.breakevenThresholdTicks),
			trailingActivationMultiple: num(
				exitsSrc,
				"exits",
				"trailingActivationMultiple",
				defaults.exits.trailingActivationMultiple
			),
			breakevenLockTicks: reader.nullableNumber(
				exitsSrc,
				"breakevenLockTicks",
				"exits.breakevenLockTicks",
				defaults.exits.breakevenLockTicks
			),
		},
		execution: {
			mode: toExecutionMode(
				reader,
				overrides.mode ??
					reader.string(executionSrc, "mode", "execution.mode", defaults.execution.mode)
			),
			maxRetries: reader.envNumber(
				overrides.maxRetries,
				"MAX_EXECUTION_RETRIES",
				num(executionSrc, "execution", "maxRetries", defaults.execution.maxRetries)
			),
			ackTimeoutMs: num(executionSrc, "execution", "ackTimeoutMs", defaults.execution.ackTimeoutMs),
			startingEquity: num(executionSrc, "execution", "startingEquity", defaults.execution.startingEquity),
		},
		filters: {
			volumeThresholdFraction: num(filtersSrc, "filters", "volumeThresholdFraction", defaults.filters.volumeThresholdFraction),
			volumeLookbackBars: num(filtersSrc, "filters", "volumeLookbackBars", defaults.filters.volumeLookbackBars),
			correlationThreshold: num(filtersSrc, "filters", "correlationThreshold", defaults.filters.correlationThreshold),
			correlationLookbackBars: num(filtersSrc, "filters", "correlationLookbackBars", defaults.filters.correlationLookbackBars),
		},
		feed: {
			staleAfterMs: num(feedSrc, "feed", "staleAfterMs", defaults.feed.staleAfterMs),
			heartbeatMs: num(feedSrc, "feed", "heartbeatMs", defaults.feed.heartbeatMs),
		},
	};

	validate(reader, config);
	if (reader.issues.length) {
		throw new ConfigurationError(reader.issues, source);
	}
	return deepFreeze(config);
};

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	return JSON.parse(contents);
};

export const loadEngineConfig = (
	options: ConfigLoadOptions = {}
): EngineConfig => {
	const workspaceRoot = findWorkspaceRoot();
	const overrides = loadEnvConfig(
		options.envPath ?? path.join(workspaceRoot, ".env")
	);
	const configDir = options.configDir ?? path.join(workspaceRoot, "config");
	const profile = options.profile ?? overrides.profile ?? "default";
	const profilePath = path.join(configDir, "engine", `${profile}.json`);

	if (!fs.existsSync(profilePath)) {
		throw new ConfigurationError(
			[`engine profile "${profile}" not found at ${profilePath}`],
			profilePath
		);
	}

	let raw: unknown;
	try {
		raw = readJsonFile(profilePath);
	} catch (error) {
		throw new ConfigurationError(
			[`profile is not valid JSON: ${error instanceof Error ? error.message : String(error)}`],
			profilePath
		);
	}

	return withConfigMetadata(buildEngineConfig(raw, overrides, profilePath), {
		source: "file",
		path: profilePath,
		profile,
	});
};
