/**
 * Failure categories the engine distinguishes. Only CONFIGURATION is fatal;
 * everything else is recovered inside the owning instrument loop.
 */
export type EngineFailureKind =
	| "DATA_UNAVAILABLE"
	| "CONFIRMATION_TIMEOUT"
	| "CONFIRMATION_REJECTED"
	| "STALE_FEED"
	| "EXECUTION_FAILURE"
	| "CONFIGURATION";

export class ConfigurationError extends Error {
	readonly kind: EngineFailureKind = "CONFIGURATION";
	readonly issues: readonly string[];

	constructor(issues: readonly string[], source?: string) {
		const where = source ? ` (${source})` : "";
		super(
			`Invalid engine configuration${where}: ${issues.join("; ")}`
		);
		this.name = "ConfigurationError";
		this.issues = [...issues];
	}
}

/** Raised when a loosely typed payload cannot be turned into a strict value. */
export class BoundaryParseError extends Error {
	readonly field: string;

	constructor(field: string, message: string) {
		super(`${field}: ${message}`);
		this.name = "BoundaryParseError";
		this.field = field;
	}
}

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);
