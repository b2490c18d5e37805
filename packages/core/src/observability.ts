import type {
	AlignmentVerdict,
	CandidateSignal,
	ConfirmationOutcome,
	Direction,
	ExitDecision,
	PositionStatus,
	TrendState,
} from "./types";
import { createLogger, type ModuleLogger } from "./utils/logger";

export type EngineEvent =
	| {
			type: "trend_verdict";
			instrument: string;
			at: number;
			verdict: AlignmentVerdict;
			states: { slow: TrendState; middle: TrendState; fast: TrendState };
	  }
	| { type: "candidate_emitted"; instrument: string; signal: CandidateSignal }
	| {
			type: "confirmation_outcome";
			instrument: string;
			direction: Direction;
			outcome: Exclude<ConfirmationOutcome, "PENDING">;
			samples: number;
			lastImbalance: number | null;
	  }
	| { type: "exit_fired"; instrument: string; decision: ExitDecision }
	| {
			type: "position_transition";
			instrument: string;
			positionId: string;
			from: PositionStatus;
			to: PositionStatus;
	  }
	| {
			type: "sizing_rejected";
			instrument: string;
			direction: Direction;
			reason: string;
	  }
	| {
			type: "entry_blocked";
			instrument: string;
			direction: Direction;
			reason: string;
	  }
	| { type: "stale_feed"; instrument: string; stale: boolean; reason: string }
	| { type: "alert"; instrument: string; message: string; positionId?: string };

export type EngineEventType = EngineEvent["type"];

/** Fire-and-forget receiver for engine events. */
export interface ObservabilitySink {
	emit(event: EngineEvent): void;
}

const logger = createLogger("observability");

/** Delivers an event; a throwing sink is logged and never reaches the caller. */
export const emitSafely = (
	sink: ObservabilitySink | undefined,
	event: EngineEvent
): void => {
	if (!sink) {
		return;
	}
	try {
		sink.emit(event);
	} catch (error) {
		logger.warn("sink_emit_failed", {
			eventType: event.type,
			error: error instanceof Error ? error.message : String(error),
		});
	}
};

export class LoggerObservabilitySink implements ObservabilitySink {
	private readonly logger: ModuleLogger;

	constructor(logger: ModuleLogger = createLogger("engine_events")) {
		this.logger = logger;
	}

	emit(event: EngineEvent): void {
		const { type, ...data } = event;
		switch (type) {
			case "alert":
				this.logger.error(type, data);
				break;
			case "stale_feed":
			case "sizing_rejected":
			case "entry_blocked":
				this.logger.warn(type, data);
				break;
			default:
				this.logger.info(type, data);
		}
	}
}

/** Keeps every event; used by tests and the replay summary. */
export class RecordingObservabilitySink implements ObservabilitySink {
	readonly events: EngineEvent[] = [];

	emit(event: EngineEvent): void {
		this.events.push(event);
	}

	ofType<T extends EngineEventType>(
		type: T
	): Extract<EngineEvent, { type: T }>[] {
		return this.events.filter(
			(event): event is Extract<EngineEvent, { type: T }> => event.type === type
		);
	}
}
