import type { Direction, ExitReason } from "@momentumx/core";

export type OrderSide = "buy" | "sell";

interface RequestBase {
	requestId: string;
	positionId: string;
	instrument: string;
	submittedAt: number;
}

/** Bracket entry: market order plus attached stop and target. */
export interface EntryRequest extends RequestBase {
	kind: "entry";
	direction: Direction;
	side: OrderSide;
	quantity: number;
	referencePrice: number;
	stopPrice: number;
	targetPrice: number;
}

export interface ModifyStopRequest extends RequestBase {
	kind: "modify_stop";
	stopPrice: number;
}

export interface ModifyTargetRequest extends RequestBase {
	kind: "modify_target";
	targetPrice: number;
}

export interface CloseRequest extends RequestBase {
	kind: "close";
	direction: Direction;
	side: OrderSide;
	quantity: number;
	reason: ExitReason;
	referencePrice: number;
}

export type ExecutionRequest =
	| EntryRequest
	| ModifyStopRequest
	| ModifyTargetRequest
	| CloseRequest;

/** Requests that amend a resting bracket leg; their failures never retry. */
export const isBracketAmendment = (
	request: Pick<ExecutionRequest, "kind">
): boolean => request.kind === "modify_stop" || request.kind === "modify_target";

/** Exits resting at the broker as stop or limit orders; they fill at their own level. */
export const BRACKET_EXIT_REASONS: ReadonlySet<ExitReason> = new Set<ExitReason>([
	"STOP_LOSS",
	"TARGET_HIT",
]);

export const oppositeSide = (side: OrderSide): OrderSide => (side === "buy" ? "sell" : "buy");

export type ExecutionRequestKind = ExecutionRequest["kind"];

export type ExecutionResult =
	| { ok: true; fillPrice: number | null; filledAt: number }
	| { ok: false; error: string };

export interface ExecutionAck {
	requestId: string;
	positionId: string;
	instrument: string;
	kind: ExecutionRequestKind;
	result: ExecutionResult;
}

export type ExecutionAckHandler = (ack: ExecutionAck) => void;

/**
 * Order routing collaborator. `submit` resolves once the request is handed
 * off; its outcome always arrives later through an ack.
 */
export interface ExecutionProvider {
	submit(request: ExecutionRequest): Promise<void>;
	/** Registers an ack handler and returns its unsubscribe function */
	onAck(handler: ExecutionAckHandler): () => void;
	accountEquity(): Promise<number>;
}
