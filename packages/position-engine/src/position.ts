import {
	directionSign,
	type Direction,
	type ExitReason,
	type PositionStatus,
} from "@momentumx/core";
import type { ExecutionRequestKind } from "@momentumx/execution-engine";

export interface PendingRequest {
	requestId: string;
	kind: ExecutionRequestKind;
	submittedAt: number;
}

export interface Position {
	id: string;
	instrument: string;
	direction: Direction;
	entryPrice: number;
	size: number;
	stopPrice: number;
	targetPrice: number;
	/** Fill time; the entry request time while Pending */
	openedAt: number;
	status: PositionStatus;
	retryCount: number;
	/** Price the entry was sized at */
	referencePrice: number;
	initialRiskDistance: number;
	/** ATR seen when the entry was planned; reused for the fill-price bracket */
	entryAtr: number | null;
	/** Status to fall back to when a close fails */
	revertStatus: PositionStatus | null;
	exitReason: ExitReason | null;
	exitPrice: number | null;
	realizedPnl: number | null;
	closedAt: number | null;
	pendingRequest: PendingRequest | null;
}

/** Favorable price movement from entry, in price units. */
export const favorableMove = (position: Position, price: number): number =>
	(price - position.entryPrice) * directionSign(position.direction);

export const pnlTicks = (position: Position, price: number, tickSize: number): number =>
	favorableMove(position, price) / tickSize;

export const realizedPnl = (
	position: Position,
	exitPrice: number,
	tickSize: number,
	tickValue: number
): number => pnlTicks(position, exitPrice, tickSize) * tickValue * position.size;
