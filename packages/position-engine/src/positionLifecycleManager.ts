import {
	createLogger,
	directionSign,
	emitSafely,
	isTerminalStatus,
	oppositeDirection,
	verdictForDirection,
	type AlignmentVerdict,
	type Bar,
	type Clock,
	type Direction,
	type ExecutionConfig,
	type ExitConfig,
	type ExitDecision,
	type ExitReason,
	type InstrumentSpec,
	type ObservabilitySink,
	type PositionStatus,
	type RiskConfig,
} from "@momentumx/core";
import {
	isBracketAmendment,
	type ExecutionAck,
	type ExecutionProvider,
	type ExecutionRequest,
} from "@momentumx/execution-engine";
import { computeRiskLevels, orderSideFor, type EntryPlan } from "@momentumx/risk-engine";
import { favorableMove, pnlTicks, realizedPnl, type Position } from "./position";

const logger = createLogger("position_lifecycle");

const MAX_ARCHIVED_POSITIONS = 200;

export interface LifecycleConfig {
	exits: ExitConfig;
	execution: ExecutionConfig;
	risk: RiskConfig;
}

export interface PositionLifecycleDeps {
	execution: ExecutionProvider;
	clock: Clock;
	sink?: ObservabilitySink;
	/** Called once per position when it reaches Closed */
	onClosed?: (position: Readonly<Position>) => void;
}

export interface ExitEvaluationInput {
	bar: Bar;
	verdict: AlignmentVerdict;
	/** Latest parabolic SAR on the primary timeframe */
	sar: number | null;
}

const roundPrice = (value: number): number => parseFloat(value.toFixed(10));

/**
 * Owns every position of one instrument from entry request to archive.
 * Exit triggers are checked in a fixed priority and at most one exit is
 * requested per position per evaluation.
 */
export class PositionLifecycleManager {
	private readonly live = new Map<string, Position>();
	private readonly archived: Position[] = [];
	private sequence = 0;
	private requestSequence = 0;

	constructor(
		private readonly instrument: InstrumentSpec,
		private readonly config: LifecycleConfig,
		private readonly deps: PositionLifecycleDeps
	) {}

	/** Creates a Pending position and submits its bracket entry. */
	async open(plan: EntryPlan, entryAtr: number | null = null): Promise<Position | null> {
		if (this.findLive(plan.direction)) {
			logger.warn("position_already_live", {
				instrument: this.instrument.symbol,
				direction: plan.direction,
			});
			return null;
		}

		this.sequence += 1;
		const now = this.deps.clock.now();
		const position: Position = {
			id: `${this.instrument.symbol}-${plan.direction}-${this.sequence}`,
			instrument: this.instrument.symbol,
			direction: plan.direction,
			entryPrice: plan.entryPrice,
			size: plan.quantity,
			stopPrice: plan.stopPrice,
			targetPrice: plan.targetPrice,
			openedAt: now,
			status: "PENDING",
			retryCount: 0,
			referencePrice: plan.entryPrice,
			initialRiskDistance: plan.riskDistance,
			entryAtr,
			revertStatus: null,
			exitReason: null,
			exitPrice: null,
			realizedPnl: null,
			closedAt: null,
			pendingRequest: null,
		};
		this.live.set(position.id, position);
		this.emitTransition(position, "PENDING", "PENDING");
		await this.submitEntry(position);
		return { ...position };
	}

	/**
	 * Runs the exit priority for every Open / TrailingActive position against
	 * the bar and returns the exits requested.
	 */
	async evaluate(input: ExitEvaluationInput): Promise<ExitDecision[]> {
		const now = this.deps.clock.now();
		const decisions: ExitDecision[] = [];

		for (const position of Array.from(this.live.values())) {
			if (position.status !== "OPEN" && position.status !== "TRAILING_ACTIVE") {
				continue;
			}

			const exit = this.checkExit(position, input, now);
			if (exit) {
				decisions.push(await this.requestExit(position, exit.reason, exit.price, now));
				continue;
			}

			await this.manageTrailing(position, input);
		}

		return decisions;
	}

	/** Issues Shutdown exits for every position that can be closed. */
	async flatten(price: number, reason: ExitReason = "SHUTDOWN"): Promise<ExitDecision[]> {
		const now = this.deps.clock.now();
		const decisions: ExitDecision[] = [];
		for (const position of Array.from(this.live.values())) {
			if (position.status === "OPEN" || position.status === "TRAILING_ACTIVE") {
				decisions.push(await this.requestExit(position, reason, price, now));
			}
		}
		return decisions;
	}

	/** Applies an execution ack; returns false when it matches no outstanding request. */
	async handleAck(ack: ExecutionAck): Promise<boolean> {
		const position = this.live.get(ack.positionId);
		if (!position) {
			logger.debug("ack_unmatched", { requestId: ack.requestId, positionId: ack.positionId });
			return false;
		}

		if (isBracketAmendment(ack)) {
			if (!ack.result.ok) {
				logger.warn("bracket_modify_failed", {
					positionId: position.id,
					kind: ack.kind,
					stopPrice: position.stopPrice,
					targetPrice: position.targetPrice,
					error: ack.result.error,
				});
			}
			return true;
		}

		if (position.pendingRequest?.requestId !== ack.requestId) {
			logger.debug("ack_stale", {
				positionId: position.id,
				requestId: ack.requestId,
				expected: position.pendingRequest?.requestId ?? null,
			});
			return false;
		}
		position.pendingRequest = null;

		if (!ack.result.ok) {
			await this.handleFailure(position, ack.result.error);
			return true;
		}

		const fillPrice = ack.result.fillPrice;
		if (ack.kind === "entry") {
			await this.onEntryFilled(
				position,
				fillPrice ?? position.referencePrice,
				ack.result.filledAt
			);
		} else {
			this.onCloseFilled(
				position,
				fillPrice ?? position.exitPrice ?? position.entryPrice,
				ack.result.filledAt
			);
		}
		return true;
	}

	/** Treats requests without an ack after ackTimeoutMs as failed. */
	async expireStaleRequests(now: number = this.deps.clock.now()): Promise<number> {
		let expired = 0;
		for (const position of Array.from(this.live.values())) {
			const pending = position.pendingRequest;
			if (!pending || now - pending.submittedAt < this.config.execution.ackTimeoutMs) {
				continue;
			}
			position.pendingRequest = null;
			expired += 1;
			await this.handleFailure(position, "ack_timeout");
		}
		return expired;
	}

	hasLivePosition(direction?: Direction): boolean {
		return direction ? this.findLive(direction) !== undefined : this.live.size > 0;
	}

	getLivePositions(): Position[] {
		return Array.from(this.live.values(), (position) => ({ ...position }));
	}

	/** Live positions followed by archived ones, newest last. */
	getPositions(): Position[] {
		return [
			...this.archived.map((position) => ({ ...position })),
			...this.getLivePositions(),
		];
	}

	getPosition(id: string): Position | undefined {
		const position =
			this.live.get(id) ?? this.archived.find((archived) => archived.id === id);
		return position ? { ...position } : undefined;
	}

	private checkExit(
		position: Position,
		input: ExitEvaluationInput,
		now: number
	): { reason: ExitReason; price: number } | null {
		const { bar } = input;
		const isLong = position.direction === "LONG";

		const stopBreached = isLong
			? bar.low <= position.stopPrice
			: bar.high >= position.stopPrice;
		if (stopBreached) {
			return { reason: "STOP_LOSS", price: position.stopPrice };
		}

		const targetBreached = isLong
			? bar.high >= position.targetPrice
			: bar.low <= position.targetPrice;
		if (targetBreached) {
			return { reason: "TARGET_HIT", price: position.targetPrice };
		}

		if (input.verdict === verdictForDirection(oppositeDirection(position.direction))) {
			return { reason: "TREND_REVERSAL", price: bar.close };
		}

		const held = now - position.openedAt;
		if (
			held > this.config.exits.timeExitMs &&
			pnlTicks(position, bar.close, this.instrument.tickSize) <=
				this.config.exits.breakevenThresholdTicks
		) {
			return { reason: "TIME_EXIT", price: bar.close };
		}

		return null;
	}

	private async manageTrailing(
		position: Position,
		input: ExitEvaluationInput
	): Promise<void> {
		const close = input.bar.close;
		const sign = directionSign(position.direction);
		const previousStop = position.stopPrice;

		if (position.status === "OPEN") {
			const activation =
				this.config.exits.trailingActivationMultiple * position.initialRiskDistance;
			if (favorableMove(position, close) < activation) {
				return;
			}
			this.transition(position, "TRAILING_ACTIVE");

			const lockTicks = this.config.exits.breakevenLockTicks;
			if (lockTicks !== null) {
				const lock = roundPrice(
					position.entryPrice + sign * lockTicks * this.instrument.tickSize
				);
				if (this.isTighter(position, lock) && this.isProtective(position, lock, close)) {
					position.stopPrice = lock;
				}
			}
		}

		const sar = input.sar;
		if (
			sar !== null &&
			(sar - position.stopPrice) * sign >= 0 &&
			this.isProtective(position, sar, close)
		) {
			position.stopPrice = sar;
		}

		if (position.stopPrice !== previousStop) {
			logger.info("trailing_stop_moved", {
				positionId: position.id,
				from: previousStop,
				to: position.stopPrice,
			});
			await this.submit(position, {
				kind: "modify_stop",
				requestId: this.nextRequestId(position, "modify_stop"),
				positionId: position.id,
				instrument: position.instrument,
				submittedAt: this.deps.clock.now(),
				stopPrice: position.stopPrice,
			});
		}
	}

	private isTighter(position: Position, candidate: number): boolean {
		return (candidate - position.stopPrice) * directionSign(position.direction) > 0;
	}

	/** A stop must sit below the close for longs and above it for shorts. */
	private isProtective(position: Position, candidate: number, close: number): boolean {
		return position.direction === "LONG" ? candidate < close : candidate > close;
	}

	private async requestExit(
		position: Position,
		reason: ExitReason,
		price: number,
		now: number
	): Promise<ExitDecision> {
		const decision: ExitDecision = {
			positionId: position.id,
			instrument: position.instrument,
			reason,
			requestedAt: now,
			price,
		};
		position.revertStatus = position.status;
		position.exitReason = reason;
		position.exitPrice = price;
		this.transition(position, "CLOSING");

		logger.info("exit_fired", { instrument: position.instrument, decision });
		emitSafely(this.deps.sink, {
			type: "exit_fired",
			instrument: position.instrument,
			decision,
		});

		await this.submitClose(position);
		return decision;
	}

	private async submitEntry(position: Position): Promise<void> {
		const requestId = this.nextRequestId(position, "entry");
		const submittedAt = this.deps.clock.now();
		position.pendingRequest = { requestId, kind: "entry", submittedAt };
		await this.submit(position, {
			kind: "entry",
			requestId,
			positionId: position.id,
			instrument: position.instrument,
			submittedAt,
			direction: position.direction,
			side: orderSideFor(position.direction, "OPEN"),
			quantity: position.size,
			referencePrice: position.referencePrice,
			stopPrice: position.stopPrice,
			targetPrice: position.targetPrice,
		});
	}

	private async submitClose(position: Position): Promise<void> {
		const requestId = this.nextRequestId(position, "close");
		const submittedAt = this.deps.clock.now();
		position.pendingRequest = { requestId, kind: "close", submittedAt };
		await this.submit(position, {
			kind: "close",
			requestId,
			positionId: position.id,
			instrument: position.instrument,
			submittedAt,
			direction: position.direction,
			side: orderSideFor(position.direction, "CLOSE"),
			quantity: position.size,
			reason: position.exitReason ?? "SHUTDOWN",
			referencePrice: position.exitPrice ?? position.entryPrice,
		});
	}

	/** A submit that throws counts as an immediate failure of that request. */
	private async submit(position: Position, request: ExecutionRequest): Promise<void> {
		try {
			await this.deps.execution.submit(request);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			logger.warn("execution_submit_failed", {
				positionId: position.id,
				kind: request.kind,
				error: message,
			});
			if (
				!isBracketAmendment(request) &&
				position.pendingRequest?.requestId === request.requestId
			) {
				position.pendingRequest = null;
				await this.handleFailure(position, message);
			}
		}
	}

	private async handleFailure(position: Position, error: string): Promise<void> {
		position.retryCount += 1;
		const exhausted = position.retryCount >= this.config.execution.maxRetries;
		logger.warn("execution_failed", {
			positionId: position.id,
			status: position.status,
			retryCount: position.retryCount,
			maxRetries: this.config.execution.maxRetries,
			error,
		});

		if (exhausted) {
			this.transition(position, "REJECTED");
			const message = `execution retries exhausted for ${position.id}: ${error}`;
			logger.error("position_alert", {
				instrument: position.instrument,
				positionId: position.id,
				message,
			});
			emitSafely(this.deps.sink, {
				type: "alert",
				instrument: position.instrument,
				positionId: position.id,
				message,
			});
			this.archive(position);
			return;
		}

		if (position.status === "PENDING") {
			await this.submitEntry(position);
			return;
		}

		if (position.status === "CLOSING") {
			this.transition(position, position.revertStatus ?? "OPEN");
			position.revertStatus = null;
			position.exitReason = null;
			position.exitPrice = null;
		}
	}

	/** Re-anchors the bracket on the fill and amends the resting legs that moved. */
	private async onEntryFilled(
		position: Position,
		fillPrice: number,
		filledAt: number
	): Promise<void> {
		const levels = computeRiskLevels(
			position.direction,
			fillPrice,
			this.instrument,
			this.config.risk,
			position.entryAtr
		);
		const previousStop = position.stopPrice;
		const previousTarget = position.targetPrice;
		position.entryPrice = fillPrice;
		position.stopPrice = levels.stopPrice;
		position.targetPrice = levels.targetPrice;
		position.initialRiskDistance = levels.distance;
		position.openedAt = filledAt;
		position.retryCount = 0;
		this.transition(position, "OPEN");

		if (position.stopPrice !== previousStop) {
			await this.submit(position, {
				kind: "modify_stop",
				requestId: this.nextRequestId(position, "modify_stop"),
				positionId: position.id,
				instrument: position.instrument,
				submittedAt: this.deps.clock.now(),
				stopPrice: position.stopPrice,
			});
		}
		if (position.targetPrice !== previousTarget) {
			await this.submit(position, {
				kind: "modify_target",
				requestId: this.nextRequestId(position, "modify_target"),
				positionId: position.id,
				instrument: position.instrument,
				submittedAt: this.deps.clock.now(),
				targetPrice: position.targetPrice,
			});
		}
	}

	private onCloseFilled(position: Position, fillPrice: number, filledAt: number): void {
		position.exitPrice = fillPrice;
		position.realizedPnl = realizedPnl(
			position,
			fillPrice,
			this.instrument.tickSize,
			this.instrument.tickValue
		);
		position.closedAt = filledAt;
		position.revertStatus = null;
		this.transition(position, "CLOSED");
		this.archive(position);
		this.deps.onClosed?.({ ...position });
	}

	private transition(position: Position, to: PositionStatus): void {
		const from = position.status;
		position.status = to;
		if (from === to) {
			return;
		}
		this.emitTransition(position, from, to);
	}

	private emitTransition(position: Position, from: PositionStatus, to: PositionStatus): void {
		logger.info("position_transition", {
			instrument: position.instrument,
			positionId: position.id,
			from,
			to,
			stopPrice: position.stopPrice,
			targetPrice: position.targetPrice,
		});
		emitSafely(this.deps.sink, {
			type: "position_transition",
			instrument: position.instrument,
			positionId: position.id,
			from,
			to,
		});
	}

	private archive(position: Position): void {
		if (!isTerminalStatus(position.status)) {
			return;
		}
		this.live.delete(position.id);
		this.archived.push(position);
		if (this.archived.length > MAX_ARCHIVED_POSITIONS) {
			this.archived.splice(0, this.archived.length - MAX_ARCHIVED_POSITIONS);
		}
	}

	private findLive(direction: Direction): Position | undefined {
		for (const position of this.live.values()) {
			if (position.direction === direction) {
				return position;
			}
		}
		return undefined;
	}

	private nextRequestId(position: Position, kind: ExecutionRequest["kind"]): string {
		this.requestSequence += 1;
		return `${position.id}:${kind}:${this.requestSequence}`;
	}
}
