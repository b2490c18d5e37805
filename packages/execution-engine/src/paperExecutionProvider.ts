import {
	createLogger,
	directionSign,
	type Clock,
	type Direction,
	type InstrumentSpec,
} from "@momentumx/core";
import {
	BRACKET_EXIT_REASONS,
	type CloseRequest,
	type EntryRequest,
	type ExecutionAck,
	type ExecutionAckHandler,
	type ExecutionProvider,
	type ExecutionRequest,
	type ExecutionResult,
} from "./executionProvider";
import { PaperAccount, type PaperAccountSnapshot } from "./paperAccount";

const paperLogger = createLogger("execution_paper");

export type PriceSource = (instrument: string) => number | null;

export interface PaperExecutionOptions {
	account: PaperAccount;
	instruments: readonly InstrumentSpec[];
	clock: Clock;
	/** Mark price used for closes and unrealized P&L */
	priceSource: PriceSource;
}

export interface PaperPositionSnapshot {
	positionId: string;
	instrument: string;
	direction: Direction;
	size: number;
	entryPrice: number;
	stopPrice: number;
	targetPrice: number;
}

/**
 * Fills every request locally. Entries fill at their reference price, stop
 * and target exits at their level, other closes at the current mark. Acks
 * are delivered asynchronously, never from inside `submit`.
 */
export class PaperExecutionProvider implements ExecutionProvider {
	private readonly handlers = new Set<ExecutionAckHandler>();
	private readonly positions = new Map<string, PaperPositionSnapshot>();
	private readonly instruments: Map<string, InstrumentSpec>;

	constructor(private readonly options: PaperExecutionOptions) {
		this.instruments = new Map(
			options.instruments.map((spec) => [spec.symbol, spec])
		);
	}

	onAck(handler: ExecutionAckHandler): () => void {
		this.handlers.add(handler);
		return () => {
			this.handlers.delete(handler);
		};
	}

	async submit(request: ExecutionRequest): Promise<void> {
		const result = this.execute(request);
		const ack: ExecutionAck = {
			requestId: request.requestId,
			positionId: request.positionId,
			instrument: request.instrument,
			kind: request.kind,
			result,
		};
		queueMicrotask(() => this.deliver(ack));
	}

	async accountEquity(): Promise<number> {
		return this.snapshotAccount().equity;
	}

	getPositions(): PaperPositionSnapshot[] {
		return Array.from(this.positions.values(), (position) => ({ ...position }));
	}

	snapshotAccount(): PaperAccountSnapshot {
		let unrealized = 0;
		for (const position of this.positions.values()) {
			const mark = this.options.priceSource(position.instrument);
			if (mark !== null) {
				unrealized += this.pnl(position, mark);
			}
		}
		return this.options.account.snapshot(unrealized);
	}

	private execute(request: ExecutionRequest): ExecutionResult {
		const now = this.options.clock.now();
		switch (request.kind) {
			case "entry":
				return this.fillEntry(request, now);
			case "close":
				return this.fillClose(request, now);
			case "modify_stop": {
				const position = this.positions.get(request.positionId);
				if (!position) {
					return { ok: false, error: "unknown_position" };
				}
				position.stopPrice = request.stopPrice;
				return { ok: true, fillPrice: null, filledAt: now };
			}
			case "modify_target": {
				const position = this.positions.get(request.positionId);
				if (!position) {
					return { ok: false, error: "unknown_position" };
				}
				position.targetPrice = request.targetPrice;
				return { ok: true, fillPrice: null, filledAt: now };
			}
		}
	}

	private fillEntry(request: EntryRequest, now: number): ExecutionResult {
		if (!this.instruments.has(request.instrument)) {
			return { ok: false, error: "unknown_instrument" };
		}
		if (this.positions.has(request.positionId)) {
			return { ok: false, error: "duplicate_position" };
		}
		this.positions.set(request.positionId, {
			positionId: request.positionId,
			instrument: request.instrument,
			direction: request.direction,
			size: request.quantity,
			entryPrice: request.referencePrice,
			stopPrice: request.stopPrice,
			targetPrice: request.targetPrice,
		});
		paperLogger.info("paper_entry_filled", {
			positionId: request.positionId,
			instrument: request.instrument,
			direction: request.direction,
			quantity: request.quantity,
			price: request.referencePrice,
		});
		return { ok: true, fillPrice: request.referencePrice, filledAt: now };
	}

	private fillClose(request: CloseRequest, now: number): ExecutionResult {
		const position = this.positions.get(request.positionId);
		if (!position) {
			return { ok: false, error: "unknown_position" };
		}
		const exitPrice = BRACKET_EXIT_REASONS.has(request.reason)
			? request.referencePrice
			: (this.options.priceSource(request.instrument) ?? request.referencePrice);
		const realizedPnl = this.pnl(position, exitPrice);
		this.positions.delete(request.positionId);

		const snapshot = this.options.account.registerClosedTrade({
			instrument: position.instrument,
			direction: position.direction,
			size: position.size,
			entryPrice: position.entryPrice,
			exitPrice,
			realizedPnl,
			closedAt: now,
		});
		paperLogger.info("paper_position_closed", {
			positionId: request.positionId,
			instrument: request.instrument,
			reason: request.reason,
			exitPrice,
			realizedPnl,
			balance: snapshot.balance,
		});
		return { ok: true, fillPrice: exitPrice, filledAt: now };
	}

	private pnl(position: PaperPositionSnapshot, price: number): number {
		const spec = this.instruments.get(position.instrument);
		if (!spec) {
			return 0;
		}
		const move = (price - position.entryPrice) * directionSign(position.direction);
		const ticks = move / spec.tickSize;
		return ticks * spec.tickValue * position.size;
	}

	private deliver(ack: ExecutionAck): void {
		for (const handler of this.handlers) {
			try {
				handler(ack);
			} catch (error) {
				paperLogger.error("ack_handler_failed", {
					requestId: ack.requestId,
					error: error instanceof Error ? error.message : String(error),
				});
			}
		}
	}
}
