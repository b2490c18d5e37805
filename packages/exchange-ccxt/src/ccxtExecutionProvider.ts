import {
	createLogger,
	errorMessage,
	toFiniteNumber,
	type Clock,
} from "@momentumx/core";
import {
	BRACKET_EXIT_REASONS,
	oppositeSide,
	type CloseRequest,
	type EntryRequest,
	type ExecutionAck,
	type ExecutionAckHandler,
	type ExecutionProvider,
	type ExecutionRequest,
	type ExecutionResult,
	type OrderSide,
} from "@momentumx/execution-engine";
import {
	resolveMarketSymbol,
	type CcxtTradingClient,
	type MarketSymbolMap,
} from "./ccxtClient";

const executionLogger = createLogger("execution_ccxt");

const DEFAULT_QUOTE_CURRENCY = "USDT";

export interface CcxtExecutionOptions {
	client: CcxtTradingClient;
	clock: Clock;
	markets?: MarketSymbolMap;
	/** Balance currency reported as account equity */
	quoteCurrency?: string;
}

interface RestingBracket {
	symbol: string;
	/** Side that closes the position */
	exitSide: OrderSide;
	quantity: number;
	stopOrderId: string | null;
	targetOrderId: string | null;
}

interface OrderFill {
	id: string | null;
	price: number | null;
	timestamp: number | null;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const readOrderFill = (raw: unknown): OrderFill => {
	if (!isRecord(raw)) {
		return { id: null, price: null, timestamp: null };
	}
	return {
		id: typeof raw.id === "string" && raw.id.length > 0 ? raw.id : null,
		price: toFiniteNumber(raw.average) ?? toFiniteNumber(raw.price),
		timestamp: toFiniteNumber(raw.timestamp),
	};
};

/** Total balance of one currency, from either of the shapes ccxt returns. */
export const readBalanceTotal = (raw: unknown, currency: string): number | null => {
	if (!isRecord(raw)) {
		return null;
	}
	const totals = raw.total;
	if (isRecord(totals)) {
		const total = toFiniteNumber(totals[currency]);
		if (total !== null) {
			return total;
		}
	}
	const entry = raw[currency];
	return isRecord(entry) ? toFiniteNumber(entry.total) : null;
};

/**
 * Routes requests to an exchange through ccxt. An entry is a market order
 * followed by a reduce-only stop and a reduce-only limit target; amending a
 * leg cancels and replaces it. Acks are delivered once the exchange calls
 * settle, never from inside `submit`.
 */
export class CcxtExecutionProvider implements ExecutionProvider {
	private readonly handlers = new Set<ExecutionAckHandler>();
	private readonly brackets = new Map<string, RestingBracket>();

	constructor(private readonly options: CcxtExecutionOptions) {}

	onAck(handler: ExecutionAckHandler): () => void {
		this.handlers.add(handler);
		return () => {
			this.handlers.delete(handler);
		};
	}

	async submit(request: ExecutionRequest): Promise<void> {
		void this.route(request).then((result) =>
			this.deliver({
				requestId: request.requestId,
				positionId: request.positionId,
				instrument: request.instrument,
				kind: request.kind,
				result,
			})
		);
	}

	async accountEquity(): Promise<number> {
		const currency = this.options.quoteCurrency ?? DEFAULT_QUOTE_CURRENCY;
		const total = readBalanceTotal(await this.options.client.fetchBalance(), currency);
		if (total === null) {
			throw new Error(`balance has no ${currency} total`);
		}
		return total;
	}

	restingBracket(positionId: string): Readonly<RestingBracket> | undefined {
		return this.brackets.get(positionId);
	}

	private async route(request: ExecutionRequest): Promise<ExecutionResult> {
		try {
			switch (request.kind) {
				case "entry":
					return await this.enter(request);
				case "close":
					return await this.close(request);
				case "modify_stop":
					return await this.amend(request.positionId, "stop", request.stopPrice);
				case "modify_target":
					return await this.amend(request.positionId, "target", request.targetPrice);
			}
		} catch (error) {
			executionLogger.warn("order_request_failed", {
				requestId: request.requestId,
				kind: request.kind,
				instrument: request.instrument,
				error: errorMessage(error),
			});
			return { ok: false, error: errorMessage(error) };
		}
	}

	private async enter(request: EntryRequest): Promise<ExecutionResult> {
		if (this.brackets.has(request.positionId)) {
			return { ok: false, error: "duplicate_position" };
		}
		const symbol = resolveMarketSymbol(this.options.markets, request.instrument);
		const fill = readOrderFill(
			await this.options.client.createOrder(symbol, "market", request.side, request.quantity)
		);
		const bracket: RestingBracket = {
			symbol,
			exitSide: oppositeSide(request.side),
			quantity: request.quantity,
			stopOrderId: null,
			targetOrderId: null,
		};
		this.brackets.set(request.positionId, bracket);
		// The position is open either way; a missing leg is left to the engine's own exits.
		bracket.stopOrderId = await this.placeLeg(bracket, "stop", request.stopPrice);
		bracket.targetOrderId = await this.placeLeg(bracket, "target", request.targetPrice);

		executionLogger.info("entry_order_filled", {
			positionId: request.positionId,
			symbol,
			side: request.side,
			quantity: request.quantity,
			orderId: fill.id,
			price: fill.price,
			stopOrderId: bracket.stopOrderId,
			targetOrderId: bracket.targetOrderId,
		});
		return {
			ok: true,
			fillPrice: fill.price,
			filledAt: fill.timestamp ?? this.options.clock.now(),
		};
	}

	private async amend(
		positionId: string,
		leg: "stop" | "target",
		price: number
	): Promise<ExecutionResult> {
		const bracket = this.brackets.get(positionId);
		if (!bracket) {
			return { ok: false, error: "unknown_position" };
		}
		const previous = leg === "stop" ? bracket.stopOrderId : bracket.targetOrderId;
		if (previous) {
			await this.options.client.cancelOrder(previous, bracket.symbol);
		}
		const replacement = await this.placeLeg(bracket, leg, price);
		if (leg === "stop") {
			bracket.stopOrderId = replacement;
		} else {
			bracket.targetOrderId = replacement;
		}
		if (!replacement) {
			return { ok: false, error: `${leg}_not_placed` };
		}
		return { ok: true, fillPrice: null, filledAt: this.options.clock.now() };
	}

	private async close(request: CloseRequest): Promise<ExecutionResult> {
		const bracket = this.brackets.get(request.positionId);
		if (!bracket) {
			return { ok: false, error: "unknown_position" };
		}
		const restingLeg =
			request.reason === "STOP_LOSS"
				? bracket.stopOrderId
				: request.reason === "TARGET_HIT"
					? bracket.targetOrderId
					: null;

		if (BRACKET_EXIT_REASONS.has(request.reason) && restingLeg) {
			// The resting leg closes the position at the exchange; only its sibling is cancelled.
			const sibling =
				request.reason === "STOP_LOSS" ? bracket.targetOrderId : bracket.stopOrderId;
			await this.cancelLeg(bracket, sibling);
			this.brackets.delete(request.positionId);
			return {
				ok: true,
				fillPrice: request.referencePrice,
				filledAt: this.options.clock.now(),
			};
		}

		await this.cancelLeg(bracket, bracket.stopOrderId);
		await this.cancelLeg(bracket, bracket.targetOrderId);
		const fill = readOrderFill(
			await this.options.client.createOrder(
				bracket.symbol,
				"market",
				request.side,
				request.quantity,
				undefined,
				{ reduceOnly: true }
			)
		);
		this.brackets.delete(request.positionId);
		executionLogger.info("close_order_filled", {
			positionId: request.positionId,
			symbol: bracket.symbol,
			reason: request.reason,
			orderId: fill.id,
			price: fill.price,
		});
		return {
			ok: true,
			fillPrice: fill.price,
			filledAt: fill.timestamp ?? this.options.clock.now(),
		};
	}

	private async placeLeg(
		bracket: RestingBracket,
		leg: "stop" | "target",
		price: number
	): Promise<string | null> {
		const { client } = this.options;
		try {
			const raw =
				leg === "stop"
					? await client.createOrder(
							bracket.symbol,
							"market",
							bracket.exitSide,
							bracket.quantity,
							undefined,
							{ triggerPrice: price, reduceOnly: true }
						)
					: await client.createOrder(
							bracket.symbol,
							"limit",
							bracket.exitSide,
							bracket.quantity,
							price,
							{ reduceOnly: true }
						);
			return readOrderFill(raw).id;
		} catch (error) {
			executionLogger.error("bracket_leg_failed", {
				symbol: bracket.symbol,
				leg,
				price,
				error: errorMessage(error),
			});
			return null;
		}
	}

	private async cancelLeg(bracket: RestingBracket, orderId: string | null): Promise<void> {
		if (!orderId) {
			return;
		}
		try {
			await this.options.client.cancelOrder(orderId, bracket.symbol);
		} catch (error) {
			executionLogger.warn("bracket_cancel_failed", {
				symbol: bracket.symbol,
				orderId,
				error: errorMessage(error),
			});
		}
	}

	private deliver(ack: ExecutionAck): void {
		for (const handler of this.handlers) {
			try {
				handler(ack);
			} catch (error) {
				executionLogger.error("ack_handler_failed", {
					requestId: ack.requestId,
					error: errorMessage(error),
				});
			}
		}
	}
}
