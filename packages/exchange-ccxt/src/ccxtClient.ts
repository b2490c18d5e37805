import ccxt from "ccxt";

type RawRow = ReadonlyArray<number | undefined>;

export interface RawOrderBook {
	bids: ReadonlyArray<RawRow>;
	asks: ReadonlyArray<RawRow>;
	timestamp?: number;
}

/** The slice of a ccxt exchange the adapters call. */
export interface CcxtMarketClient {
	fetchOrderBook(symbol: string, limit?: number): Promise<RawOrderBook>;
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<ReadonlyArray<RawRow>>;
}

/**
 * Order and balance calls. Responses stay unknown here and are read at the
 * boundary by the execution provider.
 */
export interface CcxtTradingClient {
	createOrder(
		symbol: string,
		type: string,
		side: "buy" | "sell",
		amount: number,
		price?: number,
		params?: Record<string, unknown>
	): Promise<unknown>;
	cancelOrder(id: string, symbol?: string): Promise<unknown>;
	fetchBalance(): Promise<unknown>;
}

export type CcxtExchangeClient = CcxtMarketClient & CcxtTradingClient;

const EXCHANGES = {
	binance: ccxt.binance,
	binanceusdm: ccxt.binanceusdm,
	mexc: ccxt.mexc,
} as const;

export type CcxtExchangeId = keyof typeof EXCHANGES;

export const isCcxtExchangeId = (value: string): value is CcxtExchangeId =>
	value in EXCHANGES;

export interface CcxtClientOptions {
	exchangeId: CcxtExchangeId;
	apiKey?: string;
	secret?: string;
	defaultType?: "spot" | "swap" | "future";
}

export const createCcxtClient = (options: CcxtClientOptions): CcxtExchangeClient => {
	const Exchange = EXCHANGES[options.exchangeId];
	return new Exchange({
		apiKey: options.apiKey,
		secret: options.secret,
		enableRateLimit: true,
		options: {
			defaultType: options.defaultType ?? "spot",
		},
	});
};

/** Instrument symbol to exchange market symbol; unmapped instruments pass through. */
export type MarketSymbolMap = Readonly<Record<string, string>>;

export const resolveMarketSymbol = (
	markets: MarketSymbolMap | undefined,
	instrument: string
): string => markets?.[instrument] ?? instrument;
