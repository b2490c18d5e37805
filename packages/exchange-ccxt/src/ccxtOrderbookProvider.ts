import {
	BoundaryParseError,
	createLogger,
	toFiniteNumber,
	type Clock,
	type IcebergLevel,
	type IcebergSide,
} from "@momentumx/core";
import {
	depthTotals,
	type IcebergDetectionParams,
	type OrderbookProvider,
	type OrderbookSnapshot,
	type PriceLevel,
} from "@momentumx/confirmation";
import {
	resolveMarketSymbol,
	type CcxtMarketClient,
	type MarketSymbolMap,
	type RawOrderBook,
} from "./ccxtClient";

const ccxtLogger = createLogger("exchange_ccxt");

interface LevelTrack {
	side: IcebergSide;
	price: number;
	size: number;
	depleted: boolean;
	refills: number;
}

export interface CcxtOrderbookProviderOptions {
	client: CcxtMarketClient;
	clock: Clock;
	markets?: MarketSymbolMap;
}

const parseSide = (
	rows: RawOrderBook["bids"],
	field: string
): PriceLevel[] =>
	rows.map((row, index) => {
		const price = toFiniteNumber(row[0]);
		const size = toFiniteNumber(row[1]);
		if (price === null || size === null || size < 0) {
			throw new BoundaryParseError(`${field}[${index}]`, "expected [price, size]");
		}
		return [price, size];
	});

/**
 * Order-book provider over ccxt's fetchOrderBook. Iceberg detection compares
 * consecutive snapshots: a level that is eaten into and then refilled at the
 * same price counts one refill.
 */
export class CcxtOrderbookProvider implements OrderbookProvider {
	private readonly tracks = new Map<string, Map<string, LevelTrack>>();

	constructor(private readonly options: CcxtOrderbookProviderOptions) {}

	async snapshot(instrument: string, levels: number): Promise<OrderbookSnapshot> {
		const symbol = resolveMarketSymbol(this.options.markets, instrument);
		const book = await this.options.client.fetchOrderBook(symbol, levels);
		return {
			instrument,
			timestamp: book.timestamp ?? this.options.clock.now(),
			bids: parseSide(book.bids, `${symbol}.bids`).slice(0, levels),
			asks: parseSide(book.asks, `${symbol}.asks`).slice(0, levels),
		};
	}

	async imbalance(instrument: string, levels: number): Promise<number | null> {
		try {
			const book = await this.snapshot(instrument, levels);
			return depthTotals(book, levels).imbalance;
		} catch (error) {
			ccxtLogger.warn("orderbook_fetch_failed", {
				instrument,
				error: error instanceof Error ? error.message : String(error),
			});
			return null;
		}
	}

	async icebergDetection(
		instrument: string,
		params: IcebergDetectionParams
	): Promise<IcebergLevel[]> {
		const book = await this.snapshot(instrument, params.levels);
		const previous = this.tracks.get(instrument) ?? new Map<string, LevelTrack>();
		const next = new Map<string, LevelTrack>();

		const observe = (side: IcebergSide, levels: readonly PriceLevel[]) => {
			for (const [price, size] of levels) {
				const key = `${side}:${price}`;
				const track = previous.get(key);
				if (!track) {
					next.set(key, { side, price, size, depleted: false, refills: 0 });
					continue;
				}
				if (size < track.size) {
					next.set(key, { ...track, size, depleted: true });
				} else if (size > track.size && track.depleted) {
					next.set(key, { ...track, size, depleted: false, refills: track.refills + 1 });
				} else {
					next.set(key, { ...track, size });
				}
			}
		};
		observe("bid", book.bids);
		observe("ask", book.asks);
		this.tracks.set(instrument, next);

		const icebergs: IcebergLevel[] = Array.from(next.values())
			.filter((track) => track.refills >= params.minRefills)
			.map(({ side, price, refills }) => ({ side, price, refills }));
		if (icebergs.length > 0) {
			ccxtLogger.debug("iceberg_levels_detected", { instrument, icebergs });
		}
		return icebergs;
	}
}
