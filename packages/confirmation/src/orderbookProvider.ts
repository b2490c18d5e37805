import type { IcebergLevel } from "@momentumx/core";

export type PriceLevel = [price: number, size: number];

export interface OrderbookSnapshot {
	instrument: string;
	timestamp: number;
	/** Best bid first */
	bids: PriceLevel[];
	/** Best ask first */
	asks: PriceLevel[];
}

export interface IcebergDetectionParams {
	levels: number;
	/** Refills of the same price level before it counts as an iceberg */
	minRefills: number;
}

/**
 * Order-book collaborator. Implementations talk to an exchange; the gate only
 * sees the derived imbalance and iceberg levels.
 */
export interface OrderbookProvider {
	/** Bid volume / ask volume over the top `levels`; null when the book is empty or unavailable */
	imbalance(instrument: string, levels: number): Promise<number | null>;
	icebergDetection(
		instrument: string,
		params: IcebergDetectionParams
	): Promise<IcebergLevel[]>;
	snapshot(instrument: string, levels: number): Promise<OrderbookSnapshot>;
}

const sumSizes = (levels: readonly PriceLevel[], depth: number): number =>
	levels.slice(0, depth).reduce((total, [, size]) => total + size, 0);

export interface DepthTotals {
	bidVolume: number;
	askVolume: number;
	imbalance: number | null;
}

export const depthTotals = (
	snapshot: OrderbookSnapshot,
	depth: number
): DepthTotals => {
	const bidVolume = sumSizes(snapshot.bids, depth);
	const askVolume = sumSizes(snapshot.asks, depth);
	return {
		bidVolume,
		askVolume,
		imbalance: askVolume > 0 ? bidVolume / askVolume : null,
	};
};
