import type { Direction } from "@momentumx/core";

export interface ClosePoint {
	openTime: number;
	close: number;
}

export type VolumeBlock = "volume_unavailable" | "volume_below_threshold";

export const volumeBlock = (
	volume: number,
	averageVolume: number | null,
	thresholdFraction: number
): VolumeBlock | null => {
	if (averageVolume === null) {
		return "volume_unavailable";
	}
	return volume >= thresholdFraction * averageVolume
		? null
		: "volume_below_threshold";
};

/** Mean of the last `lookback` values; null until that many exist. */
export const trailingAverage = (
	values: readonly number[],
	lookback: number
): number | null => {
	if (lookback <= 0 || values.length < lookback) {
		return null;
	}
	const window = values.slice(values.length - lookback);
	return window.reduce((sum, value) => sum + value, 0) / lookback;
};

export const pearsonCorrelation = (
	a: readonly number[],
	b: readonly number[]
): number | null => {
	const n = Math.min(a.length, b.length);
	if (n < 3) {
		return null;
	}
	const xs = a.slice(a.length - n);
	const ys = b.slice(b.length - n);
	const meanX = xs.reduce((s, v) => s + v, 0) / n;
	const meanY = ys.reduce((s, v) => s + v, 0) / n;

	let cov = 0;
	let varX = 0;
	let varY = 0;
	for (let i = 0; i < n; i++) {
		const dx = (xs[i] ?? 0) - meanX;
		const dy = (ys[i] ?? 0) - meanY;
		cov += dx * dy;
		varX += dx * dx;
		varY += dy * dy;
	}
	if (varX === 0 || varY === 0) {
		return null;
	}
	return cov / Math.sqrt(varX * varY);
};

/**
 * Close-to-close returns of both series over the bars they share, limited to
 * the last `lookback` returns.
 */
export const alignedReturns = (
	a: readonly ClosePoint[],
	b: readonly ClosePoint[],
	lookback: number
): [number[], number[]] => {
	const closesB = new Map(b.map((point) => [point.openTime, point.close]));
	const shared = a
		.filter((point) => closesB.has(point.openTime))
		.slice(-(lookback + 1));

	const returnsA: number[] = [];
	const returnsB: number[] = [];
	for (let i = 1; i < shared.length; i++) {
		const prev = shared[i - 1];
		const curr = shared[i];
		if (!prev || !curr) continue;
		const prevB = closesB.get(prev.openTime);
		const currB = closesB.get(curr.openTime);
		if (prev.close === 0 || !prevB || currB === undefined) {
			continue;
		}
		returnsA.push(curr.close / prev.close - 1);
		returnsB.push(currB / prevB - 1);
	}
	return [returnsA, returnsB];
};

export interface PeerExposure {
	instrument: string;
	direction: Direction;
	closes: readonly ClosePoint[];
}

export interface CorrelationBlock {
	instrument: string;
	correlation: number;
}

/**
 * First peer holding the same direction whose returns move with ours at or
 * above the threshold (in absolute value).
 */
export const correlationBlock = (
	direction: Direction,
	closes: readonly ClosePoint[],
	peers: readonly PeerExposure[],
	threshold: number,
	lookback: number
): CorrelationBlock | null => {
	for (const peer of peers) {
		if (peer.direction !== direction) {
			continue;
		}
		const [own, other] = alignedReturns(closes, peer.closes, lookback);
		const correlation = pearsonCorrelation(own, other);
		if (correlation !== null && Math.abs(correlation) >= threshold) {
			return { instrument: peer.instrument, correlation };
		}
	}
	return null;
};
