import type { Direction } from "@momentumx/core";
import { trailingAverage, type ClosePoint, type PeerExposure } from "@momentumx/risk-engine";

interface InstrumentStats {
	volumes: number[];
	closes: ClosePoint[];
	liveDirections: Direction[];
}

/**
 * Cross-instrument figures the entry filters read. Each instrument's entry
 * is written only by that instrument's loop.
 */
export class MarketStats {
	private readonly stats = new Map<string, InstrumentStats>();

	constructor(private readonly maxPoints: number) {}

	recordVolume(instrument: string, volume: number): void {
		const entry = this.entry(instrument);
		entry.volumes.push(volume);
		if (entry.volumes.length > this.maxPoints) {
			entry.volumes.splice(0, entry.volumes.length - this.maxPoints);
		}
	}

	recordClose(instrument: string, point: ClosePoint): void {
		const entry = this.entry(instrument);
		const last = entry.closes[entry.closes.length - 1];
		if (last && last.openTime === point.openTime) {
			entry.closes[entry.closes.length - 1] = point;
			return;
		}
		entry.closes.push(point);
		if (entry.closes.length > this.maxPoints) {
			entry.closes.splice(0, entry.closes.length - this.maxPoints);
		}
	}

	averageVolume(instrument: string, lookback: number): number | null {
		return trailingAverage(this.stats.get(instrument)?.volumes ?? [], lookback);
	}

	closes(instrument: string): readonly ClosePoint[] {
		return this.stats.get(instrument)?.closes ?? [];
	}

	setLiveDirections(instrument: string, directions: Direction[]): void {
		this.entry(instrument).liveDirections = [...directions];
	}

	/** Non-terminal positions across every instrument. */
	livePositionCount(): number {
		let count = 0;
		for (const entry of this.stats.values()) {
			count += entry.liveDirections.length;
		}
		return count;
	}

	/** Other instruments' live exposure, one entry per held direction. */
	peerExposures(instrument: string): PeerExposure[] {
		const peers: PeerExposure[] = [];
		for (const [symbol, entry] of this.stats) {
			if (symbol === instrument) {
				continue;
			}
			for (const direction of entry.liveDirections) {
				peers.push({ instrument: symbol, direction, closes: entry.closes });
			}
		}
		return peers;
	}

	private entry(instrument: string): InstrumentStats {
		let entry = this.stats.get(instrument);
		if (!entry) {
			entry = { volumes: [], closes: [], liveDirections: [] };
			this.stats.set(instrument, entry);
		}
		return entry;
	}
}
