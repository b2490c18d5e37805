import {
	createLogger,
	type Clock,
	type ConfirmationConfig,
	type OrderbookSample,
	type TimerHandle,
} from "@momentumx/core";
import type { OrderbookProvider } from "./orderbookProvider";

const logger = createLogger("orderbook_sampler");

/** Refills before a level counts as an iceberg when sampling live books */
export const DEFAULT_ICEBERG_MIN_REFILLS = 3;

export interface OrderbookSamplerDeps {
	provider: OrderbookProvider;
	clock: Clock;
	/** Receives each sample; normally enqueues it on the instrument loop */
	onSample: (sample: OrderbookSample) => void;
	/** Polling stops once this returns false */
	isActive: () => boolean;
}

/**
 * Polls the order-book provider for one instrument every sampleIntervalMs
 * while a confirmation window is live.
 */
export class OrderbookSampler {
	private timer: TimerHandle | null = null;
	private inFlight: Promise<void> = Promise.resolve();

	constructor(
		private readonly instrument: string,
		private readonly config: ConfirmationConfig,
		private readonly deps: OrderbookSamplerDeps
	) {}

	get running(): boolean {
		return this.timer !== null;
	}

	/** Starts polling; a no-op while already running. */
	start(): void {
		if (this.timer) {
			return;
		}
		this.schedule();
	}

	stop(): void {
		if (this.timer) {
			this.deps.clock.clearTimer(this.timer);
			this.timer = null;
		}
	}

	/** Resolves once the current poll (if any) has delivered its sample. */
	whenIdle(): Promise<void> {
		return this.inFlight;
	}

	private schedule(): void {
		this.timer = this.deps.clock.setTimer(this.config.sampleIntervalMs, () => {
			this.timer = null;
			if (!this.deps.isActive()) {
				return;
			}
			this.inFlight = this.inFlight
				.then(() => this.poll())
				.catch((error) => {
					logger.warn("orderbook_sample_failed", {
						instrument: this.instrument,
						error: error instanceof Error ? error.message : String(error),
					});
				})
				.finally(() => {
					if (this.deps.isActive() && !this.timer) {
						this.schedule();
					}
				});
		});
	}

	private async poll(): Promise<void> {
		const levels = this.config.depthLevels;
		const [imbalance, icebergs] = await Promise.all([
			this.deps.provider.imbalance(this.instrument, levels),
			this.config.icebergCheck
				? this.deps.provider.icebergDetection(this.instrument, {
						levels,
						minRefills: DEFAULT_ICEBERG_MIN_REFILLS,
					})
				: Promise.resolve([]),
		]);

		this.deps.onSample({
			instrument: this.instrument,
			timestamp: this.deps.clock.now(),
			imbalance,
			icebergs,
			bidVolume: null,
			askVolume: null,
		});
	}
}
