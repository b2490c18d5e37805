import { createLogger, errorMessage } from "@momentumx/core";

const logger = createLogger("instrument_loop");

export type LoopEventKind = "bar" | "orderbook" | "confirmation" | "ack" | "timer";

export type LoopTask = () => Promise<void> | void;

/**
 * Serial event queue for one instrument. Each task runs to completion before
 * the next starts; a failing task is logged and the queue moves on.
 */
export class InstrumentLoop {
	private queue: Promise<void> = Promise.resolve();
	private pending = 0;
	private processed = 0;
	private failed = 0;

	constructor(readonly instrument: string) {}

	enqueue(kind: LoopEventKind, task: LoopTask): Promise<void> {
		this.pending += 1;
		this.queue = this.queue
			.then(task)
			.catch((error) => {
				this.failed += 1;
				logger.error("instrument_event_error", {
					instrument: this.instrument,
					kind,
					error: errorMessage(error),
				});
			})
			.finally(() => {
				this.pending -= 1;
				this.processed += 1;
			});
		return this.queue;
	}

	get idle(): boolean {
		return this.pending === 0;
	}

	/** Resolves once every task queued so far has finished. */
	whenIdle(): Promise<void> {
		return this.queue;
	}

	stats(): { pending: number; processed: number; failed: number } {
		return { pending: this.pending, processed: this.processed, failed: this.failed };
	}
}
