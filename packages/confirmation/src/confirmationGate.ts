import {
	createLogger,
	emitSafely,
	type CandidateSignal,
	type Clock,
	type ConfirmationConfig,
	type ConfirmationOutcome,
	type Direction,
	type ObservabilitySink,
	type OrderbookSample,
	type TimerHandle,
} from "@momentumx/core";

const logger = createLogger("confirmation_gate");

export type SettledOutcome = Exclude<ConfirmationOutcome, "PENDING">;

export interface ConfirmationWindow {
	id: string;
	instrument: string;
	direction: Direction;
	candidate: CandidateSignal;
	openedAt: number;
	deadline: number;
	samples: OrderbookSample[];
	outcome: ConfirmationOutcome;
}

export interface ConfirmationResult {
	window: Readonly<ConfirmationWindow>;
	outcome: SettledOutcome;
	reason: string;
	settledAt: number;
}

export type ConfirmationListener = (result: ConfirmationResult) => void;

export interface ConfirmationGateDeps {
	clock: Clock;
	onOutcome: ConfirmationListener;
	sink?: ObservabilitySink;
}

interface LiveWindow {
	window: ConfirmationWindow;
	timer: TimerHandle;
}

type SampleVerdict = { outcome: SettledOutcome; reason: string } | null;

const windowKey = (instrument: string, direction: Direction): string =>
	`${instrument}:${direction}`;

/**
 * Judges one sample against a window's direction. Returns null while the
 * book is undecided.
 */
export const judgeSample = (
	direction: Direction,
	sample: OrderbookSample,
	config: ConfirmationConfig
): SampleVerdict => {
	const imbalance = sample.imbalance;
	if (imbalance === null) {
		return null;
	}

	if (direction === "LONG") {
		const blockingIceberg =
			config.icebergCheck &&
			sample.icebergs.some((level) => level.side === "ask");
		if (imbalance > config.imbalanceLong && !blockingIceberg) {
			return { outcome: "CONFIRMED", reason: "bid_imbalance" };
		}
		if (imbalance < config.imbalanceShort * (1 - config.rejectionMargin)) {
			return { outcome: "REJECTED", reason: "ask_pressure" };
		}
		return null;
	}

	const blockingIceberg =
		config.icebergCheck && sample.icebergs.some((level) => level.side === "bid");
	if (imbalance < config.imbalanceShort && !blockingIceberg) {
		return { outcome: "CONFIRMED", reason: "ask_imbalance" };
	}
	if (imbalance > config.imbalanceLong * (1 + config.rejectionMargin)) {
		return { outcome: "REJECTED", reason: "bid_pressure" };
	}
	return null;
};

/**
 * Time-bounded order-book confirmation. At most one live window per
 * instrument and direction; every window settles exactly once, after which
 * it is discarded and the slot may be reused.
 */
export class OrderbookConfirmationGate {
	private readonly windows = new Map<string, LiveWindow>();
	private sequence = 0;

	constructor(
		private readonly config: ConfirmationConfig,
		private readonly deps: ConfirmationGateDeps
	) {}

	/** Opens a window for the candidate; null when one is already live. */
	open(candidate: CandidateSignal): ConfirmationWindow | null {
		const key = windowKey(candidate.instrument, candidate.direction);
		if (this.windows.has(key)) {
			logger.info("candidate_dropped_window_live", {
				instrument: candidate.instrument,
				direction: candidate.direction,
				sourceBarTime: candidate.sourceBarTime,
			});
			return null;
		}

		const openedAt = this.deps.clock.now();
		this.sequence += 1;
		const window: ConfirmationWindow = {
			id: `${key}:${this.sequence}`,
			instrument: candidate.instrument,
			direction: candidate.direction,
			candidate,
			openedAt,
			deadline: openedAt + this.config.windowMs,
			samples: [],
			outcome: "PENDING",
		};
		const timer = this.deps.clock.setTimer(this.config.windowMs, () =>
			this.onDeadline(key, window.id)
		);
		this.windows.set(key, { window, timer });

		logger.info("confirmation_window_opened", {
			instrument: window.instrument,
			direction: window.direction,
			windowId: window.id,
			deadline: window.deadline,
		});
		return window;
	}

	/** Feeds a sample to every live window of its instrument. */
	onSample(sample: OrderbookSample): void {
		for (const direction of ["LONG", "SHORT"] as const) {
			const live = this.windows.get(windowKey(sample.instrument, direction));
			if (!live) {
				continue;
			}
			const { window } = live;
			if (sample.timestamp >= window.deadline) {
				this.settle(live, "TIMED_OUT", "sample_after_deadline", sample.timestamp);
				continue;
			}

			window.samples.push(sample);
			const verdict = judgeSample(direction, sample, this.config);
			if (verdict) {
				this.settle(live, verdict.outcome, verdict.reason, sample.timestamp);
			}
		}
	}

	/** Discards the instrument's windows without reporting outcomes. */
	cancelInstrument(instrument: string): number {
		let cancelled = 0;
		for (const [key, live] of this.windows) {
			if (live.window.instrument !== instrument) {
				continue;
			}
			this.deps.clock.clearTimer(live.timer);
			this.windows.delete(key);
			cancelled += 1;
		}
		if (cancelled > 0) {
			logger.info("confirmation_windows_cancelled", { instrument, cancelled });
		}
		return cancelled;
	}

	liveWindows(): Readonly<ConfirmationWindow>[] {
		return Array.from(this.windows.values(), (live) => ({
			...live.window,
			samples: [...live.window.samples],
		}));
	}

	hasLiveWindow(instrument: string, direction?: Direction): boolean {
		if (direction) {
			return this.windows.has(windowKey(instrument, direction));
		}
		return this.liveWindows().some((window) => window.instrument === instrument);
	}

	private onDeadline(key: string, windowId: string): void {
		const live = this.windows.get(key);
		if (!live || live.window.id !== windowId) {
			return;
		}
		this.settle(live, "TIMED_OUT", "deadline_elapsed", this.deps.clock.now());
	}

	private settle(
		live: LiveWindow,
		outcome: SettledOutcome,
		reason: string,
		settledAt: number
	): void {
		const { window } = live;
		this.deps.clock.clearTimer(live.timer);
		this.windows.delete(windowKey(window.instrument, window.direction));
		window.outcome = outcome;

		const lastImbalance = window.samples.at(-1)?.imbalance ?? null;
		logger.info("confirmation_settled", {
			instrument: window.instrument,
			direction: window.direction,
			windowId: window.id,
			outcome,
			reason,
			samples: window.samples.length,
			lastImbalance,
		});
		emitSafely(this.deps.sink, {
			type: "confirmation_outcome",
			instrument: window.instrument,
			direction: window.direction,
			outcome,
			samples: window.samples.length,
			lastImbalance,
		});

		this.deps.onOutcome({ window, outcome, reason, settledAt });
	}
}
