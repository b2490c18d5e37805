export interface TimerHandle {
	readonly id: number;
}

/**
 * Source of time and timers for every component that waits on a deadline.
 * Live runs use SystemClock; replays and tests drive a ManualClock.
 */
export interface Clock {
	now(): number;
	setTimer(delayMs: number, callback: () => void): TimerHandle;
	clearTimer(handle: TimerHandle): void;
}

export class SystemClock implements Clock {
	private readonly timers = new Map<number, ReturnType<typeof setTimeout>>();
	private nextId = 1;

	now(): number {
		return Date.now();
	}

	setTimer(delayMs: number, callback: () => void): TimerHandle {
		const id = this.nextId++;
		const timer = setTimeout(() => {
			this.timers.delete(id);
			callback();
		}, Math.max(delayMs, 0));
		this.timers.set(id, timer);
		return { id };
	}

	clearTimer(handle: TimerHandle): void {
		const timer = this.timers.get(handle.id);
		if (timer) {
			clearTimeout(timer);
			this.timers.delete(handle.id);
		}
	}
}

interface ScheduledTimer {
	id: number;
	dueAt: number;
	callback: () => void;
}

/**
 * Virtual clock. Time only moves through advanceTo/advanceBy, and due timers
 * fire in deadline order (ties in scheduling order) as it passes them.
 */
export class ManualClock implements Clock {
	private current: number;
	private nextId = 1;
	private scheduled: ScheduledTimer[] = [];

	constructor(start = 0) {
		this.current = start;
	}

	now(): number {
		return this.current;
	}

	setTimer(delayMs: number, callback: () => void): TimerHandle {
		const id = this.nextId++;
		this.scheduled.push({
			id,
			dueAt: this.current + Math.max(delayMs, 0),
			callback,
		});
		return { id };
	}

	clearTimer(handle: TimerHandle): void {
		this.scheduled = this.scheduled.filter((timer) => timer.id !== handle.id);
	}

	advanceTo(timestamp: number): void {
		for (;;) {
			const next = this.nextDue(timestamp);
			if (!next) {
				break;
			}
			this.scheduled = this.scheduled.filter((timer) => timer.id !== next.id);
			this.current = Math.max(this.current, next.dueAt);
			next.callback();
		}
		this.current = Math.max(this.current, timestamp);
	}

	advanceBy(ms: number): void {
		this.advanceTo(this.current + ms);
	}

	pendingTimers(): number {
		return this.scheduled.length;
	}

	private nextDue(limit: number): ScheduledTimer | undefined {
		let best: ScheduledTimer | undefined;
		for (const timer of this.scheduled) {
			if (timer.dueAt > limit) {
				continue;
			}
			if (!best || timer.dueAt < best.dueAt) {
				best = timer;
			}
		}
		return best;
	}
}
