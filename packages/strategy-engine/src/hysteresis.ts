import type { Direction, HysteresisPhase } from "@momentumx/core";

export interface HysteresisThresholds {
	/** Level the oscillator must pass beyond to arm (oversold / overbought) */
	arm: number;
	/** Level whose crossing turns an armed state into a trigger */
	trigger: number;
	/** Bars an armed state survives without re-arming; 0 disables expiry */
	expiryBars: number;
}

export interface HysteresisState {
	phase: HysteresisPhase;
	/** Running minimum (long) or maximum (short) seen while armed */
	extreme: number | null;
	previous: number | null;
	armedBars: number;
}

/**
 * Arm / trigger state machine for one direction. A long arms below the
 * oversold level and triggers on the upward crossing of its trigger level;
 * a short is the mirror.
 */
export class DirectionalHysteresis {
	private state: HysteresisState = {
		phase: "IDLE",
		extreme: null,
		previous: null,
		armedBars: 0,
	};

	constructor(
		readonly direction: Direction,
		private readonly thresholds: HysteresisThresholds
	) {}

	update(value: number): HysteresisPhase {
		const previous = this.state.previous;
		const next: HysteresisState = { ...this.state, previous: value };

		if (this.isBeyondArm(value)) {
			next.phase = "ARMED";
			next.extreme =
				this.state.phase === "ARMED" && this.state.extreme !== null
					? this.moreExtreme(this.state.extreme, value)
					: value;
			next.armedBars = 0;
		} else if (this.state.phase === "ARMED") {
			if (previous !== null && this.crossesTrigger(previous, value)) {
				next.phase = "TRIGGERED";
			} else {
				next.armedBars = this.state.armedBars + 1;
				const expiry = this.thresholds.expiryBars;
				if (expiry > 0 && next.armedBars > expiry) {
					next.phase = "IDLE";
					next.extreme = null;
					next.armedBars = 0;
				}
			}
		}

		this.state = next;
		return next.phase;
	}

	/** Back to Idle; the last oscillator value is kept for the next crossing test. */
	reset(): void {
		this.state = {
			phase: "IDLE",
			extreme: null,
			previous: this.state.previous,
			armedBars: 0,
		};
	}

	get phase(): HysteresisPhase {
		return this.state.phase;
	}

	snapshot(): HysteresisState {
		return { ...this.state };
	}

	private isBeyondArm(value: number): boolean {
		return this.direction === "LONG"
			? value < this.thresholds.arm
			: value > this.thresholds.arm;
	}

	private crossesTrigger(previous: number, value: number): boolean {
		const trigger = this.thresholds.trigger;
		return this.direction === "LONG"
			? previous < trigger && value >= trigger
			: previous > trigger && value <= trigger;
	}

	private moreExtreme(current: number, value: number): number {
		return this.direction === "LONG"
			? Math.min(current, value)
			: Math.max(current, value);
	}
}
