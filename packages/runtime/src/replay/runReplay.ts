import { createLogger, type ManualClock } from "@momentumx/core";
import type { RecordedIndicatorProvider } from "../indicatorProvider";
import type { StrategyOrchestrator } from "../orchestrator";
import type { ReplayEvent } from "./replaySession";

const logger = createLogger("replay");

export interface ReplayDeps {
	orchestrator: StrategyOrchestrator;
	clock: ManualClock;
	indicators: RecordedIndicatorProvider;
}

export interface ReplaySummary {
	bars: number;
	samples: number;
	/** Events stamped earlier than the replay clock at the time they were read */
	outOfOrder: number;
	startedAt: number | null;
	endedAt: number;
}

/**
 * Drives the orchestrator through a recorded session on virtual time. Each
 * event is fully processed (including the acks it triggers) before the next
 * one is read.
 */
export const runReplay = async (
	events: readonly ReplayEvent[],
	deps: ReplayDeps
): Promise<ReplaySummary> => {
	const { orchestrator, clock, indicators } = deps;
	const summary: ReplaySummary = {
		bars: 0,
		samples: 0,
		outOfOrder: 0,
		startedAt: events[0]?.at ?? null,
		endedAt: clock.now(),
	};

	for (const event of events) {
		if (event.at < clock.now()) {
			summary.outOfOrder += 1;
			logger.warn("replay_event_out_of_order", {
				type: event.type,
				at: event.at,
				clock: clock.now(),
			});
		}
		clock.advanceTo(event.at);
		await orchestrator.heartbeat(clock.now());

		if (event.type === "bar") {
			if (event.snapshot) {
				indicators.record(event.snapshot);
			}
			await orchestrator.onBar(event.bar.instrument, event.bar.timeframe, event.bar);
			summary.bars += 1;
		} else {
			await orchestrator.onOrderbookSample(event.sample.instrument, event.sample);
			summary.samples += 1;
		}
		await orchestrator.drain();
	}

	summary.endedAt = clock.now();
	logger.info("replay_finished", { ...summary });
	return summary;
};
