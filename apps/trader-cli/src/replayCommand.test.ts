import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadEngineConfig, RecordingObservabilitySink } from "@momentumx/core";
import { runReplayCommand } from "./replayCommand";

const APP_DIR = path.join(__dirname, "..");
const WORKSPACE_ROOT = path.join(APP_DIR, "..", "..");

describe("replay command", () => {
	it("trades the sample session on the paper account", async () => {
		const config = loadEngineConfig({
			configDir: path.join(WORKSPACE_ROOT, "config"),
			profile: "default",
			envPath: path.join(WORKSPACE_ROOT, ".env.missing"),
		});
		const sink = new RecordingObservabilitySink();

		const report = await runReplayCommand({
			sessionPath: path.join(APP_DIR, "sessions", "sample-session.ndjson"),
			config,
			sink,
		});

		expect(report.summary.outOfOrder).toBe(0);
		expect(report.summary.samples).toBe(1);
		expect(report.positions).toHaveLength(1);
		const [position] = report.positions;
		expect(position?.id).toBe("ES-LONG-1");
		expect(position?.status).toBe("CLOSED");
		expect(position?.exitReason).toBe("STOP_LOSS");
		expect(position?.exitPrice).toBe(4498.25);
		expect(position?.realizedPnl).toBe(-200);
		expect(report.account.balance).toBe(49_800);
		expect(report.account.trades.losses).toBe(1);
		expect(sink.ofType("candidate_emitted")).toHaveLength(1);
	});
});
