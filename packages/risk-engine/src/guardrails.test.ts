import { describe, expect, it } from "vitest";
import { DAY_MS, DEFAULT_ENGINE_CONFIG, HOUR_MS } from "@momentumx/core";
import { RiskGuardrails } from "./guardrails";

// Monday
const MONDAY = Date.UTC(2024, 0, 1);

const createGuardrails = () =>
	new RiskGuardrails(DEFAULT_ENGINE_CONFIG.risk, 50_000);

describe("RiskGuardrails", () => {
	it("blocks entries once the daily loss limit is reached", () => {
		const guardrails = createGuardrails();
		guardrails.recordRealized(-1_000, MONDAY + HOUR_MS);
		expect(guardrails.entryBlock(MONDAY + 2 * HOUR_MS, 0)).toBeNull();

		guardrails.recordRealized(-600, MONDAY + 3 * HOUR_MS);
		expect(guardrails.entryBlock(MONDAY + 4 * HOUR_MS, 0)).toBe(
			"daily_loss_limit"
		);
	});

	it("resets the daily figure at midnight but keeps the week", () => {
		const guardrails = createGuardrails();
		guardrails.recordRealized(-1_600, MONDAY + HOUR_MS);

		const tuesday = MONDAY + DAY_MS + HOUR_MS;
		expect(guardrails.entryBlock(tuesday, 0)).toBeNull();

		guardrails.recordRealized(-1_000, tuesday);
		expect(guardrails.metrics(tuesday, 0)).toMatchObject({
			dailyPnl: -1_000,
			weeklyPnl: -2_600,
			dailyLimit: 1_500,
			weeklyLimit: 2_500,
		});
		expect(guardrails.entryBlock(tuesday, 0)).toBe("weekly_loss_limit");
		expect(guardrails.entryBlock(MONDAY + 7 * DAY_MS, 0)).toBeNull();
	});

	it("caps concurrent positions", () => {
		const guardrails = createGuardrails();
		expect(guardrails.entryBlock(MONDAY, 2)).toBeNull();
		expect(guardrails.entryBlock(MONDAY, 3)).toBe("max_concurrent_positions");
	});
});
