import { describe, expect, it } from "vitest";
import { InstrumentLoop } from "./InstrumentLoop";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("InstrumentLoop", () => {
	it("runs tasks one at a time in arrival order", async () => {
		const loop = new InstrumentLoop("ES");
		const trace: string[] = [];

		void loop.enqueue("bar", async () => {
			trace.push("bar:start");
			await tick();
			trace.push("bar:end");
		});
		void loop.enqueue("orderbook", () => {
			trace.push("orderbook");
		});
		await loop.whenIdle();

		expect(trace).toEqual(["bar:start", "bar:end", "orderbook"]);
		expect(loop.idle).toBe(true);
	});

	it("keeps going after a task throws", async () => {
		const loop = new InstrumentLoop("ES");
		const trace: string[] = [];

		void loop.enqueue("ack", () => {
			throw new Error("boom");
		});
		void loop.enqueue("timer", () => {
			trace.push("timer");
		});
		await loop.whenIdle();

		expect(trace).toEqual(["timer"]);
		expect(loop.stats()).toEqual({ pending: 0, processed: 2, failed: 1 });
	});
});
