import { describe, expect, it } from "vitest";
import { BoundaryParseError, ManualClock, type IcebergLevel } from "@momentumx/core";
import type { CcxtMarketClient, RawOrderBook } from "./ccxtClient";
import { CcxtOrderbookProvider } from "./ccxtOrderbookProvider";

class FakeBookClient implements CcxtMarketClient {
	readonly calls: Array<{ symbol: string; limit?: number }> = [];
	books: RawOrderBook[] = [];
	failure: Error | null = null;

	async fetchOrderBook(symbol: string, limit?: number): Promise<RawOrderBook> {
		this.calls.push({ symbol, limit });
		if (this.failure) {
			throw this.failure;
		}
		const book = this.books.shift();
		if (!book) {
			throw new Error("no book queued");
		}
		return book;
	}

	async fetchOHLCV(): Promise<ReadonlyArray<ReadonlyArray<number | undefined>>> {
		return [];
	}
}

const createProvider = () => {
	const client = new FakeBookClient();
	const provider = new CcxtOrderbookProvider({
		client,
		clock: new ManualClock(5_000),
		markets: { BTC: "BTC/USDT" },
	});
	return { client, provider };
};

describe("CcxtOrderbookProvider", () => {
	it("maps the book to a snapshot under the instrument's name", async () => {
		const { client, provider } = createProvider();
		client.books.push({
			bids: [
				[100, 2],
				[99, 1],
			],
			asks: [[101, 3]],
		});

		await expect(provider.snapshot("BTC", 5)).resolves.toEqual({
			instrument: "BTC",
			timestamp: 5_000,
			bids: [
				[100, 2],
				[99, 1],
			],
			asks: [[101, 3]],
		});
		expect(client.calls).toEqual([{ symbol: "BTC/USDT", limit: 5 }]);
	});

	it("computes the bid/ask imbalance over the requested depth", async () => {
		const { client, provider } = createProvider();
		client.books.push({
			bids: [
				[100, 3],
				[99, 3],
				[98, 10],
			],
			asks: [
				[101, 2],
				[102, 2],
				[103, 10],
			],
			timestamp: 7_000,
		});

		await expect(provider.imbalance("BTC", 2)).resolves.toBe(1.5);
	});

	it("reports no imbalance when the fetch fails", async () => {
		const { client, provider } = createProvider();
		client.failure = new Error("rate limited");
		await expect(provider.imbalance("BTC", 5)).resolves.toBeNull();
	});

	it("rejects malformed levels", async () => {
		const { client, provider } = createProvider();
		client.books.push({ bids: [[100, undefined]], asks: [] });
		await expect(provider.snapshot("BTC", 5)).rejects.toBeInstanceOf(BoundaryParseError);
	});

	it("flags a level that keeps refilling after being hit", async () => {
		const { client, provider } = createProvider();
		const askSizes = [5, 2, 5, 1, 5];
		for (const size of askSizes) {
			client.books.push({ bids: [[100, 1]], asks: [[101, size]] });
		}
		const params = { levels: 5, minRefills: 2 };

		const results: IcebergLevel[][] = [];
		for (let i = 0; i < askSizes.length; i += 1) {
			results.push(await provider.icebergDetection("BTC", params));
		}

		expect(results.slice(0, 4)).toEqual([[], [], [], []]);
		expect(results[4]).toEqual([{ side: "ask", price: 101, refills: 2 }]);
	});
});
