import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { sleep } from "../lib/sleep";
import { BusArbiter } from "./bus-arbiter";

const PORT = "/dev/ttyUSB0";
const T0 = new Date("2026-03-01T08:00:00Z").getTime();

interface Span {
	who: string;
	enter: number;
	exit: number;
}

describe("BusArbiter", () => {
	beforeEach(() => {
		vi.useFakeTimers();
		vi.setSystemTime(T0);
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	function transaction(arbiter: BusArbiter, port: string, who: string, spans: Span[], spacingMs = 30) {
		return arbiter.withAccess(port, spacingMs, async () => {
			const enter = Date.now();
			await sleep(20);
			spans.push({ who, enter, exit: Date.now() });
		});
	}

	it("serializes concurrent holders in arrival order with the turnaround gap", async () => {
		const arbiter = new BusArbiter();
		const spans: Span[] = [];

		const all = Promise.all([
			transaction(arbiter, PORT, "a", spans),
			transaction(arbiter, PORT, "b", spans),
			transaction(arbiter, PORT, "c", spans)
		]);
		await vi.advanceTimersByTimeAsync(500);
		await all;

		expect(spans.map(s => s.who)).toEqual(["a", "b", "c"]);
		expect(spans.map(s => s.enter - T0)).toEqual([0, 50, 100]);
		for (let i = 1; i < spans.length; i++) {
			expect(spans[i].enter - spans[i - 1].exit).toBe(30);
		}
	});

	it("does not delay a holder when the bus has been quiet long enough", async () => {
		const arbiter = new BusArbiter();
		const spans: Span[] = [];

		const first = transaction(arbiter, PORT, "a", spans);
		await vi.advanceTimersByTimeAsync(20);
		await first;

		await vi.advanceTimersByTimeAsync(100);
		const second = transaction(arbiter, PORT, "b", spans);
		await vi.advanceTimersByTimeAsync(20);
		await second;

		expect(spans[1].enter - T0).toBe(120);
	});

	it("keeps ports independent", async () => {
		const arbiter = new BusArbiter();
		const spans: Span[] = [];

		const all = Promise.all([
			transaction(arbiter, "/dev/ttyUSB0", "a", spans),
			transaction(arbiter, "/dev/ttyUSB1", "b", spans)
		]);
		await vi.advanceTimersByTimeAsync(20);
		await all;

		expect(spans.map(s => s.enter - T0)).toEqual([0, 0]);
	});

	it("releases and stamps the port when the transaction throws", async () => {
		const arbiter = new BusArbiter();

		await expect(
			arbiter.withAccess(PORT, 30, async () => {
				throw new Error("CRC mismatch");
			})
		).rejects.toThrow("CRC mismatch");
		expect(arbiter.lastAccess(PORT)).toBe(T0);

		let entered = 0;
		const next = arbiter.withAccess(PORT, 30, async () => {
			entered = Date.now();
		});
		await vi.advanceTimersByTimeAsync(30);
		await next;

		expect(entered - T0).toBe(30);
	});

	it("ignores a second release of the same token", async () => {
		const arbiter = new BusArbiter();

		const access = await arbiter.acquire(PORT, 0);
		access.release();
		await vi.advanceTimersByTimeAsync(10);
		access.release();

		expect(arbiter.lastAccess(PORT)).toBe(T0);
	});
});
