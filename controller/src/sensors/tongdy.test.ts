import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { BusArbiter } from "../bus/bus-arbiter";
import { createLogger } from "../lib/log";
import { sleep } from "../lib/sleep";
import { STANDARD_REGISTER_MAP, TongdySensor, VOC_REGISTER_MAP } from "./tongdy";
import type { RegisterReader } from "./types";

const logger = createLogger({ serviceName: "test", console: false });

class FakeLink implements RegisterReader {
	readonly port = "/dev/ttyTEST";
	readonly calls: Array<[number, number, number]> = [];

	constructor(
		private readonly values: Record<number, number>,
		private failures = 0,
		private readonly latencyMs = 0
	) {}

	async readFloat(slaveId: number, register: number, functionCode: 3 | 4): Promise<number> {
		this.calls.push([slaveId, register, functionCode]);
		await sleep(this.latencyMs);
		if (this.failures > 0) {
			this.failures--;
			throw new Error("Timed out");
		}
		const v = this.values[register];
		if (v === undefined) throw new Error(`no register ${register}`);
		return v;
	}
}

const VOC_VALUES = { 0: 412.3456, 4: 22.114, 6: 55.678 };
const STANDARD_VALUES = { 0: 640, 2: 24.5, 4: 38.25 };

describe("TongdySensor", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	function sensor(link: RegisterReader | undefined, voc: boolean, sensorId = 2, arbiter = new BusArbiter()) {
		return new TongdySensor({ sensorId, port: "/dev/ttyTEST", voc, preDelayMs: 0 }, link, arbiter, logger);
	}

	it("reads the VOC register map and rounds to two decimals", async () => {
		const link = new FakeLink(VOC_VALUES);

		const reading = await sensor(link, true).read();

		expect(reading).toEqual({ co2: 412.35, temperature: 22.11, humidity: 55.68 });
		expect(link.calls).toEqual([
			[2, 0, 4],
			[2, 4, 4],
			[2, 6, 4]
		]);
	});

	it("reads the standard register map", async () => {
		const link = new FakeLink(STANDARD_VALUES);

		const s = sensor(link, false, 3);
		const reading = await s.read();

		expect(s.registers).toBe(STANDARD_REGISTER_MAP);
		expect(reading).toEqual({ co2: 640, temperature: 24.5, humidity: 38.25 });
		expect(link.calls.map(c => c[1])).toEqual([0, 2, 4]);
	});

	it("exposes the VOC map for VOC-capable units", () => {
		expect(sensor(new FakeLink(VOC_VALUES), true).registers).toBe(VOC_REGISTER_MAP);
	});

	it("retries after a failed attempt", async () => {
		const link = new FakeLink(VOC_VALUES, 1);

		const pending = sensor(link, true).read();
		await vi.advanceTimersByTimeAsync(500);

		expect(await pending).toEqual({ co2: 412.35, temperature: 22.11, humidity: 55.68 });
		expect(link.calls).toHaveLength(4);
	});

	it("gives up after three attempts spaced by the retry delay", async () => {
		const link = new FakeLink(VOC_VALUES, Number.POSITIVE_INFINITY);

		let settled = false;
		const pending = sensor(link, true)
			.read()
			.then(r => {
				settled = true;
				return r;
			});

		await vi.advanceTimersByTimeAsync(999);
		expect(settled).toBe(false);

		await vi.advanceTimersByTimeAsync(1);
		expect(settled).toBe(true);
		expect(await pending).toEqual({ co2: null, temperature: null, humidity: null });
		expect(link.calls).toHaveLength(3);
	});

	it("treats non-finite values as a failed attempt", async () => {
		const link = new FakeLink({ 0: Number.NaN, 4: 22, 6: 50 });

		const pending = sensor(link, true).read();
		await vi.advanceTimersByTimeAsync(1000);

		expect(await pending).toEqual({ co2: null, temperature: null, humidity: null });
		expect(link.calls).toHaveLength(9);
	});

	it("short-circuits when the device link never opened", async () => {
		const s = sensor(undefined, true);

		expect(s.available).toBe(false);
		expect(await s.read()).toEqual({ co2: null, temperature: null, humidity: null });
	});

	it("keeps each sensor's three reads together on a shared bus", async () => {
		const arbiter = new BusArbiter();
		const link = new FakeLink(VOC_VALUES, 0, 5);
		const a = new TongdySensor({ sensorId: 2, port: link.port, voc: true, preDelayMs: 30 }, link, arbiter, logger);
		const b = new TongdySensor({ sensorId: 3, port: link.port, voc: true, preDelayMs: 30 }, link, arbiter, logger);

		const both = Promise.all([a.read(), b.read()]);
		await vi.advanceTimersByTimeAsync(200);
		await both;

		expect(link.calls.map(c => c[0])).toEqual([2, 2, 2, 3, 3, 3]);
	});
});
