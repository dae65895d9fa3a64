import { describe, expect, it } from "vitest";

import { createLogger } from "../lib/log";
import { SimulatedSensor } from "./simulated";

const logger = createLogger({ serviceName: "test", console: false });

describe("SimulatedSensor", () => {
	it("sits on its base values when noise and drift cancel out", async () => {
		const s = new SimulatedSensor({ sensorId: 7, voc: true, random: () => 0.5, now: () => 1000 }, logger);

		expect(await s.read()).toEqual({ co2: 450, temperature: 22, humidity: 50 });
	});

	it("uses a lower CO2 base for standard units", async () => {
		const s = new SimulatedSensor({ sensorId: 8, random: () => 0.5, now: () => 1000 }, logger);

		expect((await s.read()).co2).toBe(400);
	});

	it("clamps values to the physical range", async () => {
		const s = new SimulatedSensor(
			{ sensorId: 9, baseCo2: 100, baseHumidity: 120, random: () => 0.5, now: () => 1000 },
			logger
		);

		const r = await s.read();
		expect(r.co2).toBe(300);
		expect(r.humidity).toBe(100);
	});

	it("returns an empty reading on an injected failure", async () => {
		const s = new SimulatedSensor({ sensorId: 7, failProbability: 1, random: () => 0.5 }, logger);

		expect(await s.read()).toEqual({ co2: null, temperature: null, humidity: null });
	});
});
