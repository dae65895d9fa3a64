import type { SensorReading } from "@regen-controller/common";
import type winston from "winston";

import { EMPTY_READING } from "./types";
import type { SensorDevice } from "./types";

export interface SimulatedSensorOptions {
	sensorId: number;
	voc?: boolean;
	baseCo2?: number;
	baseTemperature?: number;
	baseHumidity?: number;
	noiseLevel?: number;
	// Per-second random walk amplitude
	driftRate?: number;
	failProbability?: number;
	random?: () => number;
	now?: () => number;
}

function clamp(v: number, min: number, max: number): number {
	return Math.max(min, Math.min(max, v));
}

function round2(v: number): number {
	return Math.round(v * 100) / 100;
}

/**
 * Hardware-free stand-in for a Tongdy transmitter: values wander around a
 * base with noise and are pulled back 1% per read.
 */
export class SimulatedSensor implements SensorDevice {
	readonly sensorId: number;
	readonly sensorType = "simulated" as const;

	private readonly base: { co2: number; temperature: number; humidity: number };
	private current: { co2: number; temperature: number; humidity: number };
	private lastReadMs: number;
	private readonly noise: number;
	private readonly drift: number;
	private readonly failProbability: number;
	private readonly random: () => number;
	private readonly now: () => number;

	constructor(
		opts: SimulatedSensorOptions,
		private readonly logger: winston.Logger
	) {
		this.sensorId = opts.sensorId;
		// VOC-capable units sit in busier air
		this.base = {
			co2: opts.baseCo2 ?? (opts.voc ? 450 : 400),
			temperature: opts.baseTemperature ?? 22,
			humidity: opts.baseHumidity ?? 50
		};
		this.current = { ...this.base };
		this.noise = opts.noiseLevel ?? 2;
		this.drift = opts.driftRate ?? 0.1;
		this.failProbability = opts.failProbability ?? 0;
		this.random = opts.random ?? Math.random;
		this.now = opts.now ?? Date.now;
		this.lastReadMs = this.now();
	}

	private uniform(min: number, max: number): number {
		return min + (max - min) * this.random();
	}

	async read(): Promise<SensorReading> {
		if (this.random() < this.failProbability) {
			this.logger.warn("Simulated sensor %d: injected read failure", this.sensorId);
			return { ...EMPTY_READING };
		}

		const now = this.now();
		const factor = (this.drift * (now - this.lastReadMs)) / 1000;
		this.lastReadMs = now;

		const c = this.current;
		c.co2 += this.uniform(-1, 1) * factor;
		c.temperature += this.uniform(-0.1, 0.1) * factor;
		c.humidity += this.uniform(-0.5, 0.5) * factor;

		c.co2 += (this.base.co2 - c.co2) * 0.01;
		c.temperature += (this.base.temperature - c.temperature) * 0.01;
		c.humidity += (this.base.humidity - c.humidity) * 0.01;

		return {
			co2: round2(clamp(c.co2 + this.uniform(-this.noise, this.noise), 300, 5000)),
			temperature: round2(clamp(c.temperature + this.uniform(-this.noise * 0.1, this.noise * 0.1), -10, 50)),
			humidity: round2(clamp(c.humidity + this.uniform(-this.noise * 0.5, this.noise * 0.5), 0, 100))
		};
	}
}
