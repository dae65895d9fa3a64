import type { SensorReading } from "@regen-controller/common";
import type winston from "winston";

import type { BusArbiter } from "../bus/bus-arbiter";
import { errorMessage } from "../lib/errors";
import { sleep } from "../lib/sleep";
import type { ModbusPortPool } from "./modbus";
import { EMPTY_READING } from "./types";
import type { RegisterReader, SensorDevice } from "./types";

export interface RegisterMap {
	co2: number;
	temperature: number;
	humidity: number;
	functionCode: 3 | 4;
}

// Input-register offsets of the Tongdy CO2/T/RH transmitters
export const VOC_REGISTER_MAP: Readonly<RegisterMap> = Object.freeze({
	co2: 0,
	temperature: 4,
	humidity: 6,
	functionCode: 4
});

export const STANDARD_REGISTER_MAP: Readonly<RegisterMap> = Object.freeze({
	co2: 0,
	temperature: 2,
	humidity: 4,
	functionCode: 4
});

export interface TongdySensorOptions {
	sensorId: number;
	port: string;
	voc: boolean;
	preDelayMs: number;
	maxRetries?: number;
	retryDelayMs?: number;
}

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 500;

function round2(v: number): number {
	return Math.round(v * 100) / 100;
}

/**
 * Tongdy CO2/temperature/humidity transmitter on a shared RS-485 bus.
 *
 * Each attempt reads the three values inside one BusArbiter critical section.
 * Failed attempts are retried after `retryDelayMs`; when all attempts fail the
 * reading comes back with every field null.
 */
export class TongdySensor implements SensorDevice {
	readonly sensorId: number;
	readonly sensorType = "tongdy" as const;
	readonly registers: Readonly<RegisterMap>;

	private readonly maxRetries: number;
	private readonly retryDelayMs: number;

	constructor(
		private readonly opts: TongdySensorOptions,
		private readonly link: RegisterReader | undefined,
		private readonly arbiter: BusArbiter,
		private readonly logger: winston.Logger
	) {
		this.sensorId = opts.sensorId;
		this.registers = opts.voc ? VOC_REGISTER_MAP : STANDARD_REGISTER_MAP;
		this.maxRetries = opts.maxRetries ?? DEFAULT_MAX_RETRIES;
		this.retryDelayMs = opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
	}

	/**
	 * Opens (or reuses) the port link. If the port cannot be opened the sensor
	 * is still returned, but every read short-circuits to an empty reading.
	 */
	static async create(
		opts: TongdySensorOptions,
		pool: ModbusPortPool,
		arbiter: BusArbiter,
		logger: winston.Logger
	): Promise<TongdySensor> {
		let link: RegisterReader | undefined;
		try {
			link = await pool.open(opts.port);
			logger.info("Tongdy sensor %d attached on %s (voc=%s)", opts.sensorId, opts.port, String(opts.voc));
		} catch (err) {
			logger.error(
				"Tongdy sensor %d unavailable on %s, readings will be empty: %s",
				opts.sensorId,
				opts.port,
				errorMessage(err)
			);
		}
		return new TongdySensor(opts, link, arbiter, logger);
	}

	get available(): boolean {
		return this.link !== undefined;
	}

	async read(): Promise<SensorReading> {
		const link = this.link;
		if (!link) {
			this.logger.debug("Tongdy sensor %d has no link, skipping read", this.sensorId);
			return { ...EMPTY_READING };
		}

		for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
			try {
				const reading = await this.arbiter.withAccess(link.port, this.opts.preDelayMs, () =>
					this.readOnce(link)
				);
				this.logger.debug(
					"Sensor %d: co2=%s ppm temperature=%s C humidity=%s %%",
					this.sensorId,
					String(reading.co2),
					String(reading.temperature),
					String(reading.humidity)
				);
				return reading;
			} catch (err) {
				this.logger.warn("Attempt %d - failed to read sensor %d: %s", attempt, this.sensorId, errorMessage(err));
				if (attempt < this.maxRetries) {
					await sleep(this.retryDelayMs);
				}
			}
		}

		this.logger.error("All %d attempts failed for sensor %d, returning empty reading", this.maxRetries, this.sensorId);
		return { ...EMPTY_READING };
	}

	private async readOnce(link: RegisterReader): Promise<SensorReading> {
		const { co2: co2Reg, temperature: tReg, humidity: hReg, functionCode } = this.registers;

		const co2 = await link.readFloat(this.sensorId, co2Reg, functionCode);
		const temperature = await link.readFloat(this.sensorId, tReg, functionCode);
		const humidity = await link.readFloat(this.sensorId, hReg, functionCode);

		if (!Number.isFinite(co2) || !Number.isFinite(temperature) || !Number.isFinite(humidity)) {
			throw new Error(`non-finite values (co2=${co2}, t=${temperature}, h=${humidity})`);
		}

		return {
			co2: round2(co2),
			temperature: round2(temperature),
			humidity: round2(humidity)
		};
	}
}
