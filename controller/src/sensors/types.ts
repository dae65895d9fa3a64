import type { SensorReading, SensorType } from "@regen-controller/common";

export const EMPTY_READING: Readonly<SensorReading> = Object.freeze({
	co2: null,
	temperature: null,
	humidity: null
});

/**
 * SensorDevice is the contract the poller drives.
 * - sensorId: device address, also the id stored with every reading
 * - sensorType: family tag carried into the stored rows
 * - read: one poll; failures come back as an all-null reading, never as a rejection
 */
export interface SensorDevice {
	readonly sensorId: number;
	readonly sensorType: SensorType;

	read(): Promise<SensorReading>;
}

/**
 * One 32-bit float read from a slave's register bank.
 */
export interface RegisterReader {
	readonly port: string;

	readFloat(slaveId: number, register: number, functionCode: 3 | 4): Promise<number>;
}
