import { SensorTypeSchema } from "@regen-controller/common";
import type { SensorType } from "@regen-controller/common";
import type winston from "winston";

import type { BusArbiter } from "../bus/bus-arbiter";
import type { AppConfig, SensorConfig } from "../lib/config";
import type { ModbusPortPool } from "./modbus";
import { SimulatedSensor } from "./simulated";
import { TongdySensor } from "./tongdy";
import type { SensorDevice } from "./types";

export interface SensorDeps {
	config: AppConfig;
	pool: ModbusPortPool;
	arbiter: BusArbiter;
	logger: winston.Logger;
}

type SensorFactory = (sensor: SensorConfig, deps: SensorDeps) => Promise<SensorDevice>;

const registry = new Map<SensorType, SensorFactory>([
	[
		"tongdy",
		(s, deps) =>
			TongdySensor.create(
				{
					sensorId: s.sensorId,
					port: deps.config.modbus.port,
					voc: s.voc,
					preDelayMs: deps.config.modbus.preDelayMs
				},
				deps.pool,
				deps.arbiter,
				deps.logger
			)
	],
	["simulated", async (s, deps) => new SimulatedSensor({ sensorId: s.sensorId, voc: s.voc }, deps.logger)]
]);

/**
 * Resolve a sensor factory by sensor type.
 * Throws if the type is unsupported.
 */
export function getSensorFactory(type: string): SensorFactory {
	const parsed = SensorTypeSchema.safeParse(type);
	const factory = parsed.success ? registry.get(parsed.data) : undefined;
	if (!factory) {
		throw new Error(`Unsupported sensor type '${type}'`);
	}
	return factory;
}

export async function createSensors(deps: SensorDeps): Promise<SensorDevice[]> {
	const out: SensorDevice[] = [];
	for (const s of deps.config.sensors) {
		out.push(await getSensorFactory(s.type)(s, deps));
	}
	return out;
}
