export type CyclePhase = "regen_firsttime" | "regen" | "cooldown" | "idle" | "scrub" | "end";

export type SensorType = "tongdy" | "simulated";

/**
 * One poll of a CO2/temperature/humidity sensor.
 * A failed read is signalled with null fields, never with zeros.
 */
export interface SensorReading {
	co2: number | null;
	temperature: number | null;
	humidity: number | null;
}

// Poller -> ingestion
export interface LiveSensorDataMessage {
	type: "live_sensor_data";
	data: SensorReading & {
		sensor_id: number;
		sensor_type?: SensorType;
	};
}

// Body of POST /auto on the actuator controller
export interface ActuatorCommand {
	phase: string;
	fan_volt: number;
	heater: boolean;
	duration: number; // minutes
}
