import { z } from "zod";

export const CyclePhaseSchema = z.enum(["regen_firsttime", "regen", "cooldown", "idle", "scrub", "end"]);

export const SensorTypeSchema = z.enum(["tongdy", "simulated"]);

const nullableMeasurement = z.number().finite().nullable();

export const LiveSensorDataSchema = z.object({
	type: z.literal("live_sensor_data"),
	data: z.object({
		co2: nullableMeasurement,
		temperature: nullableMeasurement,
		humidity: nullableMeasurement,
		sensor_id: z.number().int().nonnegative(),
		sensor_type: SensorTypeSchema.optional()
	})
});

export const ActuatorCommandSchema = z.object({
	phase: z.string().min(1),
	fan_volt: z.number().finite().nonnegative(),
	heater: z.boolean(),
	duration: z.number().int().nonnegative()
});

export type LiveSensorData = z.infer<typeof LiveSensorDataSchema>;
