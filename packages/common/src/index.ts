// Shapes shared by the poller, ingestion and actuator client
export type { ActuatorCommand, CyclePhase, LiveSensorDataMessage, SensorReading, SensorType } from "./telemetry";

// Validation schemas
export { ActuatorCommandSchema, CyclePhaseSchema, LiveSensorDataSchema, SensorTypeSchema } from "./schema";
export type { LiveSensorData } from "./schema";
