import { LiveSensorDataSchema } from "@regen-controller/common";
import type { LiveSensorData, LiveSensorDataMessage } from "@regen-controller/common";
import type winston from "winston";

import { errorMessage, validationError } from "../lib/errors";
import type { AsyncQueue } from "../lib/queue";
import type { SensorDataSink } from "../lib/state-store";

export interface SensorDataIngestorOptions {
	queue: AsyncQueue<LiveSensorDataMessage>;
	sink: SensorDataSink;
	logger: winston.Logger;
	now?: () => number;
}

function parseMessage(msg: unknown): LiveSensorData {
	const res = LiveSensorDataSchema.safeParse(msg);
	if (!res.success) {
		// Keep the error compact so it fits into logs
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw validationError(`Sensor message validation failed: ${issues}`);
	}
	return res.data;
}

/**
 * Drains the poller's output queue into `hlr_sensor_data`. Each row is tagged
 * with the cycle phase current at ingestion time, or "stopped" when no cycle
 * is running.
 */
export class SensorDataIngestor {
	private readonly queue: AsyncQueue<LiveSensorDataMessage>;
	private readonly sink: SensorDataSink;
	private readonly logger: winston.Logger;
	private readonly now: () => number;

	constructor(opts: SensorDataIngestorOptions) {
		this.queue = opts.queue;
		this.sink = opts.sink;
		this.logger = opts.logger;
		this.now = opts.now ?? Date.now;
	}

	/**
	 * Stores one message. Returns false (and logs) when it could not be stored.
	 */
	ingest(msg: LiveSensorDataMessage): boolean {
		try {
			const { data } = parseMessage(msg);
			const state = this.sink.getCycleState();
			const running = state?.isStart ? state : undefined;

			this.sink.insertSensorData({
				datetimeMs: this.now(),
				sensorId: data.sensor_id,
				co2: data.co2,
				temperature: data.temperature,
				humidity: data.humidity,
				mode: running?.systemState ?? "stopped",
				sensorType: data.sensor_type ?? "tongdy",
				cyclicName: running?.cyclicName ?? null
			});
			return true;
		} catch (err) {
			this.logger.error("Dropping sensor message: %s", errorMessage(err));
			return false;
		}
	}

	async run(signal: AbortSignal): Promise<void> {
		this.logger.info("Sensor data ingestion started");
		for (;;) {
			const msg = await this.queue.get(signal);
			if (msg === undefined) break;
			this.ingest(msg);
		}
		// Whatever the poller produced before shutdown still gets stored
		for (const msg of this.queue.drain()) {
			this.ingest(msg);
		}
		this.logger.info("Sensor data ingestion stopped");
	}
}
