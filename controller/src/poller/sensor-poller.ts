import type { LiveSensorDataMessage, SensorReading } from "@regen-controller/common";
import type winston from "winston";

import { errorMessage, timeoutError } from "../lib/errors";
import type { AsyncQueue } from "../lib/queue";
import { settlesWithin, waitOrAbort } from "../lib/sleep";
import { EMPTY_READING } from "../sensors/types";
import type { SensorDevice } from "../sensors/types";

export interface SensorPollerOptions {
	sensors: SensorDevice[];
	queue: AsyncQueue<LiveSensorDataMessage>;
	logger: winston.Logger;
	intervalMs?: number;
	// Pause between two sensors of one round, drawn uniformly from [min, max]
	jitterMs?: [number, number];
	stopTimeoutMs?: number;
	random?: () => number;
	now?: () => number;
}

const DEFAULT_INTERVAL_MS = 60_000;
const DEFAULT_JITTER_MS: [number, number] = [20, 80];
const DEFAULT_STOP_TIMEOUT_MS = 10_000;

/**
 * Samples every sensor once per interval and pushes `live_sensor_data`
 * messages onto the output queue.
 *
 * Rounds are scheduled on absolute ticks, so slow reads do not accumulate
 * delay; a round that overruns its slot starts the next one immediately
 * instead of bursting to catch up.
 */
export class SensorPoller {
	private readonly sensors: SensorDevice[];
	private readonly queue: AsyncQueue<LiveSensorDataMessage>;
	private readonly logger: winston.Logger;
	private readonly intervalMs: number;
	private readonly jitterMs: [number, number];
	private readonly stopTimeoutMs: number;
	private readonly random: () => number;
	private readonly now: () => number;

	private controller: AbortController | null = null;
	private worker: Promise<void> | null = null;

	constructor(opts: SensorPollerOptions) {
		this.sensors = opts.sensors;
		this.queue = opts.queue;
		this.logger = opts.logger;
		this.intervalMs = opts.intervalMs ?? DEFAULT_INTERVAL_MS;
		this.jitterMs = opts.jitterMs ?? DEFAULT_JITTER_MS;
		this.stopTimeoutMs = opts.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
		this.random = opts.random ?? Math.random;
		this.now = opts.now ?? Date.now;
	}

	get running(): boolean {
		return this.controller !== null;
	}

	/**
	 * Returns false if the poller is already running.
	 */
	start(): boolean {
		if (this.controller) {
			this.logger.info("SensorPoller already running, ignoring start");
			return false;
		}

		const controller = new AbortController();
		this.controller = controller;
		this.worker = this.run(controller.signal).catch(err => {
			this.logger.error("SensorPoller loop crashed: %s", errorMessage(err));
		});

		this.logger.info(
			"SensorPoller started (sensors=%d intervalMs=%d)",
			this.sensors.length,
			this.intervalMs
		);
		return true;
	}

	/**
	 * Returns false if already stopped. Throws a TIMEOUT_ERROR AppError when
	 * the loop does not exit within `stopTimeoutMs` (a read is stuck).
	 */
	async stop(): Promise<boolean> {
		if (!this.controller && !this.worker) {
			this.logger.info("SensorPoller already stopped, ignoring stop");
			return false;
		}

		this.controller?.abort();
		this.controller = null;

		const worker = this.worker;
		if (worker) {
			const exited = await settlesWithin(worker, this.stopTimeoutMs);
			if (!exited) {
				this.logger.error("SensorPoller loop did not stop within %d ms", this.stopTimeoutMs);
				throw timeoutError("SensorPoller loop failed to stop", { timeoutMs: this.stopTimeoutMs });
			}
			this.worker = null;
		}

		this.logger.info("SensorPoller stopped");
		return true;
	}

	private async readSafely(sensor: SensorDevice): Promise<SensorReading> {
		try {
			return await sensor.read();
		} catch (err) {
			this.logger.error("Unhandled error reading sensor %d, recording empty values: %s", sensor.sensorId, errorMessage(err));
			return { ...EMPTY_READING };
		}
	}

	private jitter(): number {
		const [min, max] = this.jitterMs;
		return min + (max - min) * this.random();
	}

	private async run(signal: AbortSignal): Promise<void> {
		let nextTick = this.now();

		while (!signal.aborted) {
			for (const sensor of this.sensors) {
				const reading = await this.readSafely(sensor);
				this.queue.put({
					type: "live_sensor_data",
					data: {
						...reading,
						sensor_id: sensor.sensorId,
						sensor_type: sensor.sensorType
					}
				});

				if (signal.aborted) return;
				await waitOrAbort(this.jitter(), signal);
			}

			nextTick += this.intervalMs;
			const delay = nextTick - this.now();
			if (delay > 0) {
				await waitOrAbort(delay, signal);
			} else {
				this.logger.debug("SensorPoller round overran its interval by %d ms", -delay);
				nextTick = this.now();
			}
		}
	}
}
