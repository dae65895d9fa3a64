import type { LiveSensorDataMessage } from "@regen-controller/common";
import type winston from "winston";

import { BusArbiter } from "./bus/bus-arbiter";
import { ActuatorClient } from "./control/actuator-client";
import { CommandSender } from "./control/command-sender";
import { CycleStateMachine } from "./control/cycle-state-machine";
import { Watchdog } from "./control/watchdog";
import { SensorDataIngestor } from "./ingest/sensor-data-ingestor";
import { loadConfig } from "./lib/config";
import { errorMessage } from "./lib/errors";
import { createLogger } from "./lib/log";
import { AsyncQueue } from "./lib/queue";
import { StateStore } from "./lib/state-store";
import { SensorPoller } from "./poller/sensor-poller";
import { createSensors } from "./sensors";
import { ModbusPortPool } from "./sensors/modbus";

async function main(): Promise<void> {
	const config = loadConfig();

	const logger: winston.Logger = createLogger({
		logDir: config.paths.logDir,
		serviceName: "regen-controller",
		level: config.logLevel
	});

	logger.info(
		"Regen controller starting (port=%s sensors=%d actuator=%s)",
		config.modbus.port,
		config.sensors.length,
		config.actuator.baseUrl
	);

	const store = new StateStore(config.paths.sqlite, logger);

	const pool = new ModbusPortPool({ baudRate: config.modbus.baudRate, timeoutMs: config.modbus.timeoutMs }, logger);
	const arbiter = new BusArbiter();
	const sensors = await createSensors({ config, pool, arbiter, logger });

	const queue = new AsyncQueue<LiveSensorDataMessage>();
	const poller = new SensorPoller({
		sensors,
		queue,
		logger,
		intervalMs: config.poller.intervalMs,
		jitterMs: config.poller.jitterMs,
		stopTimeoutMs: config.poller.stopTimeoutMs
	});

	const ingestor = new SensorDataIngestor({ queue, sink: store, logger });

	const sender = new CommandSender({
		actuator: new ActuatorClient({
			baseUrl: config.actuator.baseUrl,
			timeoutMs: config.actuator.timeoutMs,
			logger
		}),
		store,
		logger
	});
	const machine = new CycleStateMachine({
		store,
		sender,
		logger,
		activeDelayMs: config.control.activeDelayMs,
		idleDelayMs: config.control.idleDelayMs,
		networkBackoffMs: config.control.networkBackoffMs
	});
	const watchdog = new Watchdog({
		name: "cycle-control",
		task: (signal, heartbeat) => machine.run(signal, heartbeat),
		logger,
		checkIntervalMs: config.watchdog.checkIntervalMs,
		stallTimeoutMs: config.watchdog.stallTimeoutMs,
		joinTimeoutMs: config.watchdog.joinTimeoutMs
	});

	const ingestAbort = new AbortController();
	const ingesting = ingestor.run(ingestAbort.signal);

	watchdog.start();
	poller.start();

	const stopped = new Promise<string>(resolve => {
		process.once("SIGINT", () => resolve("SIGINT")); // Ctrl+C
		process.once("SIGTERM", () => resolve("SIGTERM")); // systemd stop
	});
	const signal = await stopped;
	logger.info("Stopping regen controller (signal=%s)", signal);

	try {
		await poller.stop();
	} catch (err) {
		logger.error("Poller did not stop cleanly: %s", errorMessage(err));
	}
	await watchdog.stop();

	ingestAbort.abort();
	await ingesting;

	await pool.closeAll();
	store.close();
	logger.info("Regen controller exiting");
}

main()
	.then(() => process.exit(0))
	.catch(err => {
		console.error(err);
		process.exit(1);
	});
