import { describe, expect, it } from "vitest";

import { buildConfig } from "./config";
import { isAppError } from "./errors";

const MINIMAL = {
	actuator: { baseUrl: "http://actuator.local:8080" },
	sensors: [{ sensorId: 2, voc: true }, { sensorId: 3 }]
};

function configErrorOf(raw: unknown, env: NodeJS.ProcessEnv = {}): string | undefined {
	try {
		buildConfig(raw, env);
	} catch (err) {
		return isAppError(err, "CONFIG_ERROR") ? err.message : `unexpected: ${String(err)}`;
	}
	return undefined;
}

describe("buildConfig", () => {
	it("fills in defaults", () => {
		const cfg = buildConfig(MINIMAL, {});

		expect(cfg.logLevel).toBe("info");
		expect(cfg.modbus).toEqual({ port: "/dev/ttyUSB0", baudRate: 19200, timeoutMs: 1500, preDelayMs: 30 });
		expect(cfg.poller).toEqual({ intervalMs: 60_000, jitterMs: [20, 80], stopTimeoutMs: 10_000 });
		expect(cfg.actuator).toEqual({ baseUrl: "http://actuator.local:8080", timeoutMs: 2000 });
		expect(cfg.control).toEqual({ activeDelayMs: 200, idleDelayMs: 1000, networkBackoffMs: 5000 });
		expect(cfg.watchdog).toEqual({ checkIntervalMs: 1000, stallTimeoutMs: 15_000, joinTimeoutMs: 3000 });
		expect(cfg.sensors).toEqual([
			{ sensorId: 2, type: "tongdy", voc: true },
			{ sensorId: 3, type: "tongdy", voc: false }
		]);
	});

	it("lets the environment override the file", () => {
		const cfg = buildConfig(MINIMAL, {
			MODBUS_PORT: "/dev/ttyAMA0",
			ACTUATOR_URL: "http://10.0.0.5:8080",
			LOG_LEVEL: "DEBUG"
		});

		expect(cfg.modbus.port).toBe("/dev/ttyAMA0");
		expect(cfg.actuator.baseUrl).toBe("http://10.0.0.5:8080");
		expect(cfg.logLevel).toBe("debug");
	});

	it("ignores an unknown LOG_LEVEL", () => {
		expect(buildConfig({ ...MINIMAL, logLevel: "warn" }, { LOG_LEVEL: "loud" }).logLevel).toBe("warn");
	});

	it("requires an actuator URL", () => {
		expect(configErrorOf({ sensors: [{ sensorId: 2 }] })).toBe("actuator.baseUrl (or ACTUATOR_URL) is required");
	});

	it("rejects an inverted jitter range", () => {
		expect(configErrorOf({ ...MINIMAL, poller: { jitterMs: [80, 20] } })).toBe(
			"config.poller.jitterMs must be [min, max] with min <= max"
		);
	});

	it("rejects duplicate sensor addresses", () => {
		expect(configErrorOf({ ...MINIMAL, sensors: [{ sensorId: 4 }, { sensorId: 4 }] })).toBe(
			"sensor 4: duplicate sensorId"
		);
	});

	it("rejects a stall timeout shorter than the check interval", () => {
		expect(configErrorOf({ ...MINIMAL, watchdog: { checkIntervalMs: 5000, stallTimeoutMs: 2000 } })).toBe(
			"config.watchdog.checkIntervalMs must be smaller than watchdog.stallTimeoutMs"
		);
	});

	it("rejects an actuator timeout whose retries outlast the stall window", () => {
		const slow = { ...MINIMAL, actuator: { baseUrl: "http://actuator.local:8080", timeoutMs: 3000 } };

		expect(configErrorOf(slow)).toBe(
			"config.actuator.timeoutMs too large: 5 attempts take up to 19000 ms, not below watchdog.stallTimeoutMs"
		);
		expect(configErrorOf({ ...slow, watchdog: { stallTimeoutMs: 20_000 } })).toBeUndefined();
	});

	it("reports schema errors with their path", () => {
		expect(configErrorOf({ ...MINIMAL, sensors: [{ sensorId: 300 }] })).toMatch(/^Invalid configuration: sensors\.0\.sensorId: /);
	});
});
