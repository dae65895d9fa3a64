import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { Command } from "commander";
import { z } from "zod";

import { configError, errorMessage } from "./errors";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export interface SensorConfig {
	sensorId: number; // Modbus slave address
	type: "tongdy" | "simulated";
	voc: boolean;
}

export interface AppConfig {
	paths: {
		sqlite: string;
		logDir: string;
	};

	logLevel: LogLevel;

	modbus: {
		port: string;
		baudRate: number;
		timeoutMs: number;
		// RS-485 turnaround gap enforced between transactions
		preDelayMs: number;
	};

	poller: {
		intervalMs: number;
		jitterMs: [number, number];
		stopTimeoutMs: number;
	};

	actuator: {
		baseUrl: string;
		timeoutMs: number;
	};

	control: {
		activeDelayMs: number;
		idleDelayMs: number;
		networkBackoffMs: number;
	};

	watchdog: {
		checkIntervalMs: number;
		stallTimeoutMs: number;
		joinTimeoutMs: number;
	};

	sensors: SensorConfig[];
}

/* ---------- defaults ---------- */

const DEFAULT_SQLITE = "/var/lib/regen-controller/hlr.sqlite";
const DEFAULT_LOG_DIR = "/var/log/regen-controller";
const DEFAULT_MODBUS_PORT = "/dev/ttyUSB0";

// Retry policy of the command sender: a full send must fit in one stall window
const SEND_ATTEMPTS = 5;
const SEND_RETRY_DELAY_MS = 1000;

const positiveMs = z.number().int().positive();
const nonNegativeMs = z.number().int().nonnegative();

const FileConfigSchema = z.object({
	paths: z
		.object({
			sqlite: z.string().min(1).optional(),
			logDir: z.string().min(1).optional()
		})
		.optional(),
	logLevel: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).optional(),
	modbus: z
		.object({
			port: z.string().min(1).optional(),
			baudRate: z.number().int().positive().optional(),
			timeoutMs: positiveMs.optional(),
			preDelayMs: nonNegativeMs.optional()
		})
		.optional(),
	poller: z
		.object({
			intervalMs: positiveMs.optional(),
			jitterMs: z.tuple([nonNegativeMs, nonNegativeMs]).optional(),
			stopTimeoutMs: positiveMs.optional()
		})
		.optional(),
	actuator: z
		.object({
			baseUrl: z.string().url().optional(),
			timeoutMs: positiveMs.optional()
		})
		.optional(),
	control: z
		.object({
			activeDelayMs: nonNegativeMs.optional(),
			idleDelayMs: nonNegativeMs.optional(),
			networkBackoffMs: nonNegativeMs.optional()
		})
		.optional(),
	watchdog: z
		.object({
			checkIntervalMs: positiveMs.optional(),
			stallTimeoutMs: positiveMs.optional(),
			joinTimeoutMs: positiveMs.optional()
		})
		.optional(),
	sensors: z.array(
		z.object({
			sensorId: z.number().int().min(1).max(247),
			type: z.enum(["tongdy", "simulated"]).default("tongdy"),
			voc: z.boolean().default(false)
		})
	).min(1)
});

type FileConfig = z.infer<typeof FileConfigSchema>;

function parseCommandLine(argv: readonly string[]): { configPath: string } {
	const program = new Command();

	program
		.requiredOption("-c, --config <path>", "Path to configuration file")
		.allowUnknownOption(true)
		.allowExcessArguments(true);

	program.parse(Array.from(argv));

	const opts = program.opts<{ config: string }>();
	return { configPath: opts.config };
}

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
	const value = env[name]?.trim();
	return value ? value : undefined;
}

/* ---------- validation ---------- */

function validateConfig(cfg: AppConfig): void {
	const [jMin, jMax] = cfg.poller.jitterMs;
	if (jMin > jMax) {
		throw configError("config.poller.jitterMs must be [min, max] with min <= max");
	}
	if (jMax >= cfg.poller.intervalMs) {
		throw configError("config.poller.jitterMs max must be smaller than poller.intervalMs");
	}

	const seen = new Set<number>();
	for (const s of cfg.sensors) {
		if (seen.has(s.sensorId)) {
			throw configError(`sensor ${s.sensorId}: duplicate sensorId`);
		}
		seen.add(s.sensorId);
	}

	if (cfg.watchdog.checkIntervalMs >= cfg.watchdog.stallTimeoutMs) {
		throw configError("config.watchdog.checkIntervalMs must be smaller than watchdog.stallTimeoutMs");
	}

	const worstSendMs = cfg.actuator.timeoutMs * SEND_ATTEMPTS + (SEND_ATTEMPTS - 1) * SEND_RETRY_DELAY_MS;
	if (worstSendMs >= cfg.watchdog.stallTimeoutMs) {
		throw configError(
			`config.actuator.timeoutMs too large: ${SEND_ATTEMPTS} attempts take up to ${worstSendMs} ms, not below watchdog.stallTimeoutMs`
		);
	}

	if (!cfg.actuator.baseUrl) {
		throw configError("actuator.baseUrl (or ACTUATOR_URL) is required");
	}
}

/* ---------- public API ---------- */

/**
 * Builds an AppConfig from the parsed JSON file and environment.
 * Environment values (MODBUS_PORT, ACTUATOR_URL, LOG_LEVEL) win over the file.
 */
export function buildConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AppConfig {
	const res = FileConfigSchema.safeParse(raw);
	if (!res.success) {
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw configError(`Invalid configuration: ${issues}`, res.error.issues);
	}

	const parsed: FileConfig = res.data;

	const envLevel = envString(env, "LOG_LEVEL");
	const levelRes = FileConfigSchema.shape.logLevel.safeParse(envLevel?.toLowerCase());
	const logLevel = (levelRes.success ? levelRes.data : undefined) ?? parsed.logLevel ?? "info";

	const cfg: AppConfig = {
		paths: {
			sqlite: parsed.paths?.sqlite ?? DEFAULT_SQLITE,
			logDir: parsed.paths?.logDir ?? DEFAULT_LOG_DIR
		},
		logLevel,
		modbus: {
			port: envString(env, "MODBUS_PORT") ?? parsed.modbus?.port ?? DEFAULT_MODBUS_PORT,
			baudRate: parsed.modbus?.baudRate ?? 19200,
			timeoutMs: parsed.modbus?.timeoutMs ?? 1500,
			preDelayMs: parsed.modbus?.preDelayMs ?? 30
		},
		poller: {
			intervalMs: parsed.poller?.intervalMs ?? 60_000,
			jitterMs: parsed.poller?.jitterMs ?? [20, 80],
			stopTimeoutMs: parsed.poller?.stopTimeoutMs ?? 10_000
		},
		actuator: {
			baseUrl: envString(env, "ACTUATOR_URL") ?? parsed.actuator?.baseUrl ?? "",
			timeoutMs: parsed.actuator?.timeoutMs ?? 2000
		},
		control: {
			activeDelayMs: parsed.control?.activeDelayMs ?? 200,
			idleDelayMs: parsed.control?.idleDelayMs ?? 1000,
			networkBackoffMs: parsed.control?.networkBackoffMs ?? 5000
		},
		watchdog: {
			checkIntervalMs: parsed.watchdog?.checkIntervalMs ?? 1000,
			stallTimeoutMs: parsed.watchdog?.stallTimeoutMs ?? 15_000,
			joinTimeoutMs: parsed.watchdog?.joinTimeoutMs ?? 3000
		},
		sensors: parsed.sensors
	};

	validateConfig(cfg);
	return cfg;
}

export function loadConfig(argv: readonly string[] = process.argv): AppConfig {
	const { configPath } = parseCommandLine(argv);

	let raw: unknown;
	try {
		raw = JSON.parse(fs.readFileSync(configPath, "utf8")) as unknown;
	} catch (err) {
		throw configError(`Cannot read configuration file '${configPath}'`, errorMessage(err));
	}

	const cfg = buildConfig(raw);

	// Verify that dirs exist
	ensureDir(path.dirname(cfg.paths.sqlite));
	ensureDir(cfg.paths.logDir);

	return cfg;
}
