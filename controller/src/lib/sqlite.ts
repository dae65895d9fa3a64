import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import { CyclePhaseSchema } from "@regen-controller/common";
import type { CyclePhase, SensorType } from "@regen-controller/common";

import { dbError } from "./errors";

export interface DbHandle {
	db: Database.Database;
	close: () => void;
}

const CycleStateRowSchema = z.object({
	id: z.number().int(),
	is_start: z.number().int(),
	cyclicName: z.string(),
	systemState: CyclePhaseSchema,
	starttime: z.number().int(),
	endtime: z.number().int(),
	cyclic_loop_dur: z.number().int()
});

// Operators may store fractional minutes; the actuator takes whole ones
const minutes = z.number().transform(v => Math.trunc(v));

const SettingProfileRowSchema = z.object({
	cyclic_name: z.string(),
	regen_fan_volt: z.number(),
	regen_duration: minutes,
	cool_fan_volt: z.number(),
	cool_duration: minutes,
	idle_duration: minutes,
	scab_fan_volt: z.number(),
	scab_duration: minutes
});

/** The controller's view of the `state_hlr` row it owns. */
export interface CycleState {
	id: number;
	isStart: boolean;
	cyclicName: string;
	systemState: CyclePhase;
	startTimeMs: number;
	endTimeMs: number;
	cyclicLoopRemaining: number;
}

/** A `setting_control` row. Durations are minutes, fan setpoints volts. */
export interface SettingProfile {
	cyclicName: string;
	regenFanVolt: number;
	regenDurationMin: number;
	coolFanVolt: number;
	coolDurationMin: number;
	idleDurationMin: number;
	scabFanVolt: number;
	scabDurationMin: number;
}

export interface PhaseTransition {
	startMs: number;
	endMs: number;
	phase: CyclePhase;
	loopRemaining?: number;
}

export interface SensorDataRow {
	datetimeMs: number;
	sensorId: number;
	co2: number | null;
	temperature: number | null;
	humidity: number | null;
	mode: string;
	sensorType: SensorType;
	cyclicName: string | null;
}

function ensureDir(p: string): void {
	fs.mkdirSync(p, { recursive: true });
}

function run<T>(what: string, fn: () => T): T {
	try {
		return fn();
	} catch (err) {
		throw dbError(`${what} failed`, undefined, err);
	}
}

export function openDb(sqlitePath: string): DbHandle {
	if (sqlitePath !== ":memory:") {
		ensureDir(path.dirname(sqlitePath));
	}

	const db = run("open database", () => new Database(sqlitePath));

	// The control loop and the ingestion loop share the file
	db.pragma("journal_mode = WAL");
	db.pragma("synchronous = NORMAL");
	db.pragma("busy_timeout = 5000");

	return {
		db,
		close: () => db.close()
	};
}

export function initDb(db: Database.Database): void {
	const tx = db.transaction(() => {
		const row = db.prepare("PRAGMA user_version").get() as { user_version: number } | undefined;
		const ver = row?.user_version ?? 0;

		if (ver === 0) {
			db.exec(`
				CREATE TABLE IF NOT EXISTS state_hlr (
					id               INTEGER PRIMARY KEY AUTOINCREMENT,
					is_start         INTEGER NOT NULL DEFAULT 0 CHECK (is_start IN (0,1)),
					cyclicName       TEXT    NOT NULL DEFAULT '',
					systemState      TEXT    NOT NULL DEFAULT 'end'
						CHECK (systemState IN ('regen_firsttime','regen','cooldown','idle','scrub','end')),
					starttime        INTEGER NOT NULL DEFAULT 0,
					endtime          INTEGER NOT NULL DEFAULT 0,
					cyclic_loop_dur  INTEGER NOT NULL DEFAULT 0
				);

				CREATE TABLE IF NOT EXISTS setting_control (
					cyclic_name      TEXT PRIMARY KEY,
					regen_fan_volt   REAL    NOT NULL,
					regen_duration   INTEGER NOT NULL,
					cool_fan_volt    REAL    NOT NULL,
					cool_duration    INTEGER NOT NULL,
					idle_duration    INTEGER NOT NULL,
					scab_fan_volt    REAL    NOT NULL,
					scab_duration    INTEGER NOT NULL
				);

				CREATE TABLE IF NOT EXISTS hlr_sensor_data (
					id           INTEGER PRIMARY KEY AUTOINCREMENT,
					datetime     INTEGER NOT NULL,
					sensor_id    INTEGER NOT NULL,
					co2          REAL,
					temperature  REAL,
					humidity     REAL,
					mode         TEXT    NOT NULL,
					sensor_type  TEXT    NOT NULL,
					cyclicName   TEXT
				);

				CREATE INDEX IF NOT EXISTS idx_hlr_sensor_data_sensor_dt
				ON hlr_sensor_data (sensor_id, datetime);
			`);

			db.pragma("user_version = 1");
		}

		const count = db.prepare("SELECT COUNT(*) AS n FROM state_hlr").get() as { n: number };
		if (count.n === 0) {
			db.prepare("INSERT INTO state_hlr (is_start, systemState) VALUES (0, 'end')").run();
		}
	});

	run("initialize schema", () => tx());
}

function toCycleState(row: unknown): CycleState {
	const r = CycleStateRowSchema.parse(row);
	return {
		id: r.id,
		isStart: r.is_start === 1,
		cyclicName: r.cyclicName,
		systemState: r.systemState,
		startTimeMs: r.starttime,
		endTimeMs: r.endtime,
		cyclicLoopRemaining: r.cyclic_loop_dur
	};
}

/**
 * The controller owns the lowest-id `state_hlr` row.
 */
export function getCycleState(db: Database.Database): CycleState | undefined {
	const row = run("read state_hlr", () => db.prepare("SELECT * FROM state_hlr ORDER BY id ASC LIMIT 1").get());
	if (row === undefined) return undefined;
	return run("decode state_hlr row", () => toCycleState(row));
}

export function getSettingProfile(db: Database.Database, cyclicName: string): SettingProfile | undefined {
	const row = run("read setting_control", () =>
		db.prepare("SELECT * FROM setting_control WHERE cyclic_name = ? LIMIT 1").get(cyclicName)
	);
	if (row === undefined) return undefined;

	const r = run("decode setting_control row", () => SettingProfileRowSchema.parse(row));
	return {
		cyclicName: r.cyclic_name,
		regenFanVolt: r.regen_fan_volt,
		regenDurationMin: r.regen_duration,
		coolFanVolt: r.cool_fan_volt,
		coolDurationMin: r.cool_duration,
		idleDurationMin: r.idle_duration,
		scabFanVolt: r.scab_fan_volt,
		scabDurationMin: r.scab_duration
	};
}

export function upsertSettingProfile(db: Database.Database, p: SettingProfile): void {
	run("write setting_control", () =>
		db
			.prepare(
				`INSERT INTO setting_control (
					cyclic_name, regen_fan_volt, regen_duration, cool_fan_volt, cool_duration,
					idle_duration, scab_fan_volt, scab_duration
				) VALUES (
					@cyclicName, @regenFanVolt, @regenDurationMin, @coolFanVolt, @coolDurationMin,
					@idleDurationMin, @scabFanVolt, @scabDurationMin
				)
				ON CONFLICT (cyclic_name) DO UPDATE SET
					regen_fan_volt = excluded.regen_fan_volt,
					regen_duration = excluded.regen_duration,
					cool_fan_volt  = excluded.cool_fan_volt,
					cool_duration  = excluded.cool_duration,
					idle_duration  = excluded.idle_duration,
					scab_fan_volt  = excluded.scab_fan_volt,
					scab_duration  = excluded.scab_duration`
			)
			.run(p)
	);
}

export function applyPhaseTransition(db: Database.Database, id: number, t: PhaseTransition): void {
	const tx = db.transaction(() => {
		db.prepare("UPDATE state_hlr SET starttime = ?, endtime = ?, systemState = ? WHERE id = ?").run(
			t.startMs,
			t.endMs,
			t.phase,
			id
		);
		if (t.loopRemaining !== undefined) {
			db.prepare("UPDATE state_hlr SET cyclic_loop_dur = ? WHERE id = ?").run(t.loopRemaining, id);
		}
	});

	run("update state_hlr phase", () => tx());
}

/**
 * Safe state: phase end, timers cleared, cycle inactive.
 */
export function forceEnd(db: Database.Database, id: number): void {
	run("force state_hlr end", () =>
		db
			.prepare("UPDATE state_hlr SET systemState = 'end', starttime = 0, endtime = 0, is_start = 0 WHERE id = ?")
			.run(id)
	);
}

/**
 * Arms the owned row for a fresh cycle: the control loop picks it up as
 * `regen_firsttime` on its next iteration.
 */
export function activateCycle(db: Database.Database, cyclicName: string, loops: number): void {
	const tx = db.transaction(() => {
		const state = getCycleState(db);
		if (!state) {
			throw new Error("state_hlr has no row");
		}
		db.prepare(
			`UPDATE state_hlr
			SET is_start = 1, cyclicName = ?, systemState = 'regen_firsttime',
				starttime = 0, endtime = 0, cyclic_loop_dur = ?
			WHERE id = ?`
		).run(cyclicName, loops, state.id);
	});

	run("activate cycle", () => tx());
}

export function insertSensorData(db: Database.Database, row: SensorDataRow): void {
	run("insert hlr_sensor_data", () =>
		db
			.prepare(
				`INSERT INTO hlr_sensor_data (
					datetime, sensor_id, co2, temperature, humidity, mode, sensor_type, cyclicName
				) VALUES (
					@datetimeMs, @sensorId, @co2, @temperature, @humidity, @mode, @sensorType, @cyclicName
				)`
			)
			.run(row)
	);
}
