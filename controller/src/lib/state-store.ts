import type Database from "better-sqlite3";
import type winston from "winston";

import {
	activateCycle,
	applyPhaseTransition,
	forceEnd,
	getCycleState,
	getSettingProfile,
	initDb,
	insertSensorData,
	openDb
} from "./sqlite";
import type { CycleState, DbHandle, PhaseTransition, SensorDataRow, SettingProfile } from "./sqlite";

/**
 * Persistence port of the control core. Every method throws a DB_ERROR
 * AppError on failure; callers decide whether to reconnect.
 */
export interface CycleStore {
	getCycleState(): CycleState | undefined;
	getSettingProfile(cyclicName: string): SettingProfile | undefined;
	applyPhaseTransition(id: number, t: PhaseTransition): void;
	forceEnd(id: number): void;
	reconnect(): void;
}

export interface SensorDataSink {
	getCycleState(): CycleState | undefined;
	insertSensorData(row: SensorDataRow): void;
}

/**
 * SQLite-backed store owning one connection. `reconnect()` closes the handle
 * and opens a fresh one on the same path.
 */
export class StateStore implements CycleStore, SensorDataSink {
	private handle: DbHandle;

	constructor(
		private readonly sqlitePath: string,
		private readonly logger: winston.Logger
	) {
		this.handle = openDb(sqlitePath);
		initDb(this.handle.db);
	}

	get db(): Database.Database {
		return this.handle.db;
	}

	getCycleState(): CycleState | undefined {
		return getCycleState(this.handle.db);
	}

	getSettingProfile(cyclicName: string): SettingProfile | undefined {
		return getSettingProfile(this.handle.db, cyclicName);
	}

	applyPhaseTransition(id: number, t: PhaseTransition): void {
		applyPhaseTransition(this.handle.db, id, t);
	}

	forceEnd(id: number): void {
		forceEnd(this.handle.db, id);
	}

	activateCycle(cyclicName: string, loops: number): void {
		activateCycle(this.handle.db, cyclicName, loops);
	}

	insertSensorData(row: SensorDataRow): void {
		insertSensorData(this.handle.db, row);
	}

	reconnect(): void {
		this.logger.warn("Reconnecting to state store (%s)", this.sqlitePath);
		try {
			this.handle.close();
		} catch (err) {
			this.logger.warn("Closing stale state store handle failed: %s", err instanceof Error ? err.message : String(err));
		}
		this.handle = openDb(this.sqlitePath);
		initDb(this.handle.db);
	}

	close(): void {
		this.handle.close();
	}
}
