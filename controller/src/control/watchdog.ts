import type winston from "winston";

import { errorMessage } from "../lib/errors";
import { settlesWithin, waitOrAbort } from "../lib/sleep";
import { Heartbeat } from "./heartbeat";

/**
 * A restartable unit of work. It must return once `signal` aborts and should
 * beat `heartbeat` at least once per iteration.
 */
export type SupervisedTask = (signal: AbortSignal, heartbeat: Heartbeat) => Promise<void>;

export interface WatchdogOptions {
	name: string;
	task: SupervisedTask;
	logger: winston.Logger;
	checkIntervalMs?: number;
	stallTimeoutMs?: number;
	joinTimeoutMs?: number;
	now?: () => number;
}

interface Instance {
	controller: AbortController;
	heartbeat: Heartbeat;
	promise: Promise<void>;
	alive: boolean;
}

/**
 * Keeps one instance of a task running. Every `checkIntervalMs` the monitor
 * restarts the task if it has exited (crash or return) or its heartbeat is
 * older than `stallTimeoutMs`. A stalled instance is aborted and given
 * `joinTimeoutMs` to exit before the replacement starts.
 */
export class Watchdog {
	private readonly name: string;
	private readonly task: SupervisedTask;
	private readonly logger: winston.Logger;
	private readonly checkIntervalMs: number;
	private readonly stallTimeoutMs: number;
	private readonly joinTimeoutMs: number;
	private readonly now: () => number;

	private instance: Instance | null = null;
	private monitorController: AbortController | null = null;
	private monitor: Promise<void> | null = null;
	private restartCount = 0;

	constructor(opts: WatchdogOptions) {
		this.name = opts.name;
		this.task = opts.task;
		this.logger = opts.logger;
		this.checkIntervalMs = opts.checkIntervalMs ?? 1000;
		this.stallTimeoutMs = opts.stallTimeoutMs ?? 15_000;
		this.joinTimeoutMs = opts.joinTimeoutMs ?? 3000;
		this.now = opts.now ?? Date.now;
	}

	get restarts(): number {
		return this.restartCount;
	}

	get running(): boolean {
		return this.monitorController !== null;
	}

	start(): boolean {
		if (this.monitorController) return false;

		this.spawn();
		const controller = new AbortController();
		this.monitorController = controller;
		this.monitor = this.watch(controller.signal).catch(err => {
			this.logger.error("Watchdog '%s' monitor crashed: %s", this.name, errorMessage(err));
		});
		this.logger.info("Watchdog '%s' started", this.name);
		return true;
	}

	async stop(): Promise<void> {
		this.monitorController?.abort();
		this.monitorController = null;
		await this.monitor;
		this.monitor = null;

		const current = this.instance;
		this.instance = null;
		if (current) {
			await this.terminate(current);
		}
		this.logger.info("Watchdog '%s' stopped", this.name);
	}

	private spawn(): void {
		const controller = new AbortController();
		const heartbeat = new Heartbeat(this.now);
		const instance: Instance = {
			controller,
			heartbeat,
			alive: true,
			promise: Promise.resolve()
		};

		instance.promise = Promise.resolve()
			.then(() => this.task(controller.signal, heartbeat))
			.catch(err => {
				this.logger.error("Task '%s' crashed: %s", this.name, errorMessage(err));
			})
			.finally(() => {
				instance.alive = false;
			});

		this.instance = instance;
	}

	private async terminate(instance: Instance): Promise<void> {
		instance.controller.abort();
		const exited = await settlesWithin(instance.promise, this.joinTimeoutMs);
		if (!exited) {
			this.logger.warn("Task '%s' did not exit within %d ms after abort, abandoning it", this.name, this.joinTimeoutMs);
		}
	}

	private async watch(signal: AbortSignal): Promise<void> {
		while (await waitOrAbort(this.checkIntervalMs, signal)) {
			const current = this.instance;
			if (!current) continue;

			const age = current.heartbeat.ageMs();
			let reason: string | null = null;
			if (!current.alive) {
				reason = "task exited";
			} else if (age > this.stallTimeoutMs) {
				reason = `no heartbeat for ${age} ms`;
			}
			if (!reason) continue;

			this.logger.error("Watchdog '%s': %s, restarting", this.name, reason);
			await this.terminate(current);
			if (signal.aborted) return;

			this.restartCount++;
			this.spawn();
		}
	}
}
