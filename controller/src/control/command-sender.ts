import type winston from "winston";

import { errorMessage, isAppError } from "../lib/errors";
import { sleep, waitOrAbort } from "../lib/sleep";
import type { CycleStore } from "../lib/state-store";
import type { Actuator } from "./actuator-client";
import type { Heartbeat } from "./heartbeat";

export interface PhaseCommand {
	phase: string;
	heater: boolean;
	fanVolt: number;
	durationMin: number;
}

// Ties a send to the supervised run that issued it
export interface SendContext {
	signal?: AbortSignal;
	heartbeat?: Heartbeat;
}

export interface CommandSenderOptions {
	actuator: Actuator;
	store: CycleStore;
	logger: winston.Logger;
	maxAttempts?: number;
	retryDelayMs?: number;
}

/**
 * Delivers phase commands with bounded retry. When every attempt fails the
 * cycle row is forced to `end`/inactive and the actuator is asked for an
 * emergency shutdown, so the plant never sits in an unknown phase.
 */
export class CommandSender {
	private readonly actuator: Actuator;
	private readonly store: CycleStore;
	private readonly logger: winston.Logger;
	private readonly maxAttempts: number;
	private readonly retryDelayMs: number;

	constructor(opts: CommandSenderOptions) {
		this.actuator = opts.actuator;
		this.store = opts.store;
		this.logger = opts.logger;
		this.maxAttempts = opts.maxAttempts ?? 5;
		this.retryDelayMs = opts.retryDelayMs ?? 1000;
	}

	/**
	 * Resolves true once the actuator answered 200.
	 *
	 * The heartbeat is beaten before every attempt. Once `signal` aborts no
	 * further attempt is made and nothing is written: the run that owned this
	 * send has been replaced.
	 */
	async send(stateId: number, cmd: PhaseCommand, ctx: SendContext = {}): Promise<boolean> {
		const { signal, heartbeat } = ctx;
		const body = {
			phase: cmd.phase,
			fan_volt: cmd.fanVolt,
			heater: cmd.heater,
			duration: cmd.durationMin
		};

		for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
			if (signal?.aborted) return this.abandon(cmd, attempt - 1);
			heartbeat?.beat();

			try {
				const status = await this.actuator.sendAuto(body, signal);
				if (status === 200) {
					this.logger.info("Actuator accepted phase=%s (attempt %d)", cmd.phase, attempt);
					return true;
				}
				this.logger.warn(
					"Actuator rejected phase=%s with HTTP %d (attempt %d/%d)",
					cmd.phase,
					status,
					attempt,
					this.maxAttempts
				);
			} catch (err) {
				if (isAppError(err, "VALIDATION_ERROR")) throw err;
				this.logger.warn(
					"Actuator unreachable for phase=%s (attempt %d/%d): %s",
					cmd.phase,
					attempt,
					this.maxAttempts,
					errorMessage(err)
				);
			}

			if (attempt < this.maxAttempts) {
				if (signal) {
					await waitOrAbort(this.retryDelayMs, signal);
				} else {
					await sleep(this.retryDelayMs);
				}
			}
		}

		if (signal?.aborted) return this.abandon(cmd, this.maxAttempts);
		heartbeat?.beat();

		this.logger.error("Phase %s not delivered after %d attempts, forcing end state", cmd.phase, this.maxAttempts);
		try {
			this.store.forceEnd(stateId);
		} finally {
			await this.emergencyShutdown();
		}
		return false;
	}

	private abandon(cmd: PhaseCommand, attempts: number): boolean {
		this.logger.warn("Send of phase=%s abandoned after %d attempt(s): run cancelled", cmd.phase, attempts);
		return false;
	}

	/**
	 * End-of-loop stop. Fire-and-log.
	 */
	async stop(): Promise<void> {
		try {
			const status = await this.actuator.stop();
			this.logger.info("Actuator stop -> HTTP %d", status);
		} catch (err) {
			this.logger.error("Actuator stop failed: %s", errorMessage(err));
		}
	}

	private async emergencyShutdown(): Promise<void> {
		try {
			const status = await this.actuator.emergencyShutdown();
			this.logger.warn("Emergency shutdown requested -> HTTP %d", status);
		} catch (err) {
			this.logger.error("Emergency shutdown call failed: %s", errorMessage(err));
		}
	}
}
