import type { CyclePhase } from "@regen-controller/common";
import type winston from "winston";

import { asAppError, errorMessage, isAppError } from "../lib/errors";
import { waitOrAbort } from "../lib/sleep";
import type { CycleState, SettingProfile } from "../lib/sqlite";
import type { CycleStore } from "../lib/state-store";
import type { CommandSender, PhaseCommand, SendContext } from "./command-sender";
import type { Heartbeat } from "./heartbeat";

const MINUTE_MS = 60_000;

interface TransitionPlan {
	command: PhaseCommand;
	next: CyclePhase;
	durationMin: number;
	// scrub -> regen closes one loop
	closesLoop: boolean;
}

type PlanFn = (p: SettingProfile) => TransitionPlan;

const regenPlan: PlanFn = p => ({
	command: { phase: "regen", heater: true, fanVolt: p.regenFanVolt, durationMin: p.regenDurationMin },
	next: "cooldown",
	durationMin: p.regenDurationMin,
	closesLoop: false
});

// Keyed by the persisted phase: the phase whose command is sent next
const TRANSITIONS: Partial<Record<CyclePhase, PlanFn>> = {
	regen: regenPlan,
	cooldown: p => ({
		command: { phase: "cooldown", heater: false, fanVolt: p.coolFanVolt, durationMin: p.coolDurationMin },
		next: "idle",
		durationMin: p.coolDurationMin,
		closesLoop: false
	}),
	idle: p => ({
		command: { phase: "idle", heater: false, fanVolt: 0, durationMin: p.idleDurationMin },
		next: "scrub",
		durationMin: p.idleDurationMin,
		closesLoop: false
	}),
	scrub: p => ({
		command: { phase: "scrub", heater: false, fanVolt: p.scabFanVolt, durationMin: p.scabDurationMin },
		next: "regen",
		durationMin: p.scabDurationMin,
		closesLoop: true
	})
};

export type IterationOutcome =
	| "inactive"
	| "ended"
	| "missing_settings"
	| "waiting"
	| "transitioned"
	| "rejected"
	| "no_transition";

export interface IterationResult {
	outcome: IterationOutcome;
	// Pause before the next iteration
	delayMs: number;
}

export interface CycleStateMachineOptions {
	store: CycleStore;
	sender: CommandSender;
	logger: winston.Logger;
	now?: () => number;
	activeDelayMs?: number;
	idleDelayMs?: number;
	networkBackoffMs?: number;
}

/**
 * Drives the persisted regen -> cooldown -> idle -> scrub loop.
 *
 * `step()` performs one iteration against the store and the actuator;
 * `run()` repeats it until the signal aborts, turning store errors into a
 * reconnect and network errors into a backoff.
 */
export class CycleStateMachine {
	private readonly store: CycleStore;
	private readonly sender: CommandSender;
	private readonly logger: winston.Logger;
	private readonly now: () => number;
	private readonly activeDelayMs: number;
	private readonly idleDelayMs: number;
	private readonly networkBackoffMs: number;

	constructor(opts: CycleStateMachineOptions) {
		this.store = opts.store;
		this.sender = opts.sender;
		this.logger = opts.logger;
		this.now = opts.now ?? Date.now;
		this.activeDelayMs = opts.activeDelayMs ?? 200;
		this.idleDelayMs = opts.idleDelayMs ?? 1000;
		this.networkBackoffMs = opts.networkBackoffMs ?? 5000;
	}

	private idle(outcome: IterationOutcome): IterationResult {
		return { outcome, delayMs: this.idleDelayMs };
	}

	/**
	 * One iteration. `signal` and `heartbeat` come from the supervised run and
	 * are handed to the command sender, so a long send keeps the run alive and
	 * a cancelled run stops sending.
	 */
	async step(signal?: AbortSignal, heartbeat?: Heartbeat): Promise<IterationResult> {
		const state = this.store.getCycleState();
		if (!state || !state.isStart) {
			return this.idle("inactive");
		}

		const now = this.now();

		if (state.cyclicLoopRemaining <= 0 && now >= state.endTimeMs) {
			this.logger.info("Cycle '%s' finished all loops, stopping", state.cyclicName);
			await this.sender.stop();
			this.store.forceEnd(state.id);
			return this.idle("ended");
		}

		const profile = this.store.getSettingProfile(state.cyclicName);
		if (!profile) {
			this.logger.error("No setting_control row for cyclic '%s', skipping iteration", state.cyclicName);
			return this.idle("missing_settings");
		}

		if (state.systemState === "regen_firsttime") {
			return this.transition(state, regenPlan(profile), now, { signal, heartbeat });
		}

		if (state.endTimeMs <= 0 || now < state.endTimeMs) {
			// Wake up close to the phase deadline, but never spin
			const remaining = state.endTimeMs > 0 ? state.endTimeMs - now : this.idleDelayMs;
			const delayMs = Math.min(this.idleDelayMs, Math.max(this.activeDelayMs, remaining));
			return { outcome: "waiting", delayMs };
		}

		const plan = TRANSITIONS[state.systemState];
		if (!plan) {
			this.logger.warn("Active cycle in phase '%s' has no transition", state.systemState);
			return this.idle("no_transition");
		}

		return this.transition(state, plan(profile), now, { signal, heartbeat });
	}

	private async transition(
		state: CycleState,
		plan: TransitionPlan,
		now: number,
		ctx: SendContext
	): Promise<IterationResult> {
		const delivered = await this.sender.send(state.id, plan.command, ctx);
		if (!delivered) {
			this.logger.warn("Phase %s not confirmed, staying in %s", plan.command.phase, state.systemState);
			return this.idle("rejected");
		}

		const loopRemaining = plan.closesLoop ? state.cyclicLoopRemaining - 1 : undefined;
		this.store.applyPhaseTransition(state.id, {
			startMs: now,
			endMs: now + plan.durationMin * MINUTE_MS,
			phase: plan.next,
			loopRemaining
		});

		this.logger.info(
			"Cycle '%s': %s -> %s (duration=%d min%s)",
			state.cyclicName,
			state.systemState,
			plan.next,
			plan.durationMin,
			loopRemaining !== undefined ? `, loops left=${loopRemaining}` : ""
		);
		return { outcome: "transitioned", delayMs: this.activeDelayMs };
	}

	/**
	 * Loops until `signal` aborts. Beats `heartbeat` once per iteration.
	 * Errors are logged and absorbed; the loop never ends on its own.
	 */
	async run(signal: AbortSignal, heartbeat: Heartbeat): Promise<void> {
		this.logger.info("Cycle control loop started");

		while (!signal.aborted) {
			heartbeat.beat();

			let delayMs: number;
			try {
				delayMs = (await this.step(signal, heartbeat)).delayMs;
			} catch (err) {
				delayMs = this.handleError(err);
			}

			await waitOrAbort(delayMs, signal);
		}

		this.logger.info("Cycle control loop stopped");
	}

	private handleError(err: unknown): number {
		if (isAppError(err, "DB_ERROR")) {
			this.logger.error("State store error, reconnecting: %s", errorMessage(err));
			try {
				this.store.reconnect();
			} catch (reErr) {
				this.logger.error("State store reconnect failed: %s", errorMessage(reErr));
			}
			return this.idleDelayMs;
		}

		if (isAppError(err, "NETWORK_ERROR")) {
			this.logger.error("Network error in control loop, backing off %d ms: %s", this.networkBackoffMs, errorMessage(err));
			return this.networkBackoffMs;
		}

		const appErr = asAppError(err);
		this.logger.error("Unexpected error in control loop [%s]: %s", appErr.code, appErr.message);
		return this.idleDelayMs;
	}
}
