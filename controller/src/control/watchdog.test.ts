import type { ActuatorCommand } from "@regen-controller/common";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createLogger } from "../lib/log";
import { sleep, waitOrAbort } from "../lib/sleep";
import { upsertSettingProfile } from "../lib/sqlite";
import { StateStore } from "../lib/state-store";
import type { Actuator } from "./actuator-client";
import { CommandSender } from "./command-sender";
import { CycleStateMachine } from "./cycle-state-machine";
import type { Heartbeat } from "./heartbeat";
import { Watchdog } from "./watchdog";
import type { SupervisedTask } from "./watchdog";

const logger = createLogger({ serviceName: "test", console: false });

describe("Watchdog", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("leaves a healthy task alone", async () => {
		const task = vi.fn<SupervisedTask>(async (signal: AbortSignal, heartbeat: Heartbeat) => {
			while (!signal.aborted) {
				heartbeat.beat();
				await waitOrAbort(1000, signal);
			}
		});
		const watchdog = new Watchdog({ name: "healthy", task, logger });

		expect(watchdog.start()).toBe(true);
		expect(watchdog.start()).toBe(false);
		await vi.advanceTimersByTimeAsync(60_000);

		expect(task).toHaveBeenCalledTimes(1);
		expect(watchdog.restarts).toBe(0);

		await watchdog.stop();
		expect(watchdog.running).toBe(false);
	});

	it("restarts a task whose heartbeat goes stale", async () => {
		const task = vi.fn<SupervisedTask>((_signal: AbortSignal, heartbeat: Heartbeat) => {
			heartbeat.beat();
			return new Promise<void>(() => undefined);
		});
		const watchdog = new Watchdog({ name: "stalled", task, logger });

		watchdog.start();
		await vi.advanceTimersByTimeAsync(15_500);
		expect(task).toHaveBeenCalledTimes(1);
		expect(watchdog.restarts).toBe(0);

		// detected at 16 s, replacement after the 3 s join timeout
		await vi.advanceTimersByTimeAsync(4000);
		expect(task).toHaveBeenCalledTimes(2);
		expect(watchdog.restarts).toBe(1);

		const stopping = watchdog.stop();
		await vi.advanceTimersByTimeAsync(3000);
		await stopping;
	});

	it("restarts a task that crashed", async () => {
		const task = vi.fn<SupervisedTask>(async () => {
			throw new Error("boom");
		});
		const watchdog = new Watchdog({ name: "crashing", task, logger });

		watchdog.start();
		await vi.advanceTimersByTimeAsync(1500);

		expect(task).toHaveBeenCalledTimes(2);
		expect(watchdog.restarts).toBe(1);

		await watchdog.stop();
	});

	it("aborts the running task on stop", async () => {
		let seen: AbortSignal | undefined;
		const task = vi.fn<SupervisedTask>(async (signal: AbortSignal, heartbeat: Heartbeat) => {
			seen = signal;
			while (!signal.aborted) {
				heartbeat.beat();
				await waitOrAbort(500, signal);
			}
		});
		const watchdog = new Watchdog({ name: "stoppable", task, logger });

		watchdog.start();
		await vi.advanceTimersByTimeAsync(0);
		await watchdog.stop();

		expect(seen?.aborted).toBe(true);
	});
});

// Answers every command with `status`, but only after `latencyMs`
class SlowActuator implements Actuator {
	sends = 0;
	inFlight = 0;
	maxInFlight = 0;
	emergencyCalls = 0;

	constructor(
		private readonly latencyMs: number,
		private readonly status: number
	) {}

	async sendAuto(_cmd: ActuatorCommand): Promise<number> {
		this.sends++;
		this.inFlight++;
		this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
		await sleep(this.latencyMs);
		this.inFlight--;
		return this.status;
	}

	async stop(): Promise<number> {
		return 200;
	}

	async emergencyShutdown(): Promise<number> {
		this.emergencyCalls++;
		return 200;
	}
}

describe("Watchdog supervising the cycle loop", () => {
	let store: StateStore;

	beforeEach(() => {
		vi.useFakeTimers();
		store = new StateStore(":memory:", logger);
		upsertSettingProfile(store.db, {
			cyclicName: "standard",
			regenFanVolt: 12,
			regenDurationMin: 5,
			coolFanVolt: 8,
			coolDurationMin: 3,
			idleDurationMin: 2,
			scabFanVolt: 6,
			scabDurationMin: 4
		});
		store.activateCycle("standard", 1);
	});

	afterEach(() => {
		store.close();
		vi.useRealTimers();
	});

	it("keeps a loop that is retrying a slow actuator alive", async () => {
		const actuator = new SlowActuator(4000, 503);
		const sender = new CommandSender({ actuator, store, logger });
		const machine = new CycleStateMachine({ store, sender, logger });
		const watchdog = new Watchdog({
			name: "cycle-control",
			task: (signal, heartbeat) => machine.run(signal, heartbeat),
			logger
		});

		watchdog.start();
		// five 4 s attempts with 1 s pauses: the send alone takes 24 s
		await vi.advanceTimersByTimeAsync(60_000);
		await watchdog.stop();

		expect(watchdog.restarts).toBe(0);
		expect(actuator.sends).toBe(5);
		expect(actuator.maxInFlight).toBe(1);
		expect(actuator.emergencyCalls).toBe(1);
		expect(store.getCycleState()).toMatchObject({ isStart: false, systemState: "end" });
	});
});
