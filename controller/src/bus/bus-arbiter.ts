/**
 * Serializes transactions on a shared half-duplex RS-485 line.
 *
 * Each port gets a FIFO lock plus the time its last transaction finished.
 * A holder is let onto the bus only once `minSpacingMs` of silence has
 * passed since that time, which gives slaves their turnaround gap.
 */

import { sleep } from "../lib/sleep";

export interface BusAccess {
	readonly port: string;
	// Stamps the port's last-access time and hands the bus to the next waiter
	release(): void;
}

class PortLock {
	private tail: Promise<void> = Promise.resolve();
	lastAccessMs = 0;

	/**
	 * Resolves once every earlier caller has released. Returns the release fn.
	 */
	acquire(): Promise<() => void> {
		const prev = this.tail;
		let releaseNext: () => void = () => undefined;
		const next = new Promise<void>(resolve => {
			releaseNext = resolve;
		});
		this.tail = prev.then(() => next);
		return prev.then(() => releaseNext);
	}
}

export class BusArbiter {
	private readonly ports = new Map<string, PortLock>();

	constructor(private readonly now: () => number = Date.now) {}

	private lockFor(port: string): PortLock {
		let lock = this.ports.get(port);
		if (!lock) {
			lock = new PortLock();
			this.ports.set(port, lock);
		}
		return lock;
	}

	async acquire(port: string, minSpacingMs: number): Promise<BusAccess> {
		const lock = this.lockFor(port);
		const unlock = await lock.acquire();

		const wait = minSpacingMs - (this.now() - lock.lastAccessMs);
		await sleep(wait);

		let released = false;
		return {
			port,
			release: () => {
				if (released) return;
				released = true;
				lock.lastAccessMs = this.now();
				unlock();
			}
		};
	}

	/**
	 * Runs `fn` while holding the port. The bus is released on every exit
	 * path, including a throwing `fn`.
	 */
	async withAccess<T>(port: string, minSpacingMs: number, fn: () => Promise<T>): Promise<T> {
		const access = await this.acquire(port, minSpacingMs);
		try {
			return await fn();
		} finally {
			access.release();
		}
	}

	lastAccess(port: string): number | undefined {
		return this.ports.get(port)?.lastAccessMs;
	}
}
