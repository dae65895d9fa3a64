/**
 * Unbounded in-process FIFO. Producers never block; consumers wait in `get`
 * until an item arrives or their signal aborts.
 */
export class AsyncQueue<T> {
	private readonly items: T[] = [];
	private readonly waiters: Array<(item: T) => void> = [];

	put(item: T): void {
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter(item);
			return;
		}
		this.items.push(item);
	}

	/**
	 * Resolves with the oldest item, or undefined if `signal` aborts first.
	 */
	get(signal?: AbortSignal): Promise<T | undefined> {
		const head = this.items.shift();
		if (head !== undefined) return Promise.resolve(head);
		if (signal?.aborted) return Promise.resolve(undefined);

		return new Promise<T | undefined>(resolve => {
			const waiter = (item: T): void => {
				signal?.removeEventListener("abort", onAbort);
				resolve(item);
			};
			const onAbort = (): void => {
				const idx = this.waiters.indexOf(waiter);
				if (idx >= 0) this.waiters.splice(idx, 1);
				resolve(undefined);
			};
			this.waiters.push(waiter);
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}

	// Removes and returns everything currently buffered
	drain(): T[] {
		return this.items.splice(0, this.items.length);
	}

	get size(): number {
		return this.items.length;
	}

	isEmpty(): boolean {
		return this.items.length === 0;
	}
}
