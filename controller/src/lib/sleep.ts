export function sleep(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Sleep that returns early (without throwing) once `signal` aborts.
 * Resolves to true when the full delay elapsed, false when interrupted.
 */
export function waitOrAbort(ms: number, signal: AbortSignal): Promise<boolean> {
	if (signal.aborted) return Promise.resolve(false);
	if (ms <= 0) return Promise.resolve(true);

	return new Promise<boolean>(resolve => {
		const onAbort = (): void => {
			clearTimeout(timer);
			resolve(false);
		};
		const timer = setTimeout(() => {
			signal.removeEventListener("abort", onAbort);
			resolve(true);
		}, ms);
		signal.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Races `task` against a timer. Resolves to true when the task settled in time.
 * The task's own rejection is not propagated.
 */
export async function settlesWithin(task: Promise<unknown>, ms: number): Promise<boolean> {
	let timer: NodeJS.Timeout | undefined;
	const timeout = new Promise<false>(resolve => {
		timer = setTimeout(() => resolve(false), ms);
	});
	const settled = task.then(
		() => true as const,
		() => true as const
	);

	try {
		return await Promise.race([settled, timeout]);
	} finally {
		if (timer) clearTimeout(timer);
	}
}
