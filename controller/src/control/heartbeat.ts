/**
 * Liveness timestamp shared between a supervised loop (writer) and its
 * watchdog (reader).
 */
export class Heartbeat {
	private last: number;

	constructor(private readonly now: () => number = Date.now) {
		this.last = now();
	}

	beat(): void {
		this.last = this.now();
	}

	get lastBeat(): number {
		return this.last;
	}

	ageMs(): number {
		return this.now() - this.last;
	}
}
