/**
 * Time source for `createdAt` and `lastUpdate` stamps.
 *
 * Ledger code reads time only through a Clock so tests and event-log replay
 * can pin timestamps.
 */

export interface Clock {
	/** Milliseconds since the Unix epoch. The ledger floors fractional readings. */
	now(): number;
}

export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Manually driven clock for tests. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}
