/**
 * Clock sources
 *
 * Deadlines are compared against a {@link Clock}, never against `Date.now()`
 * directly, so hosts can plug in a trusted time source and tests can pin time.
 */

/**
 * Monotonic source of the current time, in milliseconds since the Unix epoch.
 */
export interface Clock {
	now(): number;
}

/**
 * Wall-clock time that never goes backwards.
 *
 * If the system clock steps back, the last reading is repeated until wall
 * time catches up again.
 */
export class SystemClock implements Clock {
	private last = 0;

	now(): number {
		const current = Date.now();
		if (current > this.last) {
			this.last = current;
		}
		return this.last;
	}
}

/**
 * Manually driven clock for tests and simulations.
 *
 * @example
 * ```typescript
 * const clock = new ManualClock(1_000);
 * clock.advance(10);
 * clock.now(); // 1010
 * ```
 */
export class ManualClock implements Clock {
	private current: number;

	constructor(start = 0) {
		this.current = start;
	}

	now(): number {
		return this.current;
	}

	/**
	 * Move time forward by `ms`.
	 */
	advance(ms: number): number {
		if (ms < 0) {
			throw new RangeError("ManualClock cannot move backwards");
		}
		this.current += ms;
		return this.current;
	}

	/**
	 * Jump to an absolute time, which must not be in the past.
	 */
	set(timestamp: number): void {
		if (timestamp < this.current) {
			throw new RangeError("ManualClock cannot move backwards");
		}
		this.current = timestamp;
	}
}
