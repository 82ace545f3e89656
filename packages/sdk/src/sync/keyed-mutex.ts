/**
 * Keyed Mutex
 *
 * One FIFO lock per key. Work queued under the same key runs strictly one
 * after another; work under different keys is not coordinated at all.
 */

export class KeyedMutex {
	private tails: Map<string, Promise<void>> = new Map();

	/**
	 * Run `task` once every earlier task for `key` has settled.
	 *
	 * The task's result or rejection is passed through unchanged; a rejected
	 * task does not poison the queue for the tasks behind it.
	 */
	async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();

		let release: () => void = () => {};
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);

		await previous;
		try {
			return await task();
		} finally {
			release();
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	/**
	 * Whether any task currently holds or waits for `key`.
	 */
	isLocked(key: string): boolean {
		return this.tails.has(key);
	}

	/**
	 * Number of keys with queued work.
	 */
	size(): number {
		return this.tails.size;
	}
}
