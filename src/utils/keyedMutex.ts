/**
 * Per-key mutual exclusion for async work.
 *
 * Tasks that share a key run one after another in submission order; tasks
 * under different keys never wait on each other. A key's entry is dropped as
 * soon as its queue drains, so idle keys cost nothing.
 *
 * @module utils/keyedMutex
 */

export class KeyedMutex {
	private readonly tails = new Map<string, Promise<void>>();

	async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
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

	/** Number of keys with queued or running work. */
	get size(): number {
		return this.tails.size;
	}
}
