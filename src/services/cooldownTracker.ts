/**
 * Rolling-window XP cooldown per (guild, user).
 *
 * Each member keeps the timestamps of their credited events inside the
 * current window; an event is accepted while fewer than `rate` remain.
 * State is in memory only and resets with the process.
 *
 * @module services/cooldownTracker
 */

interface Window {
	hits: number[];
	windowMs: number;
}

export class CooldownTracker {
	private readonly windows = new Map<string, Window>();

	private static key(guildId: number, userId: number): string {
		return `${guildId}:${userId}`;
	}

	/**
	 * Records an event at `now` (ms) if the member still has room in the
	 * window of `perSeconds`. Returns false when the event is rate limited.
	 */
	tryConsume(
		guildId: number,
		userId: number,
		now: number,
		rate: number,
		perSeconds: number,
	): boolean {
		const key = CooldownTracker.key(guildId, userId);
		const windowMs = perSeconds * 1000;
		const hits = (this.windows.get(key)?.hits ?? []).filter(
			(at) => now - at < windowMs,
		);

		if (hits.length >= rate) {
			this.windows.set(key, { hits, windowMs });
			return false;
		}

		hits.push(now);
		this.windows.set(key, { hits, windowMs });
		return true;
	}

	/**
	 * Gives back the slot taken by the hit at `at`, for an event that was
	 * accepted but could not be credited.
	 */
	release(guildId: number, userId: number, at: number): void {
		const window = this.windows.get(CooldownTracker.key(guildId, userId));
		if (!window) return;

		const index = window.hits.lastIndexOf(at);
		if (index !== -1) window.hits.splice(index, 1);
	}

	forget(guildId: number, userId: number): void {
		this.windows.delete(CooldownTracker.key(guildId, userId));
	}

	/**
	 * Drops members whose every hit has left the window.
	 * @returns number of entries removed
	 */
	sweep(now: number): number {
		let removed = 0;
		for (const [key, window] of this.windows) {
			if (window.hits.every((at) => now - at >= window.windowMs)) {
				this.windows.delete(key);
				removed++;
			}
		}
		return removed;
	}

	clear(): void {
		this.windows.clear();
	}

	get size(): number {
		return this.windows.size;
	}
}
