/**
 * One-shot persistent timers.
 *
 * Timers are rows in the `timers` table. A poll loop claims every due row by
 * stamping `fired_at`, runs the handler registered for its event, then
 * deletes the row. A claimed row is never claimed again, so each timer
 * reaches its handler once per process; rows left claimed by a crash are
 * released on the next start.
 *
 * @module services/timerService
 */

import { execute, get, query } from "../database";
import type { TimerRow } from "../types";
import { logger, StructuredLogger } from "../utils/logger";

export interface Timer {
	id: number;
	event: string;
	payload: string | null;
	expiresAt: number;
	createdAt: number;
}

export type TimerHandler = (timer: Timer) => void | Promise<void>;

/**
 * What the engines need from a scheduler.
 */
export interface TimerScheduler {
	schedule(event: string, fireAt: number, payload?: string): number;
	cancel(timerId: number): boolean;
	register(event: string, handler: TimerHandler): void;
}

const rowToTimer = (row: TimerRow): Timer => ({
	id: row.id,
	event: row.event,
	payload: row.payload,
	expiresAt: row.expires_at,
	createdAt: row.created_at,
});

export class TimerService {
	private static handlers = new Map<string, TimerHandler>();
	private static interval: NodeJS.Timeout | null = null;
	private static dispatching = false;

	/**
	 * Schedules `event` to fire at `fireAt` (ms since epoch).
	 * @returns the timer id
	 */
	static schedule(event: string, fireAt: number, payload?: string): number {
		const result = execute(
			"INSERT INTO timers (event, payload, expires_at, created_at) VALUES (?, ?, ?, ?)",
			[event, payload ?? null, fireAt, Date.now()],
		);
		const timerId = Number(result.lastInsertRowid);

		StructuredLogger.logDebug("Timer scheduled", {
			timerId,
			event,
			fireAt,
			operation: "timer_scheduled",
		});
		return timerId;
	}

	/**
	 * Cancels a timer that has not fired yet.
	 * @returns false if it already fired, is firing, or never existed
	 */
	static cancel(timerId: number): boolean {
		const result = execute(
			"DELETE FROM timers WHERE id = ? AND fired_at IS NULL",
			[timerId],
		);
		return result.changes > 0;
	}

	static register(event: string, handler: TimerHandler): void {
		if (this.handlers.has(event)) {
			logger.warn(`Replacing timer handler for ${event}`);
		}
		this.handlers.set(event, handler);
	}

	static unregister(event: string): void {
		this.handlers.delete(event);
	}

	static getTimer(timerId: number): Timer | null {
		const row = get<TimerRow>("SELECT * FROM timers WHERE id = ?", [timerId]);
		return row ? rowToTimer(row) : null;
	}

	/**
	 * Fires every timer due at `now` whose event has a handler.
	 *
	 * A handler that throws leaves its timer claimed; it is retried after the
	 * next restart.
	 *
	 * @returns number of timers whose handler completed
	 */
	static async dispatchDue(now: number = Date.now()): Promise<number> {
		const due = query<TimerRow>(
			"SELECT * FROM timers WHERE fired_at IS NULL AND expires_at <= ? ORDER BY expires_at, id",
			[now],
		);

		let fired = 0;
		for (const row of due) {
			const handler = this.handlers.get(row.event);
			if (!handler) continue;

			const claim = execute(
				"UPDATE timers SET fired_at = ? WHERE id = ? AND fired_at IS NULL",
				[now, row.id],
			);
			if (claim.changes === 0) continue; // cancelled or claimed meanwhile

			try {
				await handler(rowToTimer(row));
			} catch (error) {
				StructuredLogger.logError(error, {
					timerId: row.id,
					event: row.event,
					operation: "timer_dispatch",
				});
				continue;
			}

			execute("DELETE FROM timers WHERE id = ?", [row.id]);
			fired++;
		}

		return fired;
	}

	/**
	 * Releases timers claimed by a previous process and starts polling.
	 */
	static start(pollIntervalMs: number): void {
		if (this.interval) return;

		const released = execute(
			"UPDATE timers SET fired_at = NULL WHERE fired_at IS NOT NULL",
		);
		if (released.changes > 0) {
			logger.info(`Released ${released.changes} timer(s) left claimed by a previous run`);
		}

		this.interval = setInterval(() => {
			if (this.dispatching) return;
			this.dispatching = true;
			void this.dispatchDue()
				.catch((error: unknown) => {
					StructuredLogger.logError(error, { operation: "timer_poll" });
				})
				.finally(() => {
					this.dispatching = false;
				});
		}, pollIntervalMs);

		logger.info(`Timer service started (poll every ${pollIntervalMs}ms)`);
	}

	static stop(): void {
		if (this.interval) {
			clearInterval(this.interval);
			this.interval = null;
		}
	}

	static get running(): boolean {
		return this.interval !== null;
	}
}
