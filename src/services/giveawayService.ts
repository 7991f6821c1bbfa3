/**
 * Giveaway engine.
 *
 * A giveaway's id is the id of the timer that ends it. Resolution and
 * cancellation both go through a single claim (read + delete in one
 * transaction), so whichever arrives first wins and the other is a no-op.
 *
 * @module services/giveawayService
 */

import { randomInt } from "node:crypto";
import { z } from "zod";
import { execute, get, query, transaction } from "../database";
import type { GiveawayRow } from "../types";
import {
	ConcurrencyConflictError,
	IneligibleError,
	NotFoundError,
	ValidationError,
} from "../utils/errors";
import { KeyedMutex } from "../utils/keyedMutex";
import { StructuredLogger } from "../utils/logger";
import { engagementEvents } from "./engagementEvents";
import { GuildService } from "./guildService";
import { MemberRoleService } from "./memberRoleService";
import { type TimerScheduler, TimerService } from "./timerService";

export const GIVEAWAY_END_EVENT = "giveaway_end";

export const GIVEAWAY_LIMITS = {
	maxWinners: 20,
	maxLevelRequirement: 500,
	maxPrizeLength: 100,
	maxRoles: 10,
	minDurationMs: 5_000,
	maxDurationMs: 30 * 24 * 60 * 60 * 1000,
	maxDescriptionLength: 1000,
	maxDescriptionNewlines: 10,
} as const;

const giveawaySchema = z.object({
	guildId: z.number().int(),
	channelId: z.number().int(),
	messageId: z.number().int(),
	hostId: z.number().int(),
	levelRequirement: z
		.number()
		.int()
		.min(0)
		.max(GIVEAWAY_LIMITS.maxLevelRequirement)
		.default(0),
	rolesRequirement: z
		.array(z.number().int())
		.default([])
		.transform((ids) => [...new Set(ids)])
		.refine((ids) => ids.length <= GIVEAWAY_LIMITS.maxRoles, {
			message: `At most ${GIVEAWAY_LIMITS.maxRoles} required roles`,
		}),
	prize: z
		.string()
		.trim()
		.min(1, "Prize is required")
		.max(GIVEAWAY_LIMITS.maxPrizeLength),
	winners: z.number().int().min(1).max(GIVEAWAY_LIMITS.maxWinners),
	durationMs: z
		.number()
		.int()
		.min(GIVEAWAY_LIMITS.minDurationMs, "Duration must be at least 5 seconds")
		.max(GIVEAWAY_LIMITS.maxDurationMs, "Duration must be at most 30 days"),
	description: z
		.string()
		.max(GIVEAWAY_LIMITS.maxDescriptionLength)
		.refine(
			(text) => text.split("\n").length - 1 <= GIVEAWAY_LIMITS.maxDescriptionNewlines,
			{ message: `At most ${GIVEAWAY_LIMITS.maxDescriptionNewlines} line breaks` },
		)
		.optional(),
});

const giveawayDraftSchema = giveawaySchema.omit({ messageId: true });

export type CreateGiveawayParams = z.input<typeof giveawaySchema>;
export type GiveawayDraft = z.input<typeof giveawayDraftSchema>;

export interface Giveaway {
	id: number;
	guildId: number;
	channelId: number;
	messageId: number;
	hostId: number;
	levelRequirement: number;
	rolesRequirement: number[];
	prize: string;
	description: string | null;
	winners: number;
	endsAt: number;
}

export interface GiveawayResolution {
	giveaway: Giveaway;
	winnerIds: number[];
	entrantCount: number;
	/** Fewer entrants than winner slots */
	partial: boolean;
}

export type EnterResult =
	| { status: "entered"; entrants: number; alreadyEntered: boolean }
	| { status: "rejected"; error: IneligibleError };

export type CancelResult =
	| { cancelled: true; giveaway: Giveaway }
	| { cancelled: false };

/**
 * Picks `count` distinct items uniformly at random (partial Fisher-Yates).
 * Returns every item, shuffled, when there are fewer than `count`.
 */
export const pickDistinct = <T>(
	items: readonly T[],
	count: number,
	randomIntFn: (min: number, maxExclusive: number) => number = randomInt,
): T[] => {
	const pool = [...items];
	const take = Math.min(Math.max(0, count), pool.length);

	for (let i = 0; i < take; i++) {
		const j = randomIntFn(i, pool.length);
		[pool[i], pool[j]] = [pool[j], pool[i]];
	}

	return pool.slice(0, take);
};

export class GiveawayService {
	private static readonly mutex = new KeyedMutex();
	static scheduler: TimerScheduler = TimerService;

	/**
	 * Hooks giveaway resolution onto the timer service. Call once at startup.
	 */
	static initialize(): void {
		this.scheduler.register(GIVEAWAY_END_EVENT, (timer) => {
			this.onTimerFire(timer.id);
		});
	}

	/**
	 * Checks parameters before the announcement message exists.
	 * @throws ValidationError
	 */
	static validateDraft(draft: GiveawayDraft): void {
		const parsed = giveawayDraftSchema.safeParse(draft);
		if (!parsed.success) {
			throw ValidationError.fromZod(parsed.error, "giveaway");
		}
		this.assertRolesExist(parsed.data.guildId, parsed.data.rolesRequirement);
	}

	/**
	 * Validates, schedules the ending timer and stores the giveaway under
	 * the timer's id.
	 */
	static createGiveaway(params: CreateGiveawayParams, now: number = Date.now()): Giveaway {
		const parsed = giveawaySchema.safeParse(params);
		if (!parsed.success) {
			throw ValidationError.fromZod(parsed.error, "giveaway");
		}
		const data = parsed.data;

		if (!GuildService.getGuild(data.guildId)) {
			throw new NotFoundError("guild", data.guildId);
		}
		this.assertRolesExist(data.guildId, data.rolesRequirement);

		const endsAt = now + data.durationMs;
		const timerId = this.scheduler.schedule(GIVEAWAY_END_EVENT, endsAt);

		try {
			transaction(() => {
				execute(
					`INSERT INTO giveaways (
            timer_id, guild_id, channel_id, message_id, host_id,
            level_requirement, prize, description, winners, ends_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
					[
						timerId,
						data.guildId,
						data.channelId,
						data.messageId,
						data.hostId,
						data.levelRequirement,
						data.prize,
						data.description ?? null,
						data.winners,
						endsAt,
					],
				);
				for (const roleId of data.rolesRequirement) {
					execute(
						"INSERT INTO giveaway_role_requirements (giveaway_id, role_id) VALUES (?, ?)",
						[timerId, roleId],
					);
				}
			});
		} catch (error) {
			this.scheduler.cancel(timerId);
			throw error;
		}

		StructuredLogger.logGuildEvent("Giveaway created", {
			guildId: data.guildId,
			userId: data.hostId,
			giveawayId: timerId,
			prize: data.prize,
			winners: data.winners,
			endsAt,
			operation: "giveaway_created",
		});

		return {
			id: timerId,
			guildId: data.guildId,
			channelId: data.channelId,
			messageId: data.messageId,
			hostId: data.hostId,
			levelRequirement: data.levelRequirement,
			rolesRequirement: data.rolesRequirement,
			prize: data.prize,
			description: data.description ?? null,
			winners: data.winners,
			endsAt,
		};
	}

	/**
	 * Adds the member to the giveaway if they meet its level and role gate.
	 * Entering twice is harmless.
	 *
	 * @throws NotFoundError if the giveaway has ended or never existed
	 */
	static async enter(
		giveawayId: number,
		userId: number,
		userLevel: number,
		userRoleIds: readonly number[],
	): Promise<EnterResult> {
		return this.mutex.runExclusive<EnterResult>(`giveaway:${giveawayId}`, () => {
			const giveaway = this.getGiveaway(giveawayId);
			if (!giveaway) {
				throw new NotFoundError("giveaway", giveawayId);
			}

			if (userLevel < giveaway.levelRequirement) {
				return {
					status: "rejected",
					error: new IneligibleError({
						reason: "LEVEL_TOO_LOW",
						required: giveaway.levelRequirement,
						actual: userLevel,
					}),
				};
			}

			if (
				giveaway.rolesRequirement.length > 0 &&
				!giveaway.rolesRequirement.some((roleId) => userRoleIds.includes(roleId))
			) {
				return {
					status: "rejected",
					error: new IneligibleError({
						reason: "MISSING_ROLE",
						anyOf: giveaway.rolesRequirement,
					}),
				};
			}

			const result = execute(
				"INSERT OR IGNORE INTO giveaway_entrants (giveaway_id, user_id) VALUES (?, ?)",
				[giveawayId, userId],
			);

			if (result.changes > 0) {
				StructuredLogger.logUserAction("Giveaway entered", {
					guildId: giveaway.guildId,
					userId,
					giveawayId,
					operation: "giveaway_enter",
				});
			}

			return {
				status: "entered",
				entrants: this.countEntrants(giveawayId),
				alreadyEntered: result.changes === 0,
			};
		});
	}

	/**
	 * Withdraws an entry.
	 * @returns false if the member had not entered
	 */
	static async leave(giveawayId: number, userId: number): Promise<boolean> {
		return this.mutex.runExclusive(`giveaway:${giveawayId}`, () => {
			const result = execute(
				"DELETE FROM giveaway_entrants WHERE giveaway_id = ? AND user_id = ?",
				[giveawayId, userId],
			);
			return result.changes > 0;
		});
	}

	/**
	 * Ends the giveaway backing `timerId` and draws its winners.
	 * Returns null if it was already resolved or cancelled.
	 */
	static onTimerFire(timerId: number): GiveawayResolution | null {
		const claimed = this.tryClaim(timerId);
		if (!claimed) return null;

		const { giveaway, entrantIds } = claimed;
		const winnerIds = pickDistinct(entrantIds, giveaway.winners);
		const resolution: GiveawayResolution = {
			giveaway,
			winnerIds,
			entrantCount: entrantIds.length,
			partial: winnerIds.length < giveaway.winners,
		};

		StructuredLogger.logGuildEvent("Giveaway resolved", {
			guildId: giveaway.guildId,
			giveawayId: giveaway.id,
			entrants: entrantIds.length,
			winnerIds,
			operation: "giveaway_resolved",
		});

		engagementEvents.emit("giveawayResolved", resolution);
		return resolution;
	}

	/**
	 * Resolves a giveaway before its timer is due and drops the timer.
	 */
	static endNow(giveawayId: number): GiveawayResolution | null {
		const resolution = this.onTimerFire(giveawayId);
		if (resolution) {
			this.scheduler.cancel(giveawayId);
		}
		return resolution;
	}

	/**
	 * Cancels a running giveaway. Losing the race to resolution (or to
	 * another cancel) reports `cancelled: false`.
	 */
	static cancel(giveawayId: number): CancelResult {
		const claimed = this.tryClaim(giveawayId);
		if (!claimed) return { cancelled: false };

		this.scheduler.cancel(giveawayId);

		StructuredLogger.logGuildEvent("Giveaway cancelled", {
			guildId: claimed.giveaway.guildId,
			giveawayId,
			operation: "giveaway_cancelled",
		});

		engagementEvents.emit("giveawayCancelled", claimed.giveaway);
		return { cancelled: true, giveaway: claimed.giveaway };
	}

	static getGiveaway(giveawayId: number): Giveaway | null {
		const row = get<GiveawayRow>("SELECT * FROM giveaways WHERE timer_id = ?", [
			giveawayId,
		]);
		return row ? this.rowToGiveaway(row) : null;
	}

	static findByMessage(guildId: number, messageId: number): Giveaway | null {
		const row = get<GiveawayRow>(
			"SELECT * FROM giveaways WHERE guild_id = ? AND message_id = ?",
			[guildId, messageId],
		);
		return row ? this.rowToGiveaway(row) : null;
	}

	static listActive(guildId: number): Giveaway[] {
		return query<GiveawayRow>(
			"SELECT * FROM giveaways WHERE guild_id = ? ORDER BY ends_at, timer_id",
			[guildId],
		).map((row) => this.rowToGiveaway(row));
	}

	static countEntrants(giveawayId: number): number {
		return (
			get<{ count: number }>(
				"SELECT COUNT(*) AS count FROM giveaway_entrants WHERE giveaway_id = ?",
				[giveawayId],
			)?.count ?? 0
		);
	}

	static getEntrants(giveawayId: number): number[] {
		return query<{ user_id: number }>(
			"SELECT user_id FROM giveaway_entrants WHERE giveaway_id = ? ORDER BY entered_at, user_id",
			[giveawayId],
		).map((row) => row.user_id);
	}

	/**
	 * Reads and deletes the giveaway in one transaction. Entrants and role
	 * requirements cascade with the row.
	 */
	private static claim(giveawayId: number): { giveaway: Giveaway; entrantIds: number[] } {
		return transaction(() => {
			const giveaway = this.getGiveaway(giveawayId);
			if (!giveaway) {
				throw new NotFoundError("giveaway", giveawayId);
			}
			const entrantIds = this.getEntrants(giveawayId);

			const deleted = execute("DELETE FROM giveaways WHERE timer_id = ?", [giveawayId]);
			if (deleted.changes !== 1) {
				throw new ConcurrencyConflictError(`Giveaway ${giveawayId} was claimed elsewhere`);
			}

			return { giveaway, entrantIds };
		});
	}

	private static tryClaim(
		giveawayId: number,
	): { giveaway: Giveaway; entrantIds: number[] } | null {
		try {
			return this.claim(giveawayId);
		} catch (error) {
			if (error instanceof NotFoundError || error instanceof ConcurrencyConflictError) {
				StructuredLogger.logDebug("Giveaway already claimed", {
					giveawayId,
					operation: "giveaway_claim_lost",
				});
				return null;
			}
			throw error;
		}
	}

	private static assertRolesExist(guildId: number, roleIds: readonly number[]): void {
		const missing = roleIds.filter((roleId) => !MemberRoleService.getRole(guildId, roleId));
		if (missing.length > 0) {
			throw new ValidationError(`Unknown role id(s): ${missing.join(", ")}`);
		}
	}

	private static rowToGiveaway(row: GiveawayRow): Giveaway {
		const roles = query<{ role_id: number }>(
			"SELECT role_id FROM giveaway_role_requirements WHERE giveaway_id = ? ORDER BY role_id",
			[row.timer_id],
		).map((r) => r.role_id);

		return {
			id: row.timer_id,
			guildId: row.guild_id,
			channelId: row.channel_id,
			messageId: row.message_id,
			hostId: row.host_id,
			levelRequirement: row.level_requirement,
			rolesRequirement: roles,
			prize: row.prize,
			description: row.description,
			winners: row.winners,
			endsAt: row.ends_at,
		};
	}
}
