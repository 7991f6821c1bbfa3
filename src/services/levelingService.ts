/**
 * Leveling engine.
 * Turns member activity into XP, walks the level curve, hands out reward
 * roles and reports level-ups. All writes for one activity commit together;
 * events are emitted afterwards.
 *
 * @module services/levelingService
 */

import { randomInt } from "node:crypto";
import { execute, get, query, transaction } from "../database";
import type { LevelRow, RankedLevelRow } from "../types";
import { ValidationError } from "../utils/errors";
import { KeyedMutex } from "../utils/keyedMutex";
import { StructuredLogger } from "../utils/logger";
import { CooldownTracker } from "./cooldownTracker";
import { engagementEvents } from "./engagementEvents";
import {
	type GuildLevelConfig,
	LevelConfigService,
	MAX_GAIN,
	MAX_LEVEL,
	MAX_MULTIPLIER,
} from "./levelConfigService";
import { MemberRoleService } from "./memberRoleService";

export interface ActivityEvent {
	guildId: number;
	userId: number;
	/** Forum topic id, or the group id when topics are off */
	channelId: number;
	roleIds: readonly number[];
	/** Milliseconds since epoch */
	timestamp: number;
}

export type LevelUpDestination =
	| { kind: "source"; channelId: number }
	| { kind: "dm" }
	| { kind: "channel"; channelId: number };

export interface LevelUp {
	guildId: number;
	userId: number;
	level: number;
	/** Reward role granted for reaching this level, if any */
	rewardRoleId: number | null;
	/** Unrendered template; null when nothing should be posted */
	template: string | null;
	destination: LevelUpDestination | null;
}

export type ActivityResult =
	| { credited: false; reason: "disabled" | "blacklisted" | "cooldown" }
	| {
			credited: true;
			xpGained: number;
			level: number;
			xp: number;
			leveledUpTo: number | null;
			levelUps: LevelUp[];
	  };

export interface UserLevel {
	level: number;
	xp: number;
	requiredXp: number;
}

export interface RoleDiff {
	grant: number[];
	revoke: number[];
}

export interface AdjustResult {
	level: number;
	xp: number;
	levelUps: LevelUp[];
}

/**
 * XP needed to go from `level` to `level + 1`.
 */
export const xpForLevel = (level: number, base: number, factor: number): number =>
	Math.floor(base * factor ** level);

/**
 * Adds `gain` to a member's progress and applies every level-up it pays for.
 * `reached` lists each new level in ascending order.
 */
export const advanceLevels = (
	level: number,
	xp: number,
	gain: number,
	base: number,
	factor: number,
): { level: number; xp: number; reached: number[] } => {
	let current = level;
	let remainder = xp + gain;
	const reached: number[] = [];

	let required = xpForLevel(current, base, factor);
	while (remainder >= required) {
		remainder -= required;
		current++;
		reached.push(current);
		required = xpForLevel(current, base, factor);
	}

	return { level: current, xp: remainder, reached };
};

/**
 * Removes `loss` XP, dropping levels as needed. Stops at level 0 / 0 XP.
 */
export const retreatLevels = (
	level: number,
	xp: number,
	loss: number,
	base: number,
	factor: number,
): { level: number; xp: number } => {
	let current = level;
	let remainder = xp - loss;

	while (remainder < 0 && current > 0) {
		current--;
		remainder += xpForLevel(current, base, factor);
	}

	return { level: current, xp: Math.max(0, remainder) };
};

/**
 * Product of every matching role multiplier and the channel multiplier.
 */
export const computeMultiplier = (
	config: Pick<GuildLevelConfig, "multiplierRoles" | "multiplierChannels">,
	channelId: number,
	roleIds: readonly number[],
): number => {
	let multiplier = config.multiplierChannels.get(channelId) ?? 1;
	for (const roleId of new Set(roleIds)) {
		multiplier *= config.multiplierRoles.get(roleId) ?? 1;
	}
	return multiplier;
};

/** Most XP a single event can credit, whatever the multipliers */
export const MAX_GAIN_PER_EVENT = MAX_GAIN * MAX_MULTIPLIER;

/** Keeps a multiplied roll within [1, MAX_GAIN_PER_EVENT] */
export const clampGain = (gain: number): number =>
	Math.min(MAX_GAIN_PER_EVENT, Math.max(1, gain));

/** Uniform integer in [min, max] */
export const rollXp = (
	min: number,
	max: number,
	randomIntFn: (min: number, maxExclusive: number) => number = randomInt,
): number => randomIntFn(min, max + 1);

/**
 * Role changes for a member who just reached `reachedLevels` (ascending).
 * With stacking every earned reward is kept; without it only the highest
 * reached reward survives and the member's other reward roles are revoked.
 */
export const resolveRoleRewards = (
	levelRoles: ReadonlyMap<number, number>,
	roleStack: boolean,
	reachedLevels: readonly number[],
	heldRoleIds: readonly number[],
): RoleDiff => {
	const earned: number[] = [];
	for (const level of reachedLevels) {
		const roleId = levelRoles.get(level);
		if (roleId !== undefined) earned.push(roleId);
	}
	if (earned.length === 0) return { grant: [], revoke: [] };

	const held = new Set(heldRoleIds);

	if (roleStack) {
		return {
			grant: [...new Set(earned)].filter((roleId) => !held.has(roleId)),
			revoke: [],
		};
	}

	const top = earned[earned.length - 1];
	const rewardRoles = new Set(levelRoles.values());
	return {
		grant: held.has(top) ? [] : [top],
		revoke: [...held].filter((roleId) => roleId !== top && rewardRoles.has(roleId)),
	};
};

/**
 * Reward roles a member at `level` should hold, ignoring how they got there.
 */
export const rewardRolesForLevel = (
	levelRoles: ReadonlyMap<number, number>,
	roleStack: boolean,
	level: number,
): number[] => {
	const eligible = [...levelRoles.entries()]
		.filter(([required]) => required <= level)
		.sort(([a], [b]) => a - b)
		.map(([, roleId]) => roleId);

	if (eligible.length === 0) return [];
	return roleStack ? [...new Set(eligible)] : [eligible[eligible.length - 1]];
};

/**
 * Fills the level-up placeholders.
 *
 * @example
 * renderLevelUpMessage("{user.mention} hit {level}", { mention: "@sam", userId: 7, level: 3 })
 * // "@sam hit 3"
 */
export const renderLevelUpMessage = (
	template: string,
	values: { mention: string; userId: number; level: number },
): string =>
	template
		.replaceAll("{user.mention}", values.mention)
		.replaceAll("{user.id}", String(values.userId))
		.replaceAll("{level}", String(values.level));

const destinationFor = (
	config: GuildLevelConfig,
	sourceChannelId: number,
): LevelUpDestination | null => {
	switch (config.levelUpChannel.kind) {
		case "suppress":
			return null;
		case "dm":
			return { kind: "dm" };
		case "channel":
			return { kind: "channel", channelId: config.levelUpChannel.channelId };
		case "source":
			return { kind: "source", channelId: sourceChannelId };
	}
};

const templateFor = (config: GuildLevelConfig, level: number): string | null => {
	const text = config.specialLevelUpMessages.get(level) ?? config.levelUpMessage;
	return text.length > 0 ? text : null;
};

export class LevelingService {
	private static readonly mutex = new KeyedMutex();
	static readonly cooldowns = new CooldownTracker();

	private static lockKey(guildId: number, userId: number): string {
		return `level:${guildId}:${userId}`;
	}

	/**
	 * Credits XP for one qualifying message.
	 *
	 * Disabled modules, blacklisted members/channels/roles and rate-limited
	 * events are reported as uncredited and leave stored progress untouched.
	 */
	static async recordActivity(event: ActivityEvent): Promise<ActivityResult> {
		return this.mutex.runExclusive(this.lockKey(event.guildId, event.userId), () =>
			this.applyActivity(event),
		);
	}

	private static applyActivity(event: ActivityEvent): ActivityResult {
		const { guildId, userId, channelId, roleIds, timestamp } = event;
		const config = LevelConfigService.getConfig(guildId);

		if (!config.moduleEnabled) {
			return { credited: false, reason: "disabled" };
		}

		if (
			config.blacklistedUsers.has(userId) ||
			config.blacklistedChannels.has(channelId) ||
			roleIds.some((roleId) => config.blacklistedRoles.has(roleId))
		) {
			return { credited: false, reason: "blacklisted" };
		}

		if (
			!this.cooldowns.tryConsume(
				guildId,
				userId,
				timestamp,
				config.cooldownRate,
				config.cooldownPer,
			)
		) {
			return { credited: false, reason: "cooldown" };
		}

		const multiplier = computeMultiplier(config, channelId, roleIds);
		const gain = clampGain(Math.round(rollXp(config.minGain, config.maxGain) * multiplier));

		let outcome: AdjustResult;
		try {
			outcome = this.applyGain(guildId, userId, gain, config, channelId);
		} catch (error) {
			// uncredited events give their cooldown slot back
			this.cooldowns.release(guildId, userId, timestamp);
			throw error;
		}

		StructuredLogger.logDebug("XP credited", {
			guildId,
			userId,
			gain,
			multiplier,
			level: outcome.level,
			operation: "xp_credited",
		});

		return {
			credited: true,
			xpGained: gain,
			level: outcome.level,
			xp: outcome.xp,
			leveledUpTo: outcome.levelUps.length > 0 ? outcome.level : null,
			levelUps: outcome.levelUps,
		};
	}

	/**
	 * Writes the new progress and role changes in one transaction, then emits
	 * one levelUp per level reached.
	 */
	private static applyGain(
		guildId: number,
		userId: number,
		gain: number,
		config: GuildLevelConfig,
		sourceChannelId: number,
	): AdjustResult {
		const { next, diff } = transaction(() => {
			const current = this.readProgress(guildId, userId);
			const advanced = advanceLevels(
				current.level,
				current.xp,
				gain,
				config.base,
				config.factor,
			);
			const roleDiff = resolveRoleRewards(
				config.levelRoles,
				config.roleStack,
				advanced.reached,
				MemberRoleService.getRoleIds(guildId, userId),
			);

			this.writeProgress(guildId, userId, advanced.level, advanced.xp);
			this.applyRoleDiff(guildId, userId, roleDiff);
			return { next: advanced, diff: roleDiff };
		});

		const granted = new Set(diff.grant);
		const destination = destinationFor(config, sourceChannelId);
		const levelUps: LevelUp[] = next.reached.map((level) => {
			const rewardRoleId = config.levelRoles.get(level);
			return {
				guildId,
				userId,
				level,
				rewardRoleId:
					rewardRoleId !== undefined && granted.has(rewardRoleId) ? rewardRoleId : null,
				template: destination ? templateFor(config, level) : null,
				destination,
			};
		});

		if (levelUps.length > 0) {
			StructuredLogger.logUserAction("Level up", {
				guildId,
				userId,
				level: next.level,
				rolesGranted: diff.grant,
				rolesRevoked: diff.revoke,
				operation: "level_up",
			});
		}

		for (const levelUp of levelUps) {
			engagementEvents.emit("levelUp", levelUp);
		}

		return { level: next.level, xp: next.xp, levelUps };
	}

	/**
	 * Admin XP adjustment. Gains behave like activity (rewards and messages,
	 * posted to the group itself); losses walk levels down without either.
	 */
	static async adjustXp(guildId: number, userId: number, delta: number): Promise<AdjustResult> {
		if (!Number.isSafeInteger(delta)) {
			throw new ValidationError("XP adjustment must be a whole number");
		}

		return this.mutex.runExclusive<AdjustResult>(this.lockKey(guildId, userId), () => {
			const config = LevelConfigService.getConfig(guildId);

			if (delta >= 0) {
				return this.applyGain(guildId, userId, delta, config, guildId);
			}

			const next = transaction(() => {
				const current = this.readProgress(guildId, userId);
				const lowered = retreatLevels(
					current.level,
					current.xp,
					-delta,
					config.base,
					config.factor,
				);
				this.writeProgress(guildId, userId, lowered.level, lowered.xp);
				return lowered;
			});

			StructuredLogger.logUserAction("XP removed", {
				guildId,
				userId,
				delta,
				level: next.level,
				operation: "xp_adjusted",
			});
			return { level: next.level, xp: next.xp, levelUps: [] };
		});
	}

	/**
	 * Admin override: sets the level, clears XP and brings reward roles in
	 * line with the new level. Emits nothing.
	 */
	static async setLevel(guildId: number, userId: number, level: number): Promise<RoleDiff> {
		if (!Number.isInteger(level) || level < 0 || level > MAX_LEVEL) {
			throw new ValidationError(`Level must be a whole number from 0 to ${MAX_LEVEL}`);
		}

		return this.mutex.runExclusive(this.lockKey(guildId, userId), () => {
			const config = LevelConfigService.getConfig(guildId);

			const diff = transaction(() => {
				const desired = new Set(
					rewardRolesForLevel(config.levelRoles, config.roleStack, level),
				);
				const rewardRoles = new Set(config.levelRoles.values());
				const held = MemberRoleService.getRoleIds(guildId, userId);

				const roleDiff: RoleDiff = {
					grant: [...desired].filter((roleId) => !held.includes(roleId)),
					revoke: held.filter((roleId) => rewardRoles.has(roleId) && !desired.has(roleId)),
				};

				this.writeProgress(guildId, userId, level, 0);
				this.applyRoleDiff(guildId, userId, roleDiff);
				return roleDiff;
			});

			StructuredLogger.logUserAction("Level set", {
				guildId,
				userId,
				level,
				rolesGranted: diff.grant,
				rolesRevoked: diff.revoke,
				operation: "level_set",
			});
			return diff;
		});
	}

	static getUserLevel(guildId: number, userId: number): UserLevel {
		const config = LevelConfigService.getConfig(guildId);
		const { level, xp } = this.readProgress(guildId, userId);
		return { level, xp, requiredXp: xpForLevel(level, config.base, config.factor) };
	}

	/**
	 * 1-based standing by level, then XP. Ties share a rank.
	 * @returns null if the member has never earned XP here
	 */
	static getRank(guildId: number, userId: number): number | null {
		const row = get<{ rank: number }>(
			`SELECT rank FROM (
         SELECT user_id, RANK() OVER (ORDER BY level DESC, xp DESC) AS rank
         FROM levels WHERE guild_id = ?
       ) WHERE user_id = ?`,
			[guildId, userId],
		);
		return row ? row.rank : null;
	}

	static getLeaderboard(guildId: number, limit = 10, offset = 0): RankedLevelRow[] {
		return query<RankedLevelRow>(
			`SELECT guild_id, user_id, level, xp,
              RANK() OVER (ORDER BY level DESC, xp DESC) AS rank
       FROM levels WHERE guild_id = ?
       ORDER BY level DESC, xp DESC, user_id
       LIMIT ? OFFSET ?`,
			[guildId, limit, offset],
		);
	}

	/**
	 * Drops cooldown state and, when the guild resets on leave, the member's
	 * progress.
	 * @returns true if stored progress was deleted
	 */
	static handleMemberLeave(guildId: number, userId: number): boolean {
		this.cooldowns.forget(guildId, userId);

		if (!LevelConfigService.getConfig(guildId).resetOnLeave) return false;

		const result = execute("DELETE FROM levels WHERE guild_id = ? AND user_id = ?", [
			guildId,
			userId,
		]);
		if (result.changes > 0) {
			StructuredLogger.logUserAction("Level progress reset on leave", {
				guildId,
				userId,
				operation: "level_reset",
			});
		}
		return result.changes > 0;
	}

	private static readProgress(guildId: number, userId: number): { level: number; xp: number } {
		const row = get<LevelRow>(
			"SELECT level, xp FROM levels WHERE guild_id = ? AND user_id = ?",
			[guildId, userId],
		);
		return row ? { level: row.level, xp: row.xp } : { level: 0, xp: 0 };
	}

	private static writeProgress(guildId: number, userId: number, level: number, xp: number): void {
		execute(
			`INSERT INTO levels (guild_id, user_id, level, xp) VALUES (?, ?, ?, ?)
       ON CONFLICT(guild_id, user_id) DO UPDATE SET level = excluded.level, xp = excluded.xp`,
			[guildId, userId, level, xp],
		);
	}

	private static applyRoleDiff(guildId: number, userId: number, diff: RoleDiff): void {
		for (const roleId of diff.revoke) {
			MemberRoleService.revoke(guildId, userId, roleId);
		}
		for (const roleId of diff.grant) {
			MemberRoleService.grant(guildId, userId, roleId);
		}
	}
}
