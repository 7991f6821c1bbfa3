/**
 * Per-guild leveling configuration.
 *
 * Scalar settings live in `level_config`; messages, blacklists, reward roles
 * and multipliers in child tables. The assembled config is validated with zod
 * on every write and cached per guild until invalidated.
 *
 * @module services/levelConfigService
 */

import { z } from "zod";
import { execute, get, query, transaction } from "../database";
import type { LevelConfigRow } from "../types";
import { NotFoundError, ValidationError } from "../utils/errors";
import { StructuredLogger } from "../utils/logger";

export const MAX_TEMPLATE_LENGTH = 2000;
export const MAX_MULTIPLIER = 100;
export const MAX_GAIN = 10_000;
export const MAX_BASE = 1_000_000;
// keeps base * factor^MAX_LEVEL finite
export const MAX_FACTOR = 3;
/** Highest level an admin may set directly */
export const MAX_LEVEL = 500;

const id = z.number().int();
const rewardLevel = z.number().int().min(1, "Level must be at least 1");
const template = z
	.string()
	.max(MAX_TEMPLATE_LENGTH, `Templates are limited to ${MAX_TEMPLATE_LENGTH} characters`);
const multiplier = z
	.number()
	.positive("Multipliers must be greater than 0")
	.max(MAX_MULTIPLIER, `Multipliers are limited to ${MAX_MULTIPLIER}`);
const gain = z.number().int().min(1).max(MAX_GAIN, `XP gains are limited to ${MAX_GAIN}`);

export const levelUpChannelSchema = z.discriminatedUnion("kind", [
	z.object({ kind: z.literal("suppress") }),
	z.object({ kind: z.literal("source") }),
	z.object({ kind: z.literal("dm") }),
	z.object({ kind: z.literal("channel"), channelId: id }),
]);

export const levelConfigSchema = z
	.object({
		moduleEnabled: z.boolean(),
		roleStack: z.boolean(),
		base: z.number().int().min(1).max(MAX_BASE, `Base is limited to ${MAX_BASE}`),
		factor: z
			.number()
			.gt(1, "Factor must be greater than 1")
			.max(MAX_FACTOR, `Factor is limited to ${MAX_FACTOR}`),
		minGain: gain,
		maxGain: gain,
		cooldownRate: z.number().int().min(1),
		cooldownPer: z.number().int().min(1),
		levelUpMessage: template,
		specialLevelUpMessages: z.map(rewardLevel, template),
		levelUpChannel: levelUpChannelSchema,
		blacklistedRoles: z.set(id),
		blacklistedChannels: z.set(id),
		blacklistedUsers: z.set(id),
		levelRoles: z.map(rewardLevel, id),
		multiplierRoles: z.map(id, multiplier),
		multiplierChannels: z.map(id, multiplier),
		resetOnLeave: z.boolean(),
	})
	.superRefine((config, ctx) => {
		if (config.minGain > config.maxGain) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["minGain"],
				message: "minGain must not exceed maxGain",
			});
		}
		// floor(base * factor^L) only grows by at least 1 per level when this holds
		if (config.base * (config.factor - 1) < 1) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["factor"],
				message: "base * (factor - 1) must be at least 1",
			});
		}
	});

export type GuildLevelConfig = z.infer<typeof levelConfigSchema>;
export type LevelUpChannel = z.infer<typeof levelUpChannelSchema>;

export const DEFAULT_LEVEL_UP_MESSAGE =
	"{user.mention}, you just leveled up to level {level}!";

export const defaultLevelConfig = (): GuildLevelConfig => ({
	moduleEnabled: false,
	roleStack: true,
	base: 100,
	factor: 1.3,
	minGain: 8,
	maxGain: 15,
	cooldownRate: 1,
	cooldownPer: 40,
	levelUpMessage: DEFAULT_LEVEL_UP_MESSAGE,
	specialLevelUpMessages: new Map(),
	levelUpChannel: { kind: "source" },
	blacklistedRoles: new Set(),
	blacklistedChannels: new Set(),
	blacklistedUsers: new Set(),
	levelRoles: new Map(),
	multiplierRoles: new Map(),
	multiplierChannels: new Map(),
	resetOnLeave: false,
});

/** Deep copy; configs handed out by the cache must not be edited in place */
export const cloneLevelConfig = (config: GuildLevelConfig): GuildLevelConfig => ({
	...config,
	specialLevelUpMessages: new Map(config.specialLevelUpMessages),
	levelUpChannel: { ...config.levelUpChannel },
	blacklistedRoles: new Set(config.blacklistedRoles),
	blacklistedChannels: new Set(config.blacklistedChannels),
	blacklistedUsers: new Set(config.blacklistedUsers),
	levelRoles: new Map(config.levelRoles),
	multiplierRoles: new Map(config.multiplierRoles),
	multiplierChannels: new Map(config.multiplierChannels),
});

interface TargetRow {
	kind: string;
	target_id: number;
}

interface MultiplierRow extends TargetRow {
	multiplier: number;
}

const toChannel = (row: LevelConfigRow): LevelUpChannel => {
	switch (row.level_up_channel_mode) {
		case "suppress":
			return { kind: "suppress" };
		case "dm":
			return { kind: "dm" };
		case "channel":
			return row.level_up_channel_id === null
				? { kind: "source" }
				: { kind: "channel", channelId: row.level_up_channel_id };
		default:
			return { kind: "source" };
	}
};

export class LevelConfigService {
	private static cache = new Map<number, GuildLevelConfig>();

	/**
	 * Returns the guild's config, loading it on first use.
	 * Guilds that never saved one get the defaults (module disabled).
	 * The returned object is shared; use updateConfig to change it.
	 */
	static getConfig(guildId: number): GuildLevelConfig {
		const cached = this.cache.get(guildId);
		if (cached) return cached;

		const loaded = this.load(guildId);
		this.cache.set(guildId, loaded);
		return loaded;
	}

	/**
	 * Validates and persists a full config. Throws ValidationError before
	 * touching the database if any invariant fails.
	 */
	static saveConfig(guildId: number, candidate: GuildLevelConfig): GuildLevelConfig {
		const parsed = levelConfigSchema.safeParse(candidate);
		if (!parsed.success) {
			throw ValidationError.fromZod(parsed.error, "leveling configuration");
		}
		const config = parsed.data;

		if (!get<{ guild_id: number }>("SELECT guild_id FROM guilds WHERE guild_id = ?", [guildId])) {
			throw new NotFoundError("guild", guildId);
		}

		transaction(() => {
			const channel = config.levelUpChannel;
			execute(
				`INSERT INTO level_config (
          guild_id, module_enabled, role_stack, base, factor, min_gain, max_gain,
          cooldown_rate, cooldown_per, level_up_message, level_up_channel_mode,
          level_up_channel_id, reset_on_leave, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, strftime('%s', 'now'))
        ON CONFLICT(guild_id) DO UPDATE SET
          module_enabled = excluded.module_enabled,
          role_stack = excluded.role_stack,
          base = excluded.base,
          factor = excluded.factor,
          min_gain = excluded.min_gain,
          max_gain = excluded.max_gain,
          cooldown_rate = excluded.cooldown_rate,
          cooldown_per = excluded.cooldown_per,
          level_up_message = excluded.level_up_message,
          level_up_channel_mode = excluded.level_up_channel_mode,
          level_up_channel_id = excluded.level_up_channel_id,
          reset_on_leave = excluded.reset_on_leave,
          updated_at = excluded.updated_at`,
				[
					guildId,
					config.moduleEnabled ? 1 : 0,
					config.roleStack ? 1 : 0,
					config.base,
					config.factor,
					config.minGain,
					config.maxGain,
					config.cooldownRate,
					config.cooldownPer,
					config.levelUpMessage,
					channel.kind,
					channel.kind === "channel" ? channel.channelId : null,
					config.resetOnLeave ? 1 : 0,
				],
			);

			execute("DELETE FROM level_up_messages WHERE guild_id = ?", [guildId]);
			for (const [level, text] of config.specialLevelUpMessages) {
				execute(
					"INSERT INTO level_up_messages (guild_id, level, template) VALUES (?, ?, ?)",
					[guildId, level, text],
				);
			}

			execute("DELETE FROM level_blacklist WHERE guild_id = ?", [guildId]);
			const blacklist: Array<[string, Set<number>]> = [
				["role", config.blacklistedRoles],
				["channel", config.blacklistedChannels],
				["user", config.blacklistedUsers],
			];
			for (const [kind, targets] of blacklist) {
				for (const targetId of targets) {
					execute(
						"INSERT INTO level_blacklist (guild_id, kind, target_id) VALUES (?, ?, ?)",
						[guildId, kind, targetId],
					);
				}
			}

			execute("DELETE FROM level_roles WHERE guild_id = ?", [guildId]);
			for (const [level, roleId] of config.levelRoles) {
				execute(
					"INSERT INTO level_roles (guild_id, level, role_id) VALUES (?, ?, ?)",
					[guildId, level, roleId],
				);
			}

			execute("DELETE FROM level_multipliers WHERE guild_id = ?", [guildId]);
			const multipliers: Array<[string, Map<number, number>]> = [
				["role", config.multiplierRoles],
				["channel", config.multiplierChannels],
			];
			for (const [kind, entries] of multipliers) {
				for (const [targetId, value] of entries) {
					execute(
						"INSERT INTO level_multipliers (guild_id, kind, target_id, multiplier) VALUES (?, ?, ?, ?)",
						[guildId, kind, targetId, value],
					);
				}
			}
		});

		this.cache.set(guildId, config);
		StructuredLogger.logGuildEvent("Leveling config saved", {
			guildId,
			operation: "level_config_saved",
		});
		return config;
	}

	/**
	 * Applies `edit` to a copy of the current config and saves the result.
	 *
	 * @example
	 * ```typescript
	 * LevelConfigService.updateConfig(guildId, (c) => {
	 *   c.levelRoles.set(5, roleId);
	 * });
	 * ```
	 */
	static updateConfig(
		guildId: number,
		edit: (draft: GuildLevelConfig) => void,
	): GuildLevelConfig {
		const draft = cloneLevelConfig(this.getConfig(guildId));
		edit(draft);
		return this.saveConfig(guildId, draft);
	}

	/** Drops the cached copy so the next read goes to the database */
	static invalidate(guildId: number): void {
		this.cache.delete(guildId);
	}

	static invalidateAll(): void {
		this.cache.clear();
	}

	private static load(guildId: number): GuildLevelConfig {
		const row = get<LevelConfigRow>(
			"SELECT * FROM level_config WHERE guild_id = ?",
			[guildId],
		);
		if (!row) return defaultLevelConfig();

		const config: GuildLevelConfig = {
			...defaultLevelConfig(),
			moduleEnabled: row.module_enabled === 1,
			roleStack: row.role_stack === 1,
			base: row.base,
			factor: row.factor,
			minGain: row.min_gain,
			maxGain: row.max_gain,
			cooldownRate: row.cooldown_rate,
			cooldownPer: row.cooldown_per,
			levelUpMessage: row.level_up_message,
			levelUpChannel: toChannel(row),
			resetOnLeave: row.reset_on_leave === 1,
		};

		for (const msg of query<{ level: number; template: string }>(
			"SELECT level, template FROM level_up_messages WHERE guild_id = ?",
			[guildId],
		)) {
			config.specialLevelUpMessages.set(msg.level, msg.template);
		}

		for (const entry of query<TargetRow>(
			"SELECT kind, target_id FROM level_blacklist WHERE guild_id = ?",
			[guildId],
		)) {
			if (entry.kind === "role") config.blacklistedRoles.add(entry.target_id);
			else if (entry.kind === "channel") config.blacklistedChannels.add(entry.target_id);
			else config.blacklistedUsers.add(entry.target_id);
		}

		for (const reward of query<{ level: number; role_id: number }>(
			"SELECT level, role_id FROM level_roles WHERE guild_id = ?",
			[guildId],
		)) {
			config.levelRoles.set(reward.level, reward.role_id);
		}

		for (const entry of query<MultiplierRow>(
			"SELECT kind, target_id, multiplier FROM level_multipliers WHERE guild_id = ?",
			[guildId],
		)) {
			if (entry.kind === "role") config.multiplierRoles.set(entry.target_id, entry.multiplier);
			else config.multiplierChannels.set(entry.target_id, entry.multiplier);
		}

		return config;
	}
}
