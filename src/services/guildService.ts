/**
 * Guild lifecycle service.
 * A guild is one Telegram group chat served by the bot. Every leveling and
 * giveaway row hangs off the guild row and goes with it on removal.
 *
 * @module services/guildService
 */

import { execute, get, query } from "../database";
import type { GuildRow } from "../types";
import { NotFoundError } from "../utils/errors";
import { StructuredLogger } from "../utils/logger";
import { LevelConfigService } from "./levelConfigService";

export class GuildService {
	/**
	 * Registers the guild if it is new and refreshes its title otherwise.
	 * Called from middleware for every group update, so it stays cheap.
	 */
	static ensureGuild(guildId: number, title: string | null = null): void {
		const result = execute(
			"INSERT OR IGNORE INTO guilds (guild_id, title) VALUES (?, ?)",
			[guildId, title],
		);

		if (result.changes > 0) {
			StructuredLogger.logGuildEvent("Guild registered", {
				guildId,
				title: title ?? undefined,
				operation: "guild_registered",
			});
		} else if (title) {
			execute(
				"UPDATE guilds SET title = ? WHERE guild_id = ? AND (title IS NULL OR title != ?)",
				[title, guildId, title],
			);
		}
	}

	static getGuild(guildId: number): GuildRow | undefined {
		return get<GuildRow>("SELECT * FROM guilds WHERE guild_id = ?", [guildId]);
	}

	static listGuilds(): GuildRow[] {
		return query<GuildRow>("SELECT * FROM guilds ORDER BY guild_id");
	}

	/**
	 * Removes the guild and, through foreign key cascades, its leveling
	 * configuration, member levels, roles and giveaways.
	 *
	 * @returns true if a guild row was deleted
	 */
	static removeGuild(guildId: number): boolean {
		const result = execute("DELETE FROM guilds WHERE guild_id = ?", [guildId]);
		LevelConfigService.invalidate(guildId);

		if (result.changes > 0) {
			StructuredLogger.logGuildEvent("Guild removed", {
				guildId,
				operation: "guild_removed",
			});
			return true;
		}
		return false;
	}

	/**
	 * Sets (or clears, with null) the role whose holders may host giveaways.
	 */
	static setGiveawayRole(guildId: number, roleId: number | null): void {
		const result = execute(
			"UPDATE guilds SET giveaway_role_id = ? WHERE guild_id = ?",
			[roleId, guildId],
		);
		if (result.changes === 0) {
			throw new NotFoundError("guild", guildId);
		}

		StructuredLogger.logGuildEvent("Giveaway role updated", {
			guildId,
			roleId,
			operation: "giveaway_role_updated",
		});
	}
}
