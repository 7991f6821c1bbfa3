/**
 * Bot-managed guild roles.
 *
 * Telegram groups have no role system of their own, so roles are named
 * per-guild records kept by the bot. Role ids for a member are read fresh on
 * every call; callers never cache them.
 *
 * @module services/memberRoleService
 */

import { execute, get, query, transaction } from "../database";
import type { GuildRoleRow } from "../types";
import { NotFoundError, ValidationError } from "../utils/errors";
import { StructuredLogger } from "../utils/logger";
import { LevelConfigService } from "./levelConfigService";

const MAX_ROLE_NAME_LENGTH = 32;

export class MemberRoleService {
	/**
	 * Creates a role. Names are unique per guild, ignoring case.
	 */
	static createRole(guildId: number, name: string): GuildRoleRow {
		const trimmed = name.trim();
		if (trimmed.length === 0 || trimmed.length > MAX_ROLE_NAME_LENGTH) {
			throw new ValidationError(
				`Role name must be 1-${MAX_ROLE_NAME_LENGTH} characters`,
			);
		}
		if (this.findRoleByName(guildId, trimmed)) {
			throw new ValidationError(`Role "${trimmed}" already exists`);
		}

		const result = execute(
			"INSERT INTO guild_roles (guild_id, name) VALUES (?, ?)",
			[guildId, trimmed],
		);
		const roleId = Number(result.lastInsertRowid);

		StructuredLogger.logGuildEvent("Role created", {
			guildId,
			roleId,
			name: trimmed,
			operation: "role_created",
		});

		return this.requireRole(guildId, roleId);
	}

	/**
	 * Deletes a role; holders lose it through the member_roles cascade.
	 * Leveling rewards, multipliers and blacklist entries naming the role go
	 * with it, and so does the guild's giveaway role setting.
	 */
	static deleteRole(guildId: number, roleId: number): boolean {
		const result = transaction(() => {
			const deleted = execute(
				"DELETE FROM guild_roles WHERE guild_id = ? AND id = ?",
				[guildId, roleId],
			);
			if (deleted.changes === 0) return deleted;

			execute("DELETE FROM level_roles WHERE guild_id = ? AND role_id = ?", [
				guildId,
				roleId,
			]);
			execute(
				"DELETE FROM level_multipliers WHERE guild_id = ? AND kind = 'role' AND target_id = ?",
				[guildId, roleId],
			);
			execute(
				"DELETE FROM level_blacklist WHERE guild_id = ? AND kind = 'role' AND target_id = ?",
				[guildId, roleId],
			);
			execute(
				"UPDATE guilds SET giveaway_role_id = NULL WHERE guild_id = ? AND giveaway_role_id = ?",
				[guildId, roleId],
			);
			return deleted;
		});

		if (result.changes > 0) {
			LevelConfigService.invalidate(guildId);
			StructuredLogger.logGuildEvent("Role deleted", {
				guildId,
				roleId,
				operation: "role_deleted",
			});
		}
		return result.changes > 0;
	}

	static getRole(guildId: number, roleId: number): GuildRoleRow | undefined {
		return get<GuildRoleRow>(
			"SELECT * FROM guild_roles WHERE guild_id = ? AND id = ?",
			[guildId, roleId],
		);
	}

	static requireRole(guildId: number, roleId: number): GuildRoleRow {
		const role = this.getRole(guildId, roleId);
		if (!role) {
			throw new NotFoundError("role", roleId);
		}
		return role;
	}

	static findRoleByName(guildId: number, name: string): GuildRoleRow | undefined {
		return get<GuildRoleRow>(
			"SELECT * FROM guild_roles WHERE guild_id = ? AND name = ?",
			[guildId, name.trim()],
		);
	}

	static listRoles(guildId: number): GuildRoleRow[] {
		return query<GuildRoleRow>(
			"SELECT * FROM guild_roles WHERE guild_id = ? ORDER BY name",
			[guildId],
		);
	}

	/**
	 * Role ids the member currently holds in the guild.
	 */
	static getRoleIds(guildId: number, userId: number): number[] {
		return query<{ role_id: number }>(
			"SELECT role_id FROM member_roles WHERE guild_id = ? AND user_id = ? ORDER BY role_id",
			[guildId, userId],
		).map((row) => row.role_id);
	}

	static hasRole(guildId: number, userId: number, roleId: number): boolean {
		return (
			get<{ role_id: number }>(
				"SELECT role_id FROM member_roles WHERE guild_id = ? AND user_id = ? AND role_id = ?",
				[guildId, userId, roleId],
			) !== undefined
		);
	}

	/**
	 * Grants a role. Returns false if the member already held it.
	 * Safe to call inside a transaction.
	 */
	static grant(guildId: number, userId: number, roleId: number): boolean {
		this.requireRole(guildId, roleId);
		const result = execute(
			"INSERT OR IGNORE INTO member_roles (guild_id, user_id, role_id) VALUES (?, ?, ?)",
			[guildId, userId, roleId],
		);
		return result.changes > 0;
	}

	/**
	 * Revokes a role. Returns false if the member did not hold it.
	 */
	static revoke(guildId: number, userId: number, roleId: number): boolean {
		const result = execute(
			"DELETE FROM member_roles WHERE guild_id = ? AND user_id = ? AND role_id = ?",
			[guildId, userId, roleId],
		);
		return result.changes > 0;
	}

	/** Members holding the role */
	static listHolders(guildId: number, roleId: number): number[] {
		return query<{ user_id: number }>(
			"SELECT user_id FROM member_roles WHERE guild_id = ? AND role_id = ? ORDER BY user_id",
			[guildId, roleId],
		).map((row) => row.user_id);
	}
}
