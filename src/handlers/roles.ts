/**
 * Role management handlers.
 *
 * Two kinds of role live here:
 * - Bot permission tiers (owner > admin > member), which gate commands.
 * - Guild roles, named per group, which leveling rewards, multipliers,
 *   blacklists and giveaway requirements refer to.
 *
 * @module handlers/roles
 */

import type { Context, Telegraf } from "telegraf";
import { bold, fmt, join } from "telegraf/format";
import { query } from "../database";
import { adminOrHigher, groupOnly, ownerOnly } from "../middleware/index";
import { MemberRoleService } from "../services/memberRoleService";
import { setUserRole } from "../services/userService";
import type { User } from "../types";
import { getCommandArgs } from "../utils/commandHelper";
import { userMessageFor } from "../utils/errors";
import { StructuredLogger } from "../utils/logger";
import { isOwner } from "../utils/roles";
import { getRemainingArgs, resolveTargetUser } from "../utils/userResolver";

/**
 * Registers all role management command handlers with the bot.
 *
 * Commands registered:
 * - /makeadmin, /removeadmin, /listadmins - Bot permission tiers (owner)
 * - /roles - List this group's roles
 * - /myroles - Roles you hold here
 * - /createrole, /deleterole - Manage group roles (admin)
 * - /giverole, /takerole - Assign group roles (admin)
 *
 * @example
 * ```typescript
 * const bot = new Telegraf(token);
 * registerRoleHandlers(bot);
 * ```
 */
export const registerRoleHandlers = (bot: Telegraf<Context>) => {
	/**
	 * Command: /makeadmin <@user>
	 * Permission: Owner only
	 */
	bot.command("makeadmin", ownerOnly, async (ctx) => {
		const target = resolveTargetUser(ctx, getCommandArgs(ctx));
		if (!target) {
			return ctx.reply("Usage: /makeadmin <@user> (or reply to their message)");
		}
		if (isOwner(target.userId)) {
			return ctx.reply(`${target.displayName} is already an owner.`);
		}

		setUserRole(target.userId, "admin");
		StructuredLogger.logUserAction("Admin granted", {
			userId: target.userId,
			grantedBy: ctx.from.id,
			operation: "make_admin",
		});
		return ctx.reply(`${target.displayName} is now an admin.`);
	});

	/**
	 * Command: /removeadmin <@user>
	 * Permission: Owner only
	 */
	bot.command("removeadmin", ownerOnly, async (ctx) => {
		const target = resolveTargetUser(ctx, getCommandArgs(ctx));
		if (!target) {
			return ctx.reply("Usage: /removeadmin <@user> (or reply to their message)");
		}
		if (isOwner(target.userId)) {
			return ctx.reply("Owners cannot be demoted.");
		}

		setUserRole(target.userId, "member");
		StructuredLogger.logUserAction("Admin revoked", {
			userId: target.userId,
			revokedBy: ctx.from.id,
			operation: "remove_admin",
		});
		return ctx.reply(`${target.displayName} is no longer an admin.`);
	});

	bot.command("listadmins", adminOrHigher, async (ctx) => {
		const staff = query<User>(
			"SELECT * FROM users WHERE role IN ('owner', 'admin') ORDER BY role DESC, id",
		);
		if (staff.length === 0) {
			return ctx.reply("No admins recorded (configured owners still apply).");
		}

		const lines = staff.map(
			(user) => `${user.role}: ${user.username ? `@${user.username}` : user.id}`,
		);
		return ctx.reply(join([fmt`${bold("Bot staff")}`, ...lines], "\n"));
	});

	bot.command("roles", groupOnly, async (ctx) => {
		const roles = MemberRoleService.listRoles(ctx.chat.id);
		if (roles.length === 0) {
			return ctx.reply("This group has no roles yet. Admins can add one with /createrole <name>.");
		}

		const lines = roles.map(
			(role) => `${role.name} (${MemberRoleService.listHolders(ctx.chat.id, role.id).length})`,
		);
		return ctx.reply(join([fmt`${bold("Roles")}`, ...lines], "\n"));
	});

	bot.command("myroles", groupOnly, async (ctx) => {
		const names = MemberRoleService.getRoleIds(ctx.chat.id, ctx.from.id)
			.map((id) => MemberRoleService.getRole(ctx.chat.id, id)?.name)
			.filter((name): name is string => name !== undefined);
		return ctx.reply(names.length > 0 ? `Your roles: ${names.join(", ")}` : "You hold no roles here.");
	});

	/**
	 * Command: /createrole <name>
	 * Permission: Admin and above
	 */
	bot.command("createrole", groupOnly, adminOrHigher, async (ctx) => {
		const name = getCommandArgs(ctx).join(" ");
		try {
			const role = MemberRoleService.createRole(ctx.chat.id, name);
			return ctx.reply(`Role "${role.name}" created.`);
		} catch (error) {
			const message = userMessageFor(error);
			if (message) return ctx.reply(message);
			throw error;
		}
	});

	/**
	 * Command: /deleterole <name>
	 * Removes the role from every holder and from leveling settings.
	 */
	bot.command("deleterole", groupOnly, adminOrHigher, async (ctx) => {
		const name = getCommandArgs(ctx).join(" ");
		const role = MemberRoleService.findRoleByName(ctx.chat.id, name);
		if (!role) {
			return ctx.reply(`Unknown role "${name}".`);
		}

		MemberRoleService.deleteRole(ctx.chat.id, role.id);
		return ctx.reply(`Role "${role.name}" deleted.`);
	});

	/**
	 * Command: /giverole <@user> <role name>
	 */
	bot.command("giverole", groupOnly, adminOrHigher, async (ctx) => {
		const args = getCommandArgs(ctx);
		const target = resolveTargetUser(ctx, args);
		const name = getRemainingArgs(args, target).join(" ");
		if (!target || !name) {
			return ctx.reply("Usage: /giverole <@user> <role name> (or reply with /giverole <role name>)");
		}

		const role = MemberRoleService.findRoleByName(ctx.chat.id, name);
		if (!role) {
			return ctx.reply(`Unknown role "${name}".`);
		}

		const granted = MemberRoleService.grant(ctx.chat.id, target.userId, role.id);
		return ctx.reply(
			granted
				? `${target.displayName} now has "${role.name}".`
				: `${target.displayName} already has "${role.name}".`,
		);
	});

	/**
	 * Command: /takerole <@user> <role name>
	 */
	bot.command("takerole", groupOnly, adminOrHigher, async (ctx) => {
		const args = getCommandArgs(ctx);
		const target = resolveTargetUser(ctx, args);
		const name = getRemainingArgs(args, target).join(" ");
		if (!target || !name) {
			return ctx.reply("Usage: /takerole <@user> <role name> (or reply with /takerole <role name>)");
		}

		const role = MemberRoleService.findRoleByName(ctx.chat.id, name);
		if (!role) {
			return ctx.reply(`Unknown role "${name}".`);
		}

		const revoked = MemberRoleService.revoke(ctx.chat.id, target.userId, role.id);
		return ctx.reply(
			revoked
				? `${target.displayName} no longer has "${role.name}".`
				: `${target.displayName} does not have "${role.name}".`,
		);
	});
};
