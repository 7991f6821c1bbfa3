/**
 * Giveaway command handlers.
 * Hosts start giveaways with a prize, a winner count and a duration; members
 * join through the buttons under the announcement (see handlers/callbacks).
 *
 * @module commands/giveaway
 */

import type { Context, Telegraf } from "telegraf";
import { bold, code, fmt, join } from "telegraf/format";
import { adminOrHigher, giveawayHost, groupOnly } from "../middleware/index";
import { type Giveaway, GiveawayService, GIVEAWAY_LIMITS } from "../services/giveawayService";
import { GuildService } from "../services/guildService";
import { MemberRoleService } from "../services/memberRoleService";
import {
	getChannelId,
	getCommandArgs,
	getCommandBody,
	parseInteger,
	splitOptions,
} from "../utils/commandHelper";
import { formatDuration, parseDuration } from "../utils/duration";
import { formatGiveawayAnnouncement } from "../utils/engagementFormat";
import { userMessageFor } from "../utils/errors";
import { giveawayEntryKeyboard } from "../utils/keyboards";
import { logger, StructuredLogger } from "../utils/logger";
import { isAdminOrHigher } from "../utils/roles";

const roleNameMap = (guildId: number): Map<number, string> =>
	new Map(MemberRoleService.listRoles(guildId).map((role) => [role.id, role.name]));

/**
 * The giveaway a command points at: the announcement it replies to, or an
 * id given as the first argument.
 */
export function resolveGiveawayTarget(ctx: Context, args: string[]): Giveaway | null {
	if (!ctx.chat) return null;

	const replyTo =
		ctx.message && "reply_to_message" in ctx.message
			? ctx.message.reply_to_message
			: undefined;
	if (replyTo) {
		const byMessage = GiveawayService.findByMessage(ctx.chat.id, replyTo.message_id);
		if (byMessage) return byMessage;
	}

	const id = parseInteger(args[0]);
	if (id === null) return null;
	const giveaway = GiveawayService.getGiveaway(id);
	return giveaway && giveaway.guildId === ctx.chat.id ? giveaway : null;
}

/**
 * Registers all giveaway-related commands with the bot.
 *
 * Commands registered:
 * - /gstart - Start a giveaway (admins or giveaway role)
 * - /gend - End a giveaway now and draw winners
 * - /gcancel - Cancel a giveaway without winners
 * - /glist - List running giveaways
 * - /giveawayrole - Set the role allowed to host giveaways (admin only)
 */
export function registerGiveawayCommands(bot: Telegraf<Context>): void {
	/**
	 * Command: /gstart
	 *
	 * Permission: Admins, or holders of the guild's giveaway role
	 * Syntax: /gstart <duration> <winners> <prize> [level=N] [roles=Name,Name]
	 * Any lines after the first become the description.
	 *
	 * @example
	 * User: /gstart 1d 2 Telegram Premium level=5 roles=VIP
	 *       Open to regulars!
	 */
	bot.command("gstart", groupOnly, giveawayHost, async (ctx) => {
		const guildId = ctx.chat.id;
		const hostId = ctx.from.id;
		const { positional, options } = splitOptions(getCommandArgs(ctx));

		if (positional.length < 3) {
			return ctx.reply(
				fmt`${bold("Start a Giveaway")}

Usage: ${code("/gstart <duration> <winners> <prize> [level=N] [roles=Name,Name]")}
Example: ${code("/gstart 1d 2 Telegram Premium level=5")}

Duration: 5s to 30d (e.g. 90s, 2h, 1h30m, 3d)
Winners: 1-${String(GIVEAWAY_LIMITS.maxWinners)}
Lines after the first become the description.`,
			);
		}

		const [durationArg, winnersArg, ...prizeWords] = positional;
		const durationMs = parseDuration(durationArg);
		if (durationMs === null) {
			return ctx.reply(`Invalid duration "${durationArg}". Use e.g. 30m, 2h or 1d12h.`);
		}

		const winners = parseInteger(winnersArg);
		if (winners === null) {
			return ctx.reply(`Invalid winner count "${winnersArg}".`);
		}

		const levelOption = options.get("level");
		const levelRequirement = levelOption === undefined ? 0 : parseInteger(levelOption);
		if (levelRequirement === null) {
			return ctx.reply(`Invalid level requirement "${levelOption}".`);
		}

		const rolesRequirement: number[] = [];
		for (const name of (options.get("roles") ?? "").split(",").filter((n) => n.trim())) {
			const role = MemberRoleService.findRoleByName(guildId, name);
			if (!role) {
				return ctx.reply(`Unknown role "${name.trim()}". See /roles.`);
			}
			rolesRequirement.push(role.id);
		}

		const draft = {
			guildId,
			channelId: getChannelId(ctx) ?? guildId,
			hostId,
			levelRequirement,
			rolesRequirement,
			prize: prizeWords.join(" "),
			winners,
			durationMs,
			description: getCommandBody(ctx) ?? undefined,
		};

		try {
			GiveawayService.validateDraft(draft);
		} catch (error) {
			const message = userMessageFor(error);
			if (message) return ctx.reply(message);
			throw error;
		}

		const hostName = ctx.from.username ? `@${ctx.from.username}` : ctx.from.first_name;
		const announcement = await ctx.reply(
			formatGiveawayAnnouncement(
				{
					...draft,
					description: draft.description ?? null,
					endsAt: Date.now() + durationMs,
				},
				hostName,
				roleNameMap(guildId),
			),
			{ reply_markup: giveawayEntryKeyboard(0) },
		);

		try {
			const giveaway = GiveawayService.createGiveaway({
				...draft,
				messageId: announcement.message_id,
			});
			logger.info("Giveaway started", { guildId, giveawayId: giveaway.id, hostId });
		} catch (error) {
			try {
				await ctx.telegram.deleteMessage(guildId, announcement.message_id);
			} catch (deleteError) {
				logger.warn("Could not remove orphaned giveaway announcement", {
					guildId,
					messageId: announcement.message_id,
					error: deleteError,
				});
			}
			const message = userMessageFor(error);
			if (message) return ctx.reply(message);
			StructuredLogger.logError(error, { guildId, userId: hostId, operation: "giveaway_start" });
			return ctx.reply("Failed to start the giveaway.");
		}
	});

	/**
	 * Command: /gend
	 * End a giveaway now and draw its winners.
	 *
	 * Permission: The host, or admins
	 * Syntax: /gend <id> (or reply to the announcement)
	 */
	bot.command("gend", groupOnly, async (ctx) => {
		const giveaway = resolveGiveawayTarget(ctx, getCommandArgs(ctx));
		if (!giveaway) {
			return ctx.reply("Giveaway not found. Reply to its announcement or give its id.");
		}
		if (giveaway.hostId !== ctx.from.id && !isAdminOrHigher(ctx.from.id)) {
			return ctx.reply("Only the host or an admin can end this giveaway.");
		}

		const resolution = GiveawayService.endNow(giveaway.id);
		if (!resolution) {
			return ctx.reply("That giveaway has already ended.");
		}
	});

	/**
	 * Command: /gcancel
	 * Cancel a giveaway; nobody wins.
	 *
	 * Permission: The host, or admins
	 * Syntax: /gcancel <id> (or reply to the announcement)
	 */
	bot.command("gcancel", groupOnly, async (ctx) => {
		const giveaway = resolveGiveawayTarget(ctx, getCommandArgs(ctx));
		if (!giveaway) {
			return ctx.reply("Giveaway not found. Reply to its announcement or give its id.");
		}
		if (giveaway.hostId !== ctx.from.id && !isAdminOrHigher(ctx.from.id)) {
			return ctx.reply("Only the host or an admin can cancel this giveaway.");
		}

		const result = GiveawayService.cancel(giveaway.id);
		if (!result.cancelled) {
			return ctx.reply("That giveaway has already ended.");
		}
	});

	/**
	 * Command: /glist
	 * Running giveaways in this group.
	 *
	 * Permission: Any user
	 */
	bot.command("glist", groupOnly, async (ctx) => {
		const active = GiveawayService.listActive(ctx.chat.id);
		if (active.length === 0) {
			return ctx.reply("No giveaways running.");
		}

		const now = Date.now();
		const lines = active.map(
			(g) =>
				fmt`${code(`#${g.id}`)} ${bold(g.prize)}: ${String(g.winners)} winner(s), ${String(GiveawayService.countEntrants(g.id))} entrant(s), ends in ${formatDuration(g.endsAt - now)}`,
		);
		return ctx.reply(join([fmt`${bold("Running giveaways")}`, ...lines], "\n"));
	});

	/**
	 * Command: /giveawayrole
	 * Let holders of a role host giveaways.
	 *
	 * Permission: Admin and above
	 * Syntax: /giveawayrole <role name> | /giveawayrole clear
	 */
	bot.command("giveawayrole", groupOnly, adminOrHigher, async (ctx) => {
		const guildId = ctx.chat.id;
		const name = getCommandArgs(ctx).join(" ");

		if (!name) {
			const current = GuildService.getGuild(guildId)?.giveaway_role_id;
			const role =
				current !== null && current !== undefined
					? MemberRoleService.getRole(guildId, current)
					: undefined;
			return ctx.reply(
				role
					? `Giveaway hosts: admins and holders of "${role.name}".`
					: "Giveaway hosts: admins only. Use /giveawayrole <role> to add a role.",
			);
		}

		if (name.toLowerCase() === "clear") {
			GuildService.setGiveawayRole(guildId, null);
			return ctx.reply("Only admins can host giveaways now.");
		}

		const role = MemberRoleService.findRoleByName(guildId, name);
		if (!role) {
			return ctx.reply(`Unknown role "${name}". See /roles.`);
		}

		GuildService.setGiveawayRole(guildId, role.id);
		return ctx.reply(`Holders of "${role.name}" can now host giveaways.`);
	});
}
