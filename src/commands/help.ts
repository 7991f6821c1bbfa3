/**
 * Help command handler.
 * Provides a role-based command reference accessible via DM.
 *
 * Displays commands organized by category:
 * - Leveling commands (rank, leaderboard, rank card)
 * - Giveaway commands (start, end, cancel, list)
 * - Role commands (group roles)
 * - Admin commands (leveling settings, XP adjustments, role management)
 * - Owner commands (bot admin management)
 *
 * @module commands/help
 */

import type { Context, Telegraf } from "telegraf";
import { bold, code, type FmtString, fmt } from "telegraf/format";
import type { InlineKeyboardMarkup } from "telegraf/types";
import { ensureUserExists } from "../services/userService";
import type { UserRole } from "../types";
import { logger } from "../utils/logger";
import { isAdminOrHigher, isOwner } from "../utils/roles";

export type HelpCategory = "leveling" | "giveaways" | "roles" | "admin" | "owner";

const HELP_CATEGORY_PATTERN = /^help_(leveling|giveaways|roles|admin|owner)$/;

/** Effective tier, counting owners and admins named in config */
export const effectiveRole = (userId: number): UserRole => {
	if (isOwner(userId)) return "owner";
	if (isAdminOrHigher(userId)) return "admin";
	return "member";
};

const menuText = (role: UserRole) =>
	fmt`${bold("Engagement Bot")}\n\nRole: ${code(role)}\n\nSelect a category to view commands:`;

/**
 * Registers the help command with the bot.
 *
 * Command:
 * - /help - Display role-based command reference (DM only)
 */
export function registerHelpCommand(bot: Telegraf<Context>): void {
	/**
	 * Command: /help
	 *
	 * Permission: Any user
	 * Location: Direct message only
	 */
	bot.command("help", async (ctx) => {
		const userId = ctx.from.id;

		// Only allow help command in DMs (private chats)
		if (ctx.chat.type !== "private") {
			return ctx.reply(
				`The /help command is only available via direct message. Please DM me @${ctx.botInfo.username}`,
			);
		}

		try {
			ensureUserExists(userId, ctx.from.username ?? null);
			const role = effectiveRole(userId);
			await ctx.reply(menuText(role), { reply_markup: buildHelpMenu(role) });
		} catch (error) {
			logger.error("Error in help command", { userId, error });
			await ctx.reply("Error loading help");
		}
	});

	// Registered before the category pattern so "menu" is never treated as one
	bot.action("help_menu", async (ctx) => {
		const userId = ctx.from.id;

		try {
			const role = effectiveRole(userId);
			await ctx.editMessageText(menuText(role), { reply_markup: buildHelpMenu(role) });
			await ctx.answerCbQuery();
		} catch (error) {
			logger.error("Error returning to help menu", { userId, error });
			await ctx.answerCbQuery("Error loading menu");
		}
	});

	bot.action(HELP_CATEGORY_PATTERN, async (ctx) => {
		const category = ctx.match[1];
		const userId = ctx.from.id;

		try {
			const helpText = isHelpCategory(category)
				? getHelpTextForCategory(category, effectiveRole(userId))
				: null;
			if (!helpText) {
				await ctx.answerCbQuery("Category not available for your role");
				return;
			}

			const backKeyboard: InlineKeyboardMarkup = {
				inline_keyboard: [[{ text: "← Back to Menu", callback_data: "help_menu" }]],
			};

			await ctx.editMessageText(helpText, { reply_markup: backKeyboard });
			await ctx.answerCbQuery();
		} catch (error) {
			logger.error("Error in help callback", { userId, category, error });
			await ctx.answerCbQuery("Error loading help category");
		}
	});
}

const isHelpCategory = (value: string): value is HelpCategory => Object.hasOwn(helpContent, value);

/**
 * Build the help menu keyboard based on user role
 */
export function buildHelpMenu(role: UserRole): InlineKeyboardMarkup {
	const buttons = [
		[
			{ text: "Leveling", callback_data: "help_leveling" },
			{ text: "Giveaways", callback_data: "help_giveaways" },
		],
		[{ text: "Roles", callback_data: "help_roles" }],
	];

	if (role === "admin" || role === "owner") {
		buttons.push([{ text: "Admin", callback_data: "help_admin" }]);
	}

	if (role === "owner") {
		buttons.push([{ text: "Owner", callback_data: "help_owner" }]);
	}

	return { inline_keyboard: buttons };
}

/**
 * Help content map for each category
 */
const helpContent: Record<HelpCategory, FmtString> = {
	leveling: fmt([
		bold("Leveling Commands"),
		"\n\n",
		"Chatting in a group earns XP once leveling is switched on. Each message gives a random amount, scaled by any role or topic multipliers, limited by a per-member cooldown.\n\n",
		"/rank [user]\n",
		"  Your level, XP towards the next level and position on the leaderboard.\n\n",
		"/leaderboard (or /lb)\n",
		"  Top members by level and XP, ten per page.\n\n",
		"/rankcard\n",
		"  Show your rank card settings.\n\n",
		"/rankcard set <field> <value>\n",
		"  Change one setting, e.g. ",
		code("/rankcard set progressBarColor #ff8800"),
		".\n\n",
		"/rankcard reset\n",
		"  Restore the default card.",
	]),

	giveaways: fmt([
		bold("Giveaway Commands"),
		"\n\n",
		"/gstart <duration> <winners> <prize> [level=N] [roles=A,B]\n",
		"  Start a giveaway in this topic. Lines after the first become the description. Admins and holders of the giveaway role may host.\n\n",
		"  Example: ",
		code("/gstart 2d 3 Telegram Premium level=5"),
		"\n\n",
		"/gend [id]\n",
		"  End a giveaway now and draw its winners. Reply to the announcement or give its id.\n\n",
		"/gcancel [id]\n",
		"  Cancel a giveaway; nobody wins.\n\n",
		"/glist\n",
		"  Running giveaways in this group.\n\n",
		bold("How Giveaways Work:"),
		"\n",
		"1. The host runs ",
		code("/gstart"),
		"\n",
		"2. Members press Enter under the announcement\n",
		"3. Members below the level requirement, or holding none of the required roles, are turned away\n",
		"4. When time runs out, distinct winners are drawn at random from the entrants",
	]),

	roles: fmt([
		bold("Role Commands"),
		"\n\n",
		"/roles\n",
		"  List this group's roles and how many members hold each.\n\n",
		"/myroles\n",
		"  Roles you hold in this group.",
	]),

	admin: fmt([
		bold("Admin Commands"),
		"\n\n",
		bold("Leveling Settings:"),
		"\n",
		"/levelconfig\n",
		"  Show this group's leveling settings.\n\n",
		"/leveling on|off\n",
		"  Switch XP tracking on or off.\n\n",
		"/levelcurve <base> <factor>\n",
		"  XP needed for level n is base × factor^n.\n\n",
		"/xprange <min> <max>\n",
		"  XP awarded per message before multipliers.\n\n",
		"/xpcooldown <messages> <seconds>\n",
		"  How many messages can earn XP within the window.\n\n",
		"/levelmsg <template>|reset|off\n",
		"  Level-up message. Placeholders: {user.mention}, {user.id}, {level}.\n\n",
		"/levelmsgfor <level> <template>|clear\n",
		"  Message for one specific level.\n\n",
		"/levelchannel here|source|dm|off\n",
		"  Where level-up messages go.\n\n",
		"/levelrole <level> <role>|clear\n",
		"  Role rewarded on reaching a level.\n\n",
		"/rolestack on|off\n",
		"  Keep lower reward roles, or hold only the highest.\n\n",
		"/resetonleave on|off\n",
		"  Erase progress when a member leaves.\n\n",
		"/multiplier role <value> <role> | /multiplier topic <value>\n",
		"  Scale XP for a role or for the current topic. A value of 1 removes it.\n\n",
		"/levelblacklist role <role> | topic | user <user>\n",
		"  Toggle exclusion from XP.\n\n",
		bold("Progress:"),
		"\n",
		"/addxp <user> <amount>\n",
		"  Add or remove XP. Level-ups announce as usual.\n\n",
		"/setlevel <user> <level>\n",
		"  Set a level directly; reward roles follow.\n\n",
		bold("Role Management:"),
		"\n",
		"/createrole <name>, /deleterole <name>\n",
		"  Manage this group's roles.\n\n",
		"/giverole <user> <role>, /takerole <user> <role>\n",
		"  Assign or remove a role.\n\n",
		"/giveawayrole <role>|clear\n",
		"  Let holders of a role host giveaways.\n\n",
		"/listadmins\n",
		"  View bot admins and owners.",
	]),

	owner: fmt([
		bold("Owner Commands"),
		"\n\n",
		"/makeadmin <user>\n",
		"  Promote a user to bot admin.\n\n",
		"/removeadmin <user>\n",
		"  Demote a bot admin back to member.",
	]),
};

/**
 * Role requirements for each help category
 */
const categoryRoleRequirements: Record<HelpCategory, UserRole[]> = {
	leveling: ["member", "admin", "owner"],
	giveaways: ["member", "admin", "owner"],
	roles: ["member", "admin", "owner"],
	admin: ["admin", "owner"],
	owner: ["owner"],
};

/**
 * Get help text for a specific category, or null when the role may not see it
 */
export function getHelpTextForCategory(category: HelpCategory, role: UserRole): FmtString | null {
	return categoryRoleRequirements[category].includes(role) ? helpContent[category] : null;
}
