/**
 * Callback query handlers for inline keyboard interactions.
 * Covers the giveaway entry buttons and leaderboard paging.
 *
 * @module handlers/callbacks
 */

import type { Context, Telegraf } from "telegraf";
import { renderLeaderboardPage } from "../commands/leveling";
import { type EnterResult, GiveawayService } from "../services/giveawayService";
import { LevelingService } from "../services/levelingService";
import { MemberRoleService } from "../services/memberRoleService";
import { ensureUserExists } from "../services/userService";
import {
	GIVEAWAY_ENTER_ACTION,
	GIVEAWAY_LEAVE_ACTION,
	LEADERBOARD_ACTION_PATTERN,
	giveawayEntryKeyboard,
} from "../utils/keyboards";
import { NotFoundError } from "../utils/errors";
import { logger } from "../utils/logger";

type CallbackHandler = (ctx: Context, data: string, userId: number) => Promise<void>;

/**
 * Dispatch table mapping callback data to handlers.
 */
const callbackHandlers: Array<{ matches: (data: string) => boolean; handler: CallbackHandler }> = [
	{ matches: (data) => data === GIVEAWAY_ENTER_ACTION, handler: handleGiveawayEnter },
	{ matches: (data) => data === GIVEAWAY_LEAVE_ACTION, handler: handleGiveawayLeave },
	{ matches: (data) => LEADERBOARD_ACTION_PATTERN.test(data), handler: handleLeaderboardPage },
];

/**
 * Registers all callback query handlers with the bot
 */
export function registerCallbackHandlers(bot: Telegraf<Context>): void {
	bot.on("callback_query", async (ctx) => {
		if (!("data" in ctx.callbackQuery)) return;
		const data = ctx.callbackQuery.data;
		const userId = ctx.from.id;

		try {
			await dispatchCallback(ctx, data, userId);
		} catch (error) {
			logger.error("Error handling callback query", { userId, data, error });
			await ctx.answerCbQuery("An error occurred. Please try again.");
		}
	});
}

/**
 * Routes one button press. Unknown data is acknowledged and ignored.
 */
export async function dispatchCallback(ctx: Context, data: string, userId: number): Promise<void> {
	const route = callbackHandlers.find(({ matches }) => matches(data));
	if (!route) {
		await ctx.answerCbQuery();
		return;
	}
	await route.handler(ctx, data, userId);
}

/** The giveaway announced by the message carrying the pressed button. */
function giveawayForButton(ctx: Context) {
	const message = ctx.callbackQuery?.message;
	if (!ctx.chat || !message) return null;
	return GiveawayService.findByMessage(ctx.chat.id, message.message_id);
}

async function handleGiveawayEnter(ctx: Context, _data: string, userId: number): Promise<void> {
	const giveaway = giveawayForButton(ctx);
	if (!giveaway) {
		await ctx.answerCbQuery("This giveaway has ended.");
		return;
	}

	ensureUserExists(userId, ctx.from?.username ?? null);
	const { level } = LevelingService.getUserLevel(giveaway.guildId, userId);
	const roleIds = MemberRoleService.getRoleIds(giveaway.guildId, userId);

	let result: EnterResult;
	try {
		result = await GiveawayService.enter(giveaway.id, userId, level, roleIds);
	} catch (error) {
		if (!(error instanceof NotFoundError)) throw error;
		logger.debug("Giveaway closed before entry", { giveawayId: giveaway.id, userId, error });
		await ctx.answerCbQuery("This giveaway has ended.");
		return;
	}

	if (result.status === "rejected") {
		await ctx.answerCbQuery(result.error.message, { show_alert: true });
		return;
	}

	if (result.alreadyEntered) {
		await ctx.answerCbQuery("You're already entered.");
		return;
	}

	await ctx.answerCbQuery("You're in! Good luck.");
	await refreshEntryButtons(ctx, giveaway.id);
}

async function handleGiveawayLeave(ctx: Context, _data: string, userId: number): Promise<void> {
	const giveaway = giveawayForButton(ctx);
	if (!giveaway) {
		await ctx.answerCbQuery("This giveaway has ended.");
		return;
	}

	const left = await GiveawayService.leave(giveaway.id, userId);
	if (!left) {
		await ctx.answerCbQuery("You haven't entered this giveaway.");
		return;
	}

	await ctx.answerCbQuery("You left the giveaway.");
	await refreshEntryButtons(ctx, giveaway.id);
}

/**
 * Redraws the entry buttons with the current count. A giveaway that ended
 * while the press was handled already had its buttons removed; leave it so.
 */
async function refreshEntryButtons(ctx: Context, giveawayId: number): Promise<void> {
	if (!GiveawayService.getGiveaway(giveawayId)) return;
	await ctx.editMessageReplyMarkup(
		giveawayEntryKeyboard(GiveawayService.countEntrants(giveawayId)),
	);
}

async function handleLeaderboardPage(ctx: Context, data: string): Promise<void> {
	const match = LEADERBOARD_ACTION_PATTERN.exec(data);
	if (!ctx.chat || !match) {
		await ctx.answerCbQuery();
		return;
	}

	const { text, keyboard } = renderLeaderboardPage(ctx.chat.id, Number(match[1]));
	await ctx.answerCbQuery();
	await ctx.editMessageText(text, { reply_markup: keyboard });
}
