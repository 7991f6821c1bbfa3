/**
 * Membership updates: a member leaving may reset their progress, and the bot
 * leaving a group removes that guild's data.
 *
 * @module handlers/memberEvents
 */

import type { Context, Telegraf } from "telegraf";
import { message } from "telegraf/filters";
import { GuildService } from "../services/guildService";
import { LevelingService } from "../services/levelingService";
import { StructuredLogger } from "../utils/logger";

export const registerMemberEventHandlers = (bot: Telegraf<Context>) => {
	bot.on(message("left_chat_member"), async (ctx, next) => {
		const guildId = ctx.chat.id;
		const member = ctx.message.left_chat_member;

		try {
			if (member.id === ctx.botInfo.id) {
				GuildService.removeGuild(guildId);
			} else if (!member.is_bot) {
				LevelingService.handleMemberLeave(guildId, member.id);
			}
		} catch (error) {
			StructuredLogger.logError(error, {
				guildId,
				userId: member.id,
				operation: "member_left",
			});
		}

		return next();
	});
};
