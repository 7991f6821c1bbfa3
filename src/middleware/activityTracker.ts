/**
 * Feeds ordinary group messages to the leveling engine.
 *
 * Commands, bot senders and service messages never earn XP. Crediting runs
 * after the rest of the pipeline so a slow write never delays command
 * handling.
 *
 * @module middleware/activityTracker
 */

import type { Context, MiddlewareFn } from "telegraf";
import { LevelingService } from "../services/levelingService";
import { MemberRoleService } from "../services/memberRoleService";
import { getChannelId, isGroupChat } from "../utils/commandHelper";
import { StructuredLogger } from "../utils/logger";

const isQualifyingMessage = (ctx: Context): boolean => {
	const message = ctx.message;
	if (!message || !ctx.from || ctx.from.is_bot) return false;
	if (!isGroupChat(ctx)) return false;

	if ("text" in message) return !message.text.startsWith("/");
	return (
		"photo" in message ||
		"video" in message ||
		"sticker" in message ||
		"animation" in message ||
		"voice" in message ||
		"document" in message
	);
};

export const activityTrackerMiddleware: MiddlewareFn<Context> = async (ctx, next) => {
	await next();

	if (!isQualifyingMessage(ctx) || !ctx.chat || !ctx.from || !ctx.message) return;

	const guildId = ctx.chat.id;
	const userId = ctx.from.id;
	const channelId = getChannelId(ctx) ?? guildId;

	try {
		await LevelingService.recordActivity({
			guildId,
			userId,
			channelId,
			roleIds: MemberRoleService.getRoleIds(guildId, userId),
			timestamp: ctx.message.date * 1000,
		});
	} catch (error) {
		StructuredLogger.logError(error, {
			guildId,
			userId,
			operation: "record_activity",
		});
	}
};
