/**
 * Delivers engine events to Telegram.
 *
 * Level-ups go to the destination chosen by the guild's config; giveaway
 * results are posted as a reply to the announcement, whose buttons are
 * removed.
 *
 * @module handlers/notifications
 */

import type { Context, Telegraf } from "telegraf";
import { join } from "telegraf/format";
import { engagementEvents } from "../services/engagementEvents";
import type { Giveaway, GiveawayResolution } from "../services/giveawayService";
import type { LevelUp } from "../services/levelingService";
import { MemberRoleService } from "../services/memberRoleService";
import { getUserById, getUsernames } from "../services/userService";
import { formatGiveawayResult, formatLevelUpMessage } from "../utils/engagementFormat";
import { StructuredLogger } from "../utils/logger";

/** Topic options for a message to `channelId` inside `guildId` */
const threadOptions = (guildId: number, channelId: number): { message_thread_id?: number } =>
	channelId === guildId ? {} : { message_thread_id: channelId };

const displayName = (userId: number): string =>
	getUserById(userId)?.username ?? `user ${userId}`;

export async function deliverLevelUp(bot: Telegraf<Context>, levelUp: LevelUp): Promise<void> {
	const { guildId, userId, level, template, destination } = levelUp;
	if (!template || !destination) return;

	const message = formatLevelUpMessage(template, { id: userId, name: displayName(userId) }, level);
	const role =
		levelUp.rewardRoleId !== null
			? MemberRoleService.getRole(guildId, levelUp.rewardRoleId)
			: undefined;
	const text = role ? join([message, `New role: ${role.name}`], "\n") : message;

	switch (destination.kind) {
		case "dm":
			await bot.telegram.sendMessage(userId, text);
			return;
		case "source":
		case "channel":
			await bot.telegram.sendMessage(guildId, text, threadOptions(guildId, destination.channelId));
			return;
	}
}

export async function deliverGiveawayResult(
	bot: Telegraf<Context>,
	resolution: GiveawayResolution,
): Promise<void> {
	const { giveaway } = resolution;
	await clearGiveawayButtons(bot, giveaway);

	await bot.telegram.sendMessage(
		giveaway.guildId,
		formatGiveawayResult(resolution, getUsernames(resolution.winnerIds)),
		{
			...threadOptions(giveaway.guildId, giveaway.channelId),
			reply_parameters: { message_id: giveaway.messageId, allow_sending_without_reply: true },
		},
	);
}

export async function deliverGiveawayCancelled(
	bot: Telegraf<Context>,
	giveaway: Giveaway,
): Promise<void> {
	await clearGiveawayButtons(bot, giveaway);
	await bot.telegram.sendMessage(
		giveaway.guildId,
		`Giveaway for "${giveaway.prize}" was cancelled.`,
		{
			...threadOptions(giveaway.guildId, giveaway.channelId),
			reply_parameters: { message_id: giveaway.messageId, allow_sending_without_reply: true },
		},
	);
}

/**
 * The announcement may already be gone; a failed edit is logged and the
 * result is still posted.
 */
async function clearGiveawayButtons(bot: Telegraf<Context>, giveaway: Giveaway): Promise<void> {
	try {
		await bot.telegram.editMessageReplyMarkup(giveaway.guildId, giveaway.messageId, undefined, {
			inline_keyboard: [],
		});
	} catch (error) {
		StructuredLogger.logDebug("Could not clear giveaway buttons", {
			guildId: giveaway.guildId,
			giveawayId: giveaway.id,
			error: error instanceof Error ? error.message : String(error),
		});
	}
}

/**
 * Subscribes the delivery functions to engine events.
 * @returns a function that removes every subscription
 */
export const registerNotificationHandlers = (bot: Telegraf<Context>): (() => void) => {
	const subscriptions = [
		engagementEvents.on("levelUp", (levelUp) => deliverLevelUp(bot, levelUp)),
		engagementEvents.on("giveawayResolved", (resolution) =>
			deliverGiveawayResult(bot, resolution),
		),
		engagementEvents.on("giveawayCancelled", (giveaway) =>
			deliverGiveawayCancelled(bot, giveaway),
		),
	];

	return () => {
		for (const unsubscribe of subscriptions) unsubscribe();
	};
};
