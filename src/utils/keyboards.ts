/**
 * Inline keyboard utilities for the engagement bot.
 * Provides reusable keyboard layouts for interactive commands.
 *
 * @module utils/keyboards
 */

import type { InlineKeyboardMarkup } from "telegraf/types";

export const GIVEAWAY_ENTER_ACTION = "gw_enter";
export const GIVEAWAY_LEAVE_ACTION = "gw_leave";
export const LEADERBOARD_ACTION_PATTERN = /^lb_(\d+)$/;

/**
 * Buttons under a running giveaway. The giveaway is found from the message
 * the buttons belong to, so the callback data carries no id.
 */
export function giveawayEntryKeyboard(entrants: number): InlineKeyboardMarkup {
	return {
		inline_keyboard: [
			[
				{ text: `🎉 Enter (${entrants})`, callback_data: GIVEAWAY_ENTER_ACTION },
				{ text: "Leave", callback_data: GIVEAWAY_LEAVE_ACTION },
			],
		],
	};
}

/** Leaderboard paging; page numbers are zero-based */
export function leaderboardKeyboard(
	page: number,
	hasNext: boolean,
): InlineKeyboardMarkup {
	const row = [];
	if (page > 0) {
		row.push({ text: "« Prev", callback_data: `lb_${page - 1}` });
	}
	if (hasNext) {
		row.push({ text: "Next »", callback_data: `lb_${page + 1}` });
	}
	return { inline_keyboard: row.length > 0 ? [row] : [] };
}
