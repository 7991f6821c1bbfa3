/**
 * Rank card appearance, one per user across all guilds.
 * Values are validated on write and handed to a renderer as stored.
 *
 * @module services/rankCardService
 */

import { z } from "zod";
import { execute, get } from "../database";
import type { RankCardRow } from "../types";
import { ValidationError } from "../utils/errors";
import { StructuredLogger } from "../utils/logger";

const color = z.number().int().min(0).max(0xffffff);
const alpha = z.number().min(0).max(1);

export const FONT_COUNT = 7;

export const rankCardSchema = z.object({
	backgroundColor: color,
	backgroundUrl: z.string().url().max(500).nullable(),
	backgroundBlur: z.number().int().min(0).max(20),
	backgroundAlpha: alpha,
	font: z.number().int().min(0).max(FONT_COUNT - 1),
	primaryColor: color,
	secondaryColor: color,
	tertiaryColor: color,
	overlayColor: color,
	overlayAlpha: alpha,
	overlayBorderRadius: z.number().int().min(0).max(80),
	avatarBorderColor: color,
	avatarBorderAlpha: alpha,
	avatarBorderRadius: z.number().int().min(0).max(139),
	progressBarColor: color,
	progressBarAlpha: alpha,
});

export type RankCard = z.infer<typeof rankCardSchema>;
export type RankCardField = keyof RankCard;

export const DEFAULT_RANK_CARD: Readonly<RankCard> = {
	backgroundColor: 1644825,
	backgroundUrl: null,
	backgroundBlur: 0,
	backgroundAlpha: 1,
	font: 0,
	primaryColor: 12434877,
	secondaryColor: 9671571,
	tertiaryColor: 7064552,
	overlayColor: 15988735,
	overlayAlpha: 0.15,
	overlayBorderRadius: 52,
	avatarBorderColor: 16777215,
	avatarBorderAlpha: 0.09,
	avatarBorderRadius: 103,
	progressBarColor: 16777215,
	progressBarAlpha: 0.16,
};

const rowToRankCard = (row: RankCardRow): RankCard => ({
	backgroundColor: row.background_color,
	backgroundUrl: row.background_url,
	backgroundBlur: row.background_blur,
	backgroundAlpha: row.background_alpha,
	font: row.font,
	primaryColor: row.primary_color,
	secondaryColor: row.secondary_color,
	tertiaryColor: row.tertiary_color,
	overlayColor: row.overlay_color,
	overlayAlpha: row.overlay_alpha,
	overlayBorderRadius: row.overlay_border_radius,
	avatarBorderColor: row.avatar_border_color,
	avatarBorderAlpha: row.avatar_border_alpha,
	avatarBorderRadius: row.avatar_border_radius,
	progressBarColor: row.progress_bar_color,
	progressBarAlpha: row.progress_bar_alpha,
});

export class RankCardService {
	static get(userId: number): RankCard {
		const row = get<RankCardRow>("SELECT * FROM rank_cards WHERE user_id = ?", [userId]);
		return row ? rowToRankCard(row) : { ...DEFAULT_RANK_CARD };
	}

	/**
	 * Merges `changes` into the user's card. Nothing is written if any value
	 * is out of range.
	 */
	static update(userId: number, changes: Partial<RankCard>): RankCard {
		const parsed = rankCardSchema.safeParse({ ...this.get(userId), ...changes });
		if (!parsed.success) {
			throw ValidationError.fromZod(parsed.error, "rank card");
		}
		const card = parsed.data;

		execute(
			`INSERT INTO rank_cards (
        user_id, background_color, background_url, background_blur, background_alpha,
        font, primary_color, secondary_color, tertiary_color, overlay_color,
        overlay_alpha, overlay_border_radius, avatar_border_color, avatar_border_alpha,
        avatar_border_radius, progress_bar_color, progress_bar_alpha
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(user_id) DO UPDATE SET
        background_color = excluded.background_color,
        background_url = excluded.background_url,
        background_blur = excluded.background_blur,
        background_alpha = excluded.background_alpha,
        font = excluded.font,
        primary_color = excluded.primary_color,
        secondary_color = excluded.secondary_color,
        tertiary_color = excluded.tertiary_color,
        overlay_color = excluded.overlay_color,
        overlay_alpha = excluded.overlay_alpha,
        overlay_border_radius = excluded.overlay_border_radius,
        avatar_border_color = excluded.avatar_border_color,
        avatar_border_alpha = excluded.avatar_border_alpha,
        avatar_border_radius = excluded.avatar_border_radius,
        progress_bar_color = excluded.progress_bar_color,
        progress_bar_alpha = excluded.progress_bar_alpha`,
			[
				userId,
				card.backgroundColor,
				card.backgroundUrl,
				card.backgroundBlur,
				card.backgroundAlpha,
				card.font,
				card.primaryColor,
				card.secondaryColor,
				card.tertiaryColor,
				card.overlayColor,
				card.overlayAlpha,
				card.overlayBorderRadius,
				card.avatarBorderColor,
				card.avatarBorderAlpha,
				card.avatarBorderRadius,
				card.progressBarColor,
				card.progressBarAlpha,
			],
		);

		StructuredLogger.logUserAction("Rank card updated", {
			userId,
			fields: Object.keys(changes),
			operation: "rank_card_updated",
		});
		return card;
	}

	static reset(userId: number): void {
		execute("DELETE FROM rank_cards WHERE user_id = ?", [userId]);
	}
}
