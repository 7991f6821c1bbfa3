/**
 * Rank card appearance commands. Settings are global per user and stored for
 * whatever renders the card.
 *
 * @module commands/rankCard
 */

import type { Context, Telegraf } from "telegraf";
import { bold, code, fmt, join } from "telegraf/format";
import {
	DEFAULT_RANK_CARD,
	type RankCard,
	type RankCardField,
	RankCardService,
	rankCardSchema,
} from "../services/rankCardService";
import { getCommandArgs, parseNumber } from "../utils/commandHelper";
import { ValidationError, userMessageFor } from "../utils/errors";

const FIELDS = Object.keys(DEFAULT_RANK_CARD);

const isRankCardField = (name: string): name is RankCardField => FIELDS.includes(name);

/** "#ff8800", "ff8800" or a plain integer */
export function parseColor(value: string): number | null {
	const hex = /^#?([0-9a-f]{6})$/i.exec(value);
	if (hex) return parseInt(hex[1], 16);
	return parseNumber(value);
}

const formatValue = (field: RankCardField, value: RankCard[RankCardField]): string => {
	if (value === null) return "none";
	if (typeof value === "number" && field.endsWith("Color")) {
		return `#${value.toString(16).padStart(6, "0")}`;
	}
	return String(value);
};

/**
 * Turns one `field value` pair into a validated partial card.
 * @throws ValidationError
 */
export function parseRankCardChange(field: string, raw: string): Partial<RankCard> {
	if (!isRankCardField(field)) {
		throw new ValidationError(`Unknown field "${field}". Fields: ${FIELDS.join(", ")}`);
	}

	let value: unknown;
	if (field === "backgroundUrl") value = raw.toLowerCase() === "none" ? null : raw;
	else if (field.endsWith("Color")) value = parseColor(raw);
	else value = parseNumber(raw);

	const parsed = rankCardSchema.partial().strict().safeParse({ [field]: value });
	if (!parsed.success) {
		throw ValidationError.fromZod(parsed.error, "rank card");
	}
	return parsed.data;
}

/**
 * Registers rank card commands.
 *
 * Commands registered:
 * - /rankcard - Show your card settings
 * - /rankcard set <field> <value> - Change one setting
 * - /rankcard reset - Restore defaults
 */
export function registerRankCardCommands(bot: Telegraf<Context>): void {
	bot.command("rankcard", async (ctx) => {
		const userId = ctx.from.id;
		const [action, field, ...rest] = getCommandArgs(ctx);

		if (action === "reset") {
			RankCardService.reset(userId);
			return ctx.reply("Rank card reset to defaults.");
		}

		if (action === "set") {
			const name = field ?? "";
			try {
				const card = RankCardService.update(userId, parseRankCardChange(name, rest.join(" ")));
				const shown = isRankCardField(name) ? formatValue(name, card[name]) : "";
				return ctx.reply(`Updated ${name}: ${shown}`);
			} catch (error) {
				const message = userMessageFor(error);
				if (message) return ctx.reply(message);
				throw error;
			}
		}

		const card = RankCardService.get(userId);
		const lines = FIELDS.filter(isRankCardField).map(
			(name) => fmt`${code(name)}: ${formatValue(name, card[name])}`,
		);
		return ctx.reply(
			join(
				[
					fmt`${bold("Rank Card")}`,
					...lines,
					"",
					fmt`Change with ${code("/rankcard set <field> <value>")}`,
				],
				"\n",
			),
		);
	});
}
