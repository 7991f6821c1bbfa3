/**
 * Telegram message bodies for level-ups and giveaways, built with
 * telegraf's entity formatting so user text never needs escaping.
 *
 * @module utils/engagementFormat
 */

import { bold, type FmtString, fmt, join, mention } from "telegraf/format";
import type { Giveaway, GiveawayResolution } from "../services/giveawayService";
import { renderLevelUpMessage } from "../services/levelingService";
import { formatDuration } from "./duration";

const MENTION_TOKEN = "{user.mention}";

/**
 * Fills a level-up template, turning {user.mention} into a real mention.
 */
export function formatLevelUpMessage(
	template: string,
	user: { id: number; name: string },
	level: number,
): FmtString {
	const text = renderLevelUpMessage(template, {
		mention: MENTION_TOKEN,
		userId: user.id,
		level,
	});
	return join(text.split(MENTION_TOKEN), mention(user.name, user.id));
}

export function formatRequirements(
	giveaway: Pick<Giveaway, "levelRequirement" | "rolesRequirement">,
	roleNames: ReadonlyMap<number, string>,
): string | null {
	const parts: string[] = [];
	if (giveaway.levelRequirement > 0) {
		parts.push(`level ${giveaway.levelRequirement}+`);
	}
	if (giveaway.rolesRequirement.length > 0) {
		const names = giveaway.rolesRequirement.map((id) => roleNames.get(id) ?? `#${id}`);
		parts.push(`one of: ${names.join(", ")}`);
	}
	return parts.length > 0 ? parts.join("; ") : null;
}

/**
 * Body of the message the entry buttons hang under.
 */
export function formatGiveawayAnnouncement(
	giveaway: Pick<
		Giveaway,
		"prize" | "description" | "winners" | "endsAt" | "hostId" | "levelRequirement" | "rolesRequirement"
	>,
	hostName: string,
	roleNames: ReadonlyMap<number, string>,
	now: number = Date.now(),
): FmtString {
	const requirements = formatRequirements(giveaway, roleNames);
	const lines: Array<string | FmtString> = [
		fmt`🎉 ${bold("GIVEAWAY")} 🎉`,
		fmt`${bold("Prize:")} ${giveaway.prize}`,
	];
	if (giveaway.description) lines.push(giveaway.description);
	lines.push(fmt`${bold("Winners:")} ${String(giveaway.winners)}`);
	lines.push(fmt`${bold("Ends in:")} ${formatDuration(giveaway.endsAt - now)}`);
	if (requirements) lines.push(fmt`${bold("Requirements:")} ${requirements}`);
	lines.push(fmt`${bold("Hosted by:")} ${mention(hostName, giveaway.hostId)}`);

	return join(lines, "\n");
}

export function formatGiveawayResult(
	resolution: GiveawayResolution,
	winnerNames: ReadonlyMap<number, string>,
): FmtString {
	const { giveaway, winnerIds, entrantCount } = resolution;

	if (winnerIds.length === 0) {
		return fmt`🎉 Giveaway for ${bold(giveaway.prize)} ended with no entrants.`;
	}

	const winners = join(
		winnerIds.map((id) => mention(winnerNames.get(id) ?? `user ${id}`, id)),
		", ",
	);
	const suffix = resolution.partial
		? ` Only ${entrantCount} of ${giveaway.winners} winner slots could be filled.`
		: "";
	return fmt`🎉 Congratulations ${winners}! You won ${bold(giveaway.prize)}.${suffix}`;
}
