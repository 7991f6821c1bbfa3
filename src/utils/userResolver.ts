/** User resolution utilities for converting usernames/IDs to user ids */

import type { Context } from "telegraf";
import { get } from "../database";
import { ensureUserExists } from "../services/userService";
import type { User } from "../types";

/**
 * Resolve username or ID string to numeric userId
 * Supports: numeric ID, @username, username (case-insensitive)
 * Returns null if not found in database
 */
export function resolveUserId(userIdentifier: string): number | null {
	const cleanIdentifier = userIdentifier.startsWith("@")
		? userIdentifier.substring(1)
		: userIdentifier;

	if (/^\d+$/.test(cleanIdentifier)) {
		const numericId = parseInt(cleanIdentifier, 10);
		const user = get<User>("SELECT id FROM users WHERE id = ?", [numericId]);
		return user ? numericId : null;
	}

	const user = get<User>(
		"SELECT id FROM users WHERE LOWER(username) = LOWER(?)",
		[cleanIdentifier],
	);

	return user ? user.id : null;
}

/** Display name: @username when known, otherwise the id */
export function formatUserIdDisplay(userId: number): string {
	const user = get<User>("SELECT username FROM users WHERE id = ?", [userId]);
	return user?.username ? `@${user.username}` : `user ${userId}`;
}

/**
 * Result of resolving a target user from command context
 */
export interface TargetUserResult {
	userId: number;
	displayName: string;
	source: "args" | "reply";
}

/**
 * Resolve target user from a reply or the command arguments.
 * A reply wins, so `/addxp 50` answering someone targets them. Replies to a
 * forum topic's opening message are ignored; Telegram adds those to every
 * message posted in the topic.
 */
export function resolveTargetUser(
	ctx: Context,
	args: string[],
): TargetUserResult | null {
	const replyTo =
		ctx.message && "reply_to_message" in ctx.message
			? ctx.message.reply_to_message
			: undefined;

	const from =
		replyTo && !("forum_topic_created" in replyTo) ? replyTo.from : undefined;

	if (from && !from.is_bot) {
		ensureUserExists(from.id, from.username ?? null);

		return {
			userId: from.id,
			displayName: from.username ? `@${from.username}` : from.first_name,
			source: "reply",
		};
	}

	if (args.length > 0 && args[0]) {
		const userId = resolveUserId(args[0]);
		return userId === null
			? null
			: { userId, displayName: formatUserIdDisplay(userId), source: "args" };
	}

	return null;
}

/**
 * Get remaining args after removing the user identifier (if from args).
 * Use when command has format: /cmd <user> <other args...>
 */
export function getRemainingArgs(
	args: string[],
	result: TargetUserResult | null,
): string[] {
	if (!result || result.source === "reply") {
		return args;
	}
	return args.slice(1);
}
