/** Command parsing utilities for arguments, key=value options and chat scope */

import type { Context } from "telegraf";

/**
 * Arguments on the command's first line, split on whitespace.
 * Later lines are free text (see getCommandBody).
 */
export function getCommandArgs(ctx: Context): string[] {
	if (!ctx.message || !("text" in ctx.message)) {
		return [];
	}

	const firstLine = ctx.message.text.split("\n")[0];
	return firstLine.split(/\s+/).slice(1).filter((arg) => arg.length > 0);
}

/**
 * Text after the command's first line, or null if there is none.
 */
export function getCommandBody(ctx: Context): string | null {
	if (!ctx.message || !("text" in ctx.message)) {
		return null;
	}

	const newline = ctx.message.text.indexOf("\n");
	if (newline === -1) return null;

	const body = ctx.message.text.slice(newline + 1).trim();
	return body.length > 0 ? body : null;
}

/**
 * Separates `key=value` options from positional arguments.
 * Keys are lowercased; a repeated key keeps its last value.
 *
 * @example
 * splitOptions(["1h", "2", "Nitro", "level=5"]);
 * // { positional: ["1h", "2", "Nitro"], options: Map { "level" => "5" } }
 */
export function splitOptions(args: readonly string[]): {
	positional: string[];
	options: Map<string, string>;
} {
	const positional: string[] = [];
	const options = new Map<string, string>();

	for (const arg of args) {
		const match = /^([a-z_]+)=(.*)$/i.exec(arg);
		if (match) {
			options.set(match[1].toLowerCase(), match[2]);
		} else {
			positional.push(arg);
		}
	}

	return { positional, options };
}

/**
 * Parses a whole number, rejecting trailing garbage ("5x") that parseInt
 * would accept.
 */
export function parseInteger(value: string | undefined): number | null {
	if (value === undefined || !/^[+-]?\d+$/.test(value.trim())) return null;
	return parseInt(value, 10);
}

export function parseNumber(value: string | undefined): number | null {
	if (value === undefined || value.trim() === "") return null;
	const parsed = Number(value);
	return Number.isFinite(parsed) ? parsed : null;
}

/**
 * True for group and supergroup chats, where guild features apply.
 */
export function isGroupChat(ctx: Context): boolean {
	return ctx.chat?.type === "group" || ctx.chat?.type === "supergroup";
}

/**
 * The channel a message belongs to: its forum topic, or the group itself.
 */
export function getChannelId(ctx: Context): number | null {
	if (!ctx.chat) return null;
	const message = ctx.message ?? ctx.callbackQuery?.message;
	// reply threads in plain groups also carry message_thread_id; only topics count
	if (
		message &&
		"is_topic_message" in message &&
		message.is_topic_message &&
		message.message_thread_id !== undefined
	) {
		return message.message_thread_id;
	}
	return ctx.chat.id;
}
