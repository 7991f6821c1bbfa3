/**
 * Leveling command handlers.
 * Member commands show progress; admin commands edit the guild's leveling
 * configuration and adjust members' XP.
 *
 * @module commands/leveling
 */

import type { Context, Telegraf } from "telegraf";
import { bold, code, type FmtString, fmt, join } from "telegraf/format";
import type { InlineKeyboardMarkup } from "telegraf/types";
import { adminOrHigher, groupOnly } from "../middleware/index";
import {
	DEFAULT_LEVEL_UP_MESSAGE,
	type GuildLevelConfig,
	LevelConfigService,
} from "../services/levelConfigService";
import { LevelingService } from "../services/levelingService";
import { MemberRoleService } from "../services/memberRoleService";
import { getUsernames } from "../services/userService";
import {
	getChannelId,
	getCommandArgs,
	getCommandBody,
	parseInteger,
	parseNumber,
} from "../utils/commandHelper";
import { userMessageFor } from "../utils/errors";
import { leaderboardKeyboard } from "../utils/keyboards";
import { StructuredLogger } from "../utils/logger";
import { getRemainingArgs, resolveTargetUser } from "../utils/userResolver";

export const LEADERBOARD_PAGE_SIZE = 10;

const parseToggle = (value: string | undefined): boolean | null => {
	switch (value?.toLowerCase()) {
		case "on":
		case "enable":
		case "true":
			return true;
		case "off":
		case "disable":
		case "false":
			return false;
		default:
			return null;
	}
};

/**
 * Saves a config edit and replies with `success`, or with the validation
 * problem if the edit was rejected.
 */
async function applyConfigEdit(
	ctx: Context,
	guildId: number,
	edit: (draft: GuildLevelConfig) => void,
	success: string,
): Promise<void> {
	try {
		LevelConfigService.updateConfig(guildId, edit);
	} catch (error) {
		const message = userMessageFor(error);
		if (message) {
			await ctx.reply(message);
			return;
		}
		StructuredLogger.logError(error, { guildId, operation: "level_config_update" });
		await ctx.reply("Failed to update leveling settings.");
		return;
	}
	await ctx.reply(success);
}

/**
 * One page of the leaderboard, shared by /leaderboard and its page buttons.
 */
export function renderLeaderboardPage(
	guildId: number,
	page: number,
): { text: FmtString; keyboard: InlineKeyboardMarkup } {
	// one extra row tells us whether a next page exists
	const rows = LevelingService.getLeaderboard(
		guildId,
		LEADERBOARD_PAGE_SIZE + 1,
		page * LEADERBOARD_PAGE_SIZE,
	);
	const shown = rows.slice(0, LEADERBOARD_PAGE_SIZE);
	const names = getUsernames(shown.map((row) => row.user_id));

	if (shown.length === 0) {
		return {
			text: fmt`Nobody has earned XP here yet.`,
			keyboard: leaderboardKeyboard(page, false),
		};
	}

	const lines = shown.map(
		(row) =>
			fmt`${bold(`#${row.rank}`)} ${names.get(row.user_id) ?? `user ${row.user_id}`}: level ${String(row.level)} (${String(row.xp)} XP)`,
	);

	return {
		text: join([fmt`${bold("Leaderboard")} (page ${String(page + 1)})`, ...lines], "\n"),
		keyboard: leaderboardKeyboard(page, rows.length > LEADERBOARD_PAGE_SIZE),
	};
}

export function formatLevelConfig(guildId: number, config: GuildLevelConfig): FmtString {
	const roleName = (id: number) => MemberRoleService.getRole(guildId, id)?.name ?? `#${id}`;
	const channel = config.levelUpChannel;
	const destination =
		channel.kind === "channel" ? `topic ${channel.channelId}` : channel.kind;

	const rewards = [...config.levelRoles.entries()]
		.sort(([a], [b]) => a - b)
		.map(([level, roleId]) => `L${level}: ${roleName(roleId)}`);
	const multipliers = [
		...[...config.multiplierRoles].map(([id, value]) => `${roleName(id)} x${value}`),
		...[...config.multiplierChannels].map(([id, value]) => `topic ${id} x${value}`),
	];
	const blacklist = [
		...[...config.blacklistedRoles].map(roleName),
		...[...config.blacklistedChannels].map((id) => `topic ${id}`),
		...[...config.blacklistedUsers].map((id) => `user ${id}`),
	];

	return fmt`${bold("Leveling Settings")}

Module: ${config.moduleEnabled ? "enabled" : "disabled"}
Level curve: ${code(`${config.base} x ${config.factor}^level`)}
XP per message: ${String(config.minGain)}-${String(config.maxGain)}
Cooldown: ${String(config.cooldownRate)} per ${String(config.cooldownPer)}s
Level-up message: ${config.levelUpMessage || "(none)"}
Special messages: ${String(config.specialLevelUpMessages.size)}
Announce in: ${destination}
Role stacking: ${config.roleStack ? "on" : "off"}
Reset on leave: ${config.resetOnLeave ? "on" : "off"}
Reward roles: ${rewards.join(", ") || "none"}
Multipliers: ${multipliers.join(", ") || "none"}
Blacklist: ${blacklist.join(", ") || "none"}`;
}

/**
 * Registers all leveling commands with the bot.
 *
 * Commands registered:
 * - /rank - Your (or another member's) level and rank
 * - /leaderboard - Top members by level
 * - /levelconfig - Show leveling settings (admin)
 * - /leveling, /levelcurve, /xprange, /xpcooldown, /levelmsg, /levelmsgfor,
 *   /levelchannel, /rolestack, /resetonleave, /levelrole, /multiplier,
 *   /levelblacklist - Edit leveling settings (admin)
 * - /addxp, /setlevel - Adjust a member's progress (admin)
 */
export function registerLevelingCommands(bot: Telegraf<Context>): void {
	/**
	 * Command: /rank
	 *
	 * Permission: Any user
	 * Syntax: /rank [@user] (or reply to a message)
	 */
	bot.command("rank", groupOnly, async (ctx) => {
		const guildId = ctx.chat.id;
		const args = getCommandArgs(ctx);
		const target = resolveTargetUser(ctx, args);

		if (args.length > 0 && !target) {
			return ctx.reply(`User ${args[0]} not found.`);
		}

		const userId = target?.userId ?? ctx.from.id;
		const name =
			target?.displayName ?? (ctx.from.username ? `@${ctx.from.username}` : ctx.from.first_name);
		const progress = LevelingService.getUserLevel(guildId, userId);
		const rank = LevelingService.getRank(guildId, userId);

		return ctx.reply(
			fmt`${bold(name)}
Level: ${bold(String(progress.level))}
XP: ${String(progress.xp)} / ${String(progress.requiredXp)}
Rank: ${rank === null ? "unranked" : `#${rank}`}`,
		);
	});

	/**
	 * Command: /leaderboard
	 *
	 * Permission: Any user
	 * Syntax: /leaderboard [page]
	 */
	bot.command(["leaderboard", "lb"], groupOnly, async (ctx) => {
		const requested = parseInteger(getCommandArgs(ctx)[0]) ?? 1;
		const page = Math.max(0, requested - 1);
		const { text, keyboard } = renderLeaderboardPage(ctx.chat.id, page);
		return ctx.reply(text, { reply_markup: keyboard });
	});

	bot.command("levelconfig", groupOnly, adminOrHigher, async (ctx) => {
		const config = LevelConfigService.getConfig(ctx.chat.id);
		return ctx.reply(formatLevelConfig(ctx.chat.id, config));
	});

	/**
	 * Command: /leveling on|off
	 */
	bot.command("leveling", groupOnly, adminOrHigher, async (ctx) => {
		const enabled = parseToggle(getCommandArgs(ctx)[0]);
		if (enabled === null) {
			return ctx.reply("Usage: /leveling on|off");
		}
		await applyConfigEdit(
			ctx,
			ctx.chat.id,
			(c) => {
				c.moduleEnabled = enabled;
			},
			`Leveling ${enabled ? "enabled" : "disabled"}.`,
		);
	});

	/**
	 * Command: /levelcurve <base> <factor>
	 * XP for the next level is floor(base * factor^level).
	 */
	bot.command("levelcurve", groupOnly, adminOrHigher, async (ctx) => {
		const [baseArg, factorArg] = getCommandArgs(ctx);
		const base = parseInteger(baseArg);
		const factor = parseNumber(factorArg);
		if (base === null || factor === null) {
			return ctx.reply("Usage: /levelcurve <base> <factor>  (e.g. /levelcurve 100 1.3)");
		}
		await applyConfigEdit(
			ctx,
			ctx.chat.id,
			(c) => {
				c.base = base;
				c.factor = factor;
			},
			`Level curve set to ${base} x ${factor}^level.`,
		);
	});

	/**
	 * Command: /xprange <min> <max>
	 */
	bot.command("xprange", groupOnly, adminOrHigher, async (ctx) => {
		const [minArg, maxArg] = getCommandArgs(ctx);
		const min = parseInteger(minArg);
		const max = parseInteger(maxArg ?? minArg);
		if (min === null || max === null) {
			return ctx.reply("Usage: /xprange <min> <max>");
		}
		await applyConfigEdit(
			ctx,
			ctx.chat.id,
			(c) => {
				c.minGain = min;
				c.maxGain = max;
			},
			`Members now earn ${min}-${max} XP per message.`,
		);
	});

	/**
	 * Command: /xpcooldown <rate> <seconds>
	 * At most <rate> messages earn XP in any <seconds> window.
	 */
	bot.command("xpcooldown", groupOnly, adminOrHigher, async (ctx) => {
		const [rateArg, perArg] = getCommandArgs(ctx);
		const rate = parseInteger(rateArg);
		const per = parseInteger(perArg);
		if (rate === null || per === null) {
			return ctx.reply("Usage: /xpcooldown <rate> <seconds>  (e.g. /xpcooldown 1 40)");
		}
		await applyConfigEdit(
			ctx,
			ctx.chat.id,
			(c) => {
				c.cooldownRate = rate;
				c.cooldownPer = per;
			},
			`XP cooldown set to ${rate} per ${per}s.`,
		);
	});

	/**
	 * Command: /levelmsg <template> | reset | off
	 * Placeholders: {user.mention} {user.id} {level}
	 */
	bot.command("levelmsg", groupOnly, adminOrHigher, async (ctx) => {
		const args = getCommandArgs(ctx);
		const body = getCommandBody(ctx);
		const first = args[0]?.toLowerCase();

		if (!first && !body) {
			return ctx.reply(
				fmt`Usage: ${code("/levelmsg <template>")}, ${code("/levelmsg reset")} or ${code("/levelmsg off")}
Placeholders: ${code("{user.mention}")} ${code("{user.id}")} ${code("{level}")}`,
			);
		}

		let template: string;
		if (first === "reset" && args.length === 1 && !body) template = DEFAULT_LEVEL_UP_MESSAGE;
		else if (first === "off" && args.length === 1 && !body) template = "";
		else template = [args.join(" "), body].filter((part) => part).join("\n");

		await applyConfigEdit(
			ctx,
			ctx.chat.id,
			(c) => {
				c.levelUpMessage = template;
			},
			template ? "Level-up message updated." : "Level-up messages turned off.",
		);
	});

	/**
	 * Command: /levelmsgfor <level> <template> | /levelmsgfor <level> clear
	 * Overrides the message for one level.
	 */
	bot.command("levelmsgfor", groupOnly, adminOrHigher, async (ctx) => {
		const [levelArg, ...rest] = getCommandArgs(ctx);
		const level = parseInteger(levelArg);
		const body = getCommandBody(ctx);
		const template = [rest.join(" "), body].filter((part) => part).join("\n");

		if (level === null || !template) {
			return ctx.reply("Usage: /levelmsgfor <level> <template>  or  /levelmsgfor <level> clear");
		}

		if (template.toLowerCase() === "clear") {
			await applyConfigEdit(
				ctx,
				ctx.chat.id,
				(c) => {
					c.specialLevelUpMessages.delete(level);
				},
				`Level ${level} uses the default message again.`,
			);
			return;
		}

		await applyConfigEdit(
			ctx,
			ctx.chat.id,
			(c) => {
				c.specialLevelUpMessages.set(level, template);
			},
			`Custom message set for level ${level}.`,
		);
	});

	/**
	 * Command: /levelchannel here|source|dm|off
	 * "here" announces every level-up in the current topic.
	 */
	bot.command("levelchannel", groupOnly, adminOrHigher, async (ctx) => {
		const mode = getCommandArgs(ctx)[0]?.toLowerCase();
		const guildId = ctx.chat.id;

		let channel: GuildLevelConfig["levelUpChannel"];
		switch (mode) {
			case "here":
				channel = { kind: "channel", channelId: getChannelId(ctx) ?? guildId };
				break;
			case "source":
				channel = { kind: "source" };
				break;
			case "dm":
				channel = { kind: "dm" };
				break;
			case "off":
				channel = { kind: "suppress" };
				break;
			default:
				return ctx.reply("Usage: /levelchannel here|source|dm|off");
		}

		await applyConfigEdit(
			ctx,
			guildId,
			(c) => {
				c.levelUpChannel = channel;
			},
			`Level-up announcements: ${mode}.`,
		);
	});

	bot.command("rolestack", groupOnly, adminOrHigher, async (ctx) => {
		const enabled = parseToggle(getCommandArgs(ctx)[0]);
		if (enabled === null) {
			return ctx.reply("Usage: /rolestack on|off");
		}
		await applyConfigEdit(
			ctx,
			ctx.chat.id,
			(c) => {
				c.roleStack = enabled;
			},
			enabled
				? "Members keep every reward role they earn."
				: "Members keep only their highest reward role.",
		);
	});

	bot.command("resetonleave", groupOnly, adminOrHigher, async (ctx) => {
		const enabled = parseToggle(getCommandArgs(ctx)[0]);
		if (enabled === null) {
			return ctx.reply("Usage: /resetonleave on|off");
		}
		await applyConfigEdit(
			ctx,
			ctx.chat.id,
			(c) => {
				c.resetOnLeave = enabled;
			},
			enabled
				? "Progress is deleted when a member leaves."
				: "Progress is kept when a member leaves.",
		);
	});

	/**
	 * Command: /levelrole <level> <role name> | /levelrole <level> clear
	 */
	bot.command("levelrole", groupOnly, adminOrHigher, async (ctx) => {
		const guildId = ctx.chat.id;
		const [levelArg, ...nameParts] = getCommandArgs(ctx);
		const level = parseInteger(levelArg);
		const name = nameParts.join(" ");

		if (level === null || !name) {
			return ctx.reply("Usage: /levelrole <level> <role name>  or  /levelrole <level> clear");
		}

		if (name.toLowerCase() === "clear") {
			await applyConfigEdit(
				ctx,
				guildId,
				(c) => {
					c.levelRoles.delete(level);
				},
				`Level ${level} no longer grants a role.`,
			);
			return;
		}

		const role = MemberRoleService.findRoleByName(guildId, name);
		if (!role) {
			return ctx.reply(`Unknown role "${name}". See /roles.`);
		}

		await applyConfigEdit(
			ctx,
			guildId,
			(c) => {
				c.levelRoles.set(level, role.id);
			},
			`Reaching level ${level} now grants "${role.name}".`,
		);
	});

	/**
	 * Command: /multiplier role <value> <role name> | /multiplier topic <value>
	 * A value of 1 removes the multiplier.
	 */
	bot.command("multiplier", groupOnly, adminOrHigher, async (ctx) => {
		const guildId = ctx.chat.id;
		const [kind, valueArg, ...nameParts] = getCommandArgs(ctx);
		const value = parseNumber(valueArg);

		if ((kind !== "role" && kind !== "topic") || value === null) {
			return ctx.reply(
				"Usage: /multiplier role <value> <role name>  or  /multiplier topic <value> (current topic)",
			);
		}

		if (kind === "topic") {
			const channelId = getChannelId(ctx) ?? guildId;
			await applyConfigEdit(
				ctx,
				guildId,
				(c) => {
					if (value === 1) c.multiplierChannels.delete(channelId);
					else c.multiplierChannels.set(channelId, value);
				},
				value === 1 ? "Topic multiplier removed." : `This topic now earns x${value} XP.`,
			);
			return;
		}

		const role = MemberRoleService.findRoleByName(guildId, nameParts.join(" "));
		if (!role) {
			return ctx.reply(`Unknown role "${nameParts.join(" ")}". See /roles.`);
		}

		await applyConfigEdit(
			ctx,
			guildId,
			(c) => {
				if (value === 1) c.multiplierRoles.delete(role.id);
				else c.multiplierRoles.set(role.id, value);
			},
			value === 1
				? `Multiplier for "${role.name}" removed.`
				: `"${role.name}" now earns x${value} XP.`,
		);
	});

	/**
	 * Command: /levelblacklist role <name> | topic | user <@user>
	 * Toggles the entry; blacklisted members, topics and roles earn no XP.
	 */
	bot.command("levelblacklist", groupOnly, adminOrHigher, async (ctx) => {
		const guildId = ctx.chat.id;
		const [kind, ...rest] = getCommandArgs(ctx);

		let set: (c: GuildLevelConfig) => Set<number>;
		let targetId: number;
		let label: string;

		switch (kind) {
			case "role": {
				const role = MemberRoleService.findRoleByName(guildId, rest.join(" "));
				if (!role) return ctx.reply(`Unknown role "${rest.join(" ")}". See /roles.`);
				set = (c) => c.blacklistedRoles;
				targetId = role.id;
				label = `Role "${role.name}"`;
				break;
			}
			case "topic":
				set = (c) => c.blacklistedChannels;
				targetId = getChannelId(ctx) ?? guildId;
				label = "This topic";
				break;
			case "user": {
				const target = resolveTargetUser(ctx, rest);
				if (!target) return ctx.reply("User not found.");
				set = (c) => c.blacklistedUsers;
				targetId = target.userId;
				label = target.displayName;
				break;
			}
			default:
				return ctx.reply("Usage: /levelblacklist role <name> | topic | user <@user>");
		}

		const listed = set(LevelConfigService.getConfig(guildId)).has(targetId);
		await applyConfigEdit(
			ctx,
			guildId,
			(c) => {
				if (listed) set(c).delete(targetId);
				else set(c).add(targetId);
			},
			listed ? `${label} can earn XP again.` : `${label} no longer earns XP.`,
		);
	});

	/**
	 * Command: /addxp <@user> <amount>
	 * Negative amounts remove XP (never below level 0).
	 */
	bot.command("addxp", groupOnly, adminOrHigher, async (ctx) => {
		const guildId = ctx.chat.id;
		const args = getCommandArgs(ctx);
		const target = resolveTargetUser(ctx, args);
		const amount = parseInteger(getRemainingArgs(args, target)[0]);

		if (!target || amount === null) {
			return ctx.reply("Usage: /addxp <@user> <amount>  (or reply with /addxp <amount>)");
		}

		try {
			const result = await LevelingService.adjustXp(guildId, target.userId, amount);
			return ctx.reply(
				`${target.displayName} is now level ${result.level} with ${result.xp} XP.`,
			);
		} catch (error) {
			const message = userMessageFor(error);
			if (message) return ctx.reply(message);
			throw error;
		}
	});

	/**
	 * Command: /setlevel <@user> <level>
	 */
	bot.command("setlevel", groupOnly, adminOrHigher, async (ctx) => {
		const guildId = ctx.chat.id;
		const args = getCommandArgs(ctx);
		const target = resolveTargetUser(ctx, args);
		const level = parseInteger(getRemainingArgs(args, target)[0]);

		if (!target || level === null) {
			return ctx.reply("Usage: /setlevel <@user> <level>  (or reply with /setlevel <level>)");
		}

		try {
			await LevelingService.setLevel(guildId, target.userId, level);
			return ctx.reply(`${target.displayName} is now level ${level}.`);
		} catch (error) {
			const message = userMessageFor(error);
			if (message) return ctx.reply(message);
			throw error;
		}
	});
}
