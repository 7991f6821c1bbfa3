/**
 * Configuration module for the engagement bot.
 * Loads environment variables and provides typed configuration object.
 * Validates required configuration values on startup.
 *
 * @module config
 */

import { resolve } from "node:path";
import * as dotenv from "dotenv";
import { logger } from "./utils/logger";

// Load environment variables from .env file
dotenv.config({ path: resolve(__dirname, "../.env") });

/**
 * Configuration interface defining all bot settings.
 *
 * @interface Config
 */
interface Config {
	/** Telegram bot API token from BotFather */
	botToken: string;

	/** Telegram user ID(s) of the bot owner(s) - supports multiple via comma-separated list */
	ownerIds: number[];

	/** Telegram user ID(s) of pre-configured admin(s) - supports multiple via comma-separated list */
	adminIds: number[];

	/** File path to SQLite database (":memory:" for an in-process database) */
	databasePath: string;

	/** How often due timers are checked, in milliseconds */
	timerPollIntervalMs: number;

	/** How often idle cooldown windows are swept, in milliseconds */
	cooldownSweepIntervalMs: number;
}

const parseIdList = (value: string | undefined): number[] =>
	(value || "")
		.split(",")
		.map((id) => parseInt(id.trim(), 10))
		.filter((id) => !Number.isNaN(id));

/**
 * Main configuration object populated from environment variables.
 * Falls back to default values where appropriate.
 */
export const config: Config = {
	botToken: process.env.BOT_TOKEN || "",
	ownerIds: parseIdList(process.env.OWNER_ID),
	adminIds: parseIdList(process.env.ADMIN_ID),
	databasePath: process.env.DATABASE_PATH || "./data/bot.db",
	timerPollIntervalMs: parseInt(
		process.env.TIMER_POLL_INTERVAL_MS || "5000",
		10,
	),
	cooldownSweepIntervalMs: 10 * 60 * 1000, // 10 minutes
};

/**
 * Validates that all required configuration values are present and valid.
 * Called at bot startup to ensure proper configuration before initialization.
 *
 * @throws {Error} If BOT_TOKEN is not set
 * @throws {Error} If OWNER_ID is not set
 * @throws {Error} If TIMER_POLL_INTERVAL_MS is not a positive number
 */
export function validateConfig(): void {
	if (!config.botToken) {
		throw new Error("BOT_TOKEN is required in environment variables");
	}
	if (!config.ownerIds || config.ownerIds.length === 0) {
		throw new Error(
			"OWNER_ID is required in environment variables (comma-separated for multiple owners)",
		);
	}
	if (
		Number.isNaN(config.timerPollIntervalMs) ||
		config.timerPollIntervalMs <= 0
	) {
		throw new Error("TIMER_POLL_INTERVAL_MS must be a positive number");
	}

	if (config.adminIds.length === 0) {
		logger.warn(
			"No ADMIN_ID configured - only owners can manage leveling and giveaways until admins are added",
		);
	}
}
