/**
 * Main entry point for the engagement bot.
 * Initializes the Telegram bot instance, database, timers and all command handlers.
 * Manages periodic cleanup tasks and graceful shutdown.
 *
 * @module bot
 */

import { Telegraf } from "telegraf";
import { registerGiveawayCommands } from "./commands/giveaway";
import { registerHelpCommand } from "./commands/help";
import { registerLevelingCommands } from "./commands/leveling";
import { registerRankCardCommands } from "./commands/rankCard";
import { config, validateConfig } from "./config";
import { closeDb, initDb } from "./database";
import { registerCallbackHandlers } from "./handlers/callbacks";
import { registerMemberEventHandlers } from "./handlers/memberEvents";
import { registerNotificationHandlers } from "./handlers/notifications";
import { registerRoleHandlers } from "./handlers/roles";
import { activityTrackerMiddleware } from "./middleware/activityTracker";
import { userManagementMiddleware } from "./middleware/index";
import { GiveawayService } from "./services/giveawayService";
import { LevelingService } from "./services/levelingService";
import { TimerService } from "./services/timerService";
import { createUser, getUserById, setUserRole } from "./services/userService";
import type { UserRole } from "./types";
import { logger } from "./utils/logger";

/**
 * Makes sure every owner and admin named in config has a users row with
 * the matching role.
 */
function seedConfiguredStaff(): void {
	const staff: Array<[number[], UserRole]> = [
		[config.ownerIds, "owner"],
		[config.adminIds, "admin"],
	];

	for (const [ids, role] of staff) {
		for (const id of ids) {
			const existing = getUserById(id);
			if (!existing) {
				createUser(id, null, role, "config_initialization");
				logger.info(`Created ${role} from config: ${id}`);
			} else if (existing.role !== role && existing.role !== "owner") {
				setUserRole(id, role);
				logger.info(`Updated existing user to ${role} role: ${id}`);
			}
		}
	}
}

/**
 * Main initialization and startup function.
 *
 * Performs the following initialization sequence:
 * 1. Validates configuration from environment variables
 * 2. Initializes SQLite database and creates tables
 * 3. Seeds configured owners and admins
 * 4. Creates Telegraf bot instance and registers middleware and handlers
 * 5. Starts the timer service that ends giveaways
 * 6. Sets up periodic cleanup of idle cooldown windows
 * 7. Configures graceful shutdown handlers
 * 8. Launches the bot
 */
async function main() {
	try {
		validateConfig();
		initDb();
		seedConfiguredStaff();

		const bot = new Telegraf(config.botToken);

		// Order matters: users and guilds are recorded before anything reads them
		bot.use(userManagementMiddleware);
		bot.use(activityTrackerMiddleware);

		registerHelpCommand(bot);
		registerRoleHandlers(bot);
		registerLevelingCommands(bot);
		registerRankCardCommands(bot);
		registerGiveawayCommands(bot);
		registerMemberEventHandlers(bot);
		registerCallbackHandlers(bot); // Inline keyboard callback handlers
		const detachNotifications = registerNotificationHandlers(bot);

		bot.catch((err, ctx) => {
			logger.error("Bot error", { error: err, update: ctx.update });
		});

		// Giveaways left running by a previous run end on the first poll
		GiveawayService.initialize();
		TimerService.start(config.timerPollIntervalMs);

		const cooldownSweep = setInterval(() => {
			const removed = LevelingService.cooldowns.sweep(Date.now());
			if (removed > 0) {
				logger.debug(`Swept ${removed} idle cooldown window(s)`);
			}
		}, config.cooldownSweepIntervalMs);

		const shutdown = (signal: string) => {
			logger.info(`Received ${signal}, shutting down`);
			TimerService.stop();
			clearInterval(cooldownSweep);
			detachNotifications();
			bot.stop(signal);
			closeDb();
		};
		process.once("SIGINT", () => shutdown("SIGINT"));
		process.once("SIGTERM", () => shutdown("SIGTERM"));

		await bot.launch(() => {
			logger.info("Bot started successfully");
		});
	} catch (error) {
		logger.error("Failed to start bot", { error });
		process.exit(1);
	}
}

void main();
