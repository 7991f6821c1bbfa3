/**
 * Database module for the engagement bot.
 * Provides SQLite database connection, typed query functions, and schema initialization.
 * Uses better-sqlite3 for synchronous database operations with high performance.
 *
 * @module database
 */

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { config } from "./config";
import { logger } from "./utils/logger";

if (config.databasePath !== ":memory:") {
	const dataDir = dirname(config.databasePath);
	if (!existsSync(dataDir)) {
		mkdirSync(dataDir, { recursive: true });
	}
}

/**
 * SQLite database instance.
 * Configured with foreign key enforcement enabled, which every cascade in the
 * schema below depends on.
 */
const db = new Database(config.databasePath);

db.exec("PRAGMA foreign_keys = ON");

/**
 * Executes a SELECT query and returns all matching rows as typed objects.
 *
 * @template T - The type of objects expected in the result set
 * @param sql - The SQL query string (supports parameterized queries)
 * @param params - Array of parameters to bind to the query
 * @returns Array of typed result objects
 * @throws {Error} If the query fails to execute
 *
 * @example
 * ```typescript
 * const rows = query<LevelRow>('SELECT * FROM levels WHERE guild_id = ?', [guildId]);
 * ```
 */
export const query = <T>(sql: string, params: unknown[] = []): T[] => {
	try {
		const stmt = db.prepare(sql);
		return stmt.all(params) as T[];
	} catch (error) {
		logger.error(`Database query failed: ${sql}`, error);
		throw error;
	}
};

/**
 * Executes an INSERT, UPDATE, or DELETE statement.
 *
 * @param sql - The SQL statement string (supports parameterized statements)
 * @param params - Array of parameters to bind to the statement
 * @returns RunResult object containing changes count and lastInsertRowid
 * @throws {Error} If the statement fails to execute
 *
 * @example
 * ```typescript
 * const result = execute('DELETE FROM giveaways WHERE timer_id = ?', [timerId]);
 * if (result.changes === 0) {
 *   // someone else already removed it
 * }
 * ```
 */
export const execute = (
	sql: string,
	params: unknown[] = [],
): Database.RunResult => {
	try {
		const stmt = db.prepare(sql);
		return stmt.run(params);
	} catch (error) {
		logger.error(`Database execution failed: ${sql}`, error);
		throw error;
	}
};

/**
 * Executes a SELECT query and returns a single row as a typed object.
 * Returns undefined if no rows match.
 *
 * @template T - The type of object expected in the result
 * @param sql - The SQL query string (supports parameterized queries)
 * @param params - Array of parameters to bind to the query
 * @returns Single typed result object or undefined if no match
 * @throws {Error} If the query fails to execute
 */
export const get = <T>(sql: string, params: unknown[] = []): T | undefined => {
	try {
		const stmt = db.prepare(sql);
		return stmt.get(params) as T | undefined;
	} catch (error) {
		logger.error(`Database get failed: ${sql}`, error);
		throw error;
	}
};

/**
 * Runs `fn` inside a single SQLite transaction.
 * Everything `fn` writes is committed together, or rolled back if it throws.
 * `fn` must be synchronous; better-sqlite3 transactions cannot span an await.
 *
 * @example
 * ```typescript
 * const claimed = transaction(() => {
 *   const row = get<GiveawayRow>('SELECT * FROM giveaways WHERE timer_id = ?', [id]);
 *   execute('DELETE FROM giveaways WHERE timer_id = ?', [id]);
 *   return row;
 * });
 * ```
 */
export const transaction = <T>(fn: () => T): T => db.transaction(fn)();

/**
 * Closes the database connection. Used on shutdown and by one-off scripts.
 */
export const closeDb = (): void => {
	db.close();
};

/**
 * Initializes the database schema by creating all required tables and indexes.
 *
 * Creates the following tables:
 * - users: Bot-level permission tier per Telegram user
 * - guilds: One row per group chat the bot serves
 * - level_config: Scalar leveling settings per guild
 * - level_up_messages: Per-level overrides of the level-up template
 * - level_blacklist: Roles/channels/users that never gain XP
 * - level_roles: Reward role per level
 * - level_multipliers: XP multipliers per role or channel
 * - levels: Per-member level and XP (remainder within the current level)
 * - rank_cards: Per-user rank card appearance
 * - guild_roles / member_roles: Bot-managed roles and their holders
 * - timers: One-shot scheduled events
 * - giveaways / giveaway_role_requirements / giveaway_entrants
 *
 * Safe to call multiple times - uses IF NOT EXISTS clauses.
 *
 * @throws {Error} If table creation fails
 */
export const initDb = (): void => {
	db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY,
      username TEXT,
      role TEXT NOT NULL DEFAULT 'member' CHECK(role IN ('owner', 'admin', 'member')),
      created_at INTEGER DEFAULT (strftime('%s', 'now')),
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

	db.exec(`
    CREATE TABLE IF NOT EXISTS guilds (
      guild_id INTEGER PRIMARY KEY,
      title TEXT,
      giveaway_role_id INTEGER,
      created_at INTEGER DEFAULT (strftime('%s', 'now'))
    );
  `);

	// Leveling configuration
	db.exec(`
    CREATE TABLE IF NOT EXISTS level_config (
      guild_id INTEGER PRIMARY KEY,
      module_enabled INTEGER NOT NULL DEFAULT 0,
      role_stack INTEGER NOT NULL DEFAULT 1,
      base INTEGER NOT NULL DEFAULT 100,
      factor REAL NOT NULL DEFAULT 1.3,
      min_gain INTEGER NOT NULL DEFAULT 8,
      max_gain INTEGER NOT NULL DEFAULT 15,
      cooldown_rate INTEGER NOT NULL DEFAULT 1,
      cooldown_per INTEGER NOT NULL DEFAULT 40,
      level_up_message TEXT NOT NULL DEFAULT '{user.mention}, you just leveled up to level {level}!',
      level_up_channel_mode TEXT NOT NULL DEFAULT 'source'
        CHECK(level_up_channel_mode IN ('suppress', 'source', 'dm', 'channel')),
      level_up_channel_id INTEGER,
      reset_on_leave INTEGER NOT NULL DEFAULT 0,
      updated_at INTEGER DEFAULT (strftime('%s', 'now')),
      FOREIGN KEY (guild_id) REFERENCES guilds(guild_id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS level_up_messages (
      guild_id INTEGER NOT NULL,
      level INTEGER NOT NULL,
      template TEXT NOT NULL,
      PRIMARY KEY (guild_id, level),
      FOREIGN KEY (guild_id) REFERENCES guilds(guild_id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS level_blacklist (
      guild_id INTEGER NOT NULL,
      kind TEXT NOT NULL CHECK(kind IN ('role', 'channel', 'user')),
      target_id INTEGER NOT NULL,
      PRIMARY KEY (guild_id, kind, target_id),
      FOREIGN KEY (guild_id) REFERENCES guilds(guild_id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS level_roles (
      guild_id INTEGER NOT NULL,
      level INTEGER NOT NULL,
      role_id INTEGER NOT NULL,
      PRIMARY KEY (guild_id, level),
      FOREIGN KEY (guild_id) REFERENCES guilds(guild_id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS level_multipliers (
      guild_id INTEGER NOT NULL,
      kind TEXT NOT NULL CHECK(kind IN ('role', 'channel')),
      target_id INTEGER NOT NULL,
      multiplier REAL NOT NULL CHECK(multiplier > 0),
      PRIMARY KEY (guild_id, kind, target_id),
      FOREIGN KEY (guild_id) REFERENCES guilds(guild_id) ON DELETE CASCADE
    );
  `);

	// Member progress
	db.exec(`
    CREATE TABLE IF NOT EXISTS levels (
      guild_id INTEGER NOT NULL,
      user_id INTEGER NOT NULL,
      level INTEGER NOT NULL DEFAULT 0 CHECK(level >= 0),
      xp INTEGER NOT NULL DEFAULT 0 CHECK(xp >= 0),
      PRIMARY KEY (guild_id, user_id),
      FOREIGN KEY (guild_id) REFERENCES guilds(guild_id) ON DELETE CASCADE
    );
  `);

	// Rank card appearance (global per user)
	db.exec(`
    CREATE TABLE IF NOT EXISTS rank_cards (
      user_id INTEGER PRIMARY KEY,
      background_color INTEGER NOT NULL DEFAULT 1644825,
      background_url TEXT,
      background_blur INTEGER NOT NULL DEFAULT 0,
      background_alpha REAL NOT NULL DEFAULT 1.0,
      font INTEGER NOT NULL DEFAULT 0,
      primary_color INTEGER NOT NULL DEFAULT 12434877,
      secondary_color INTEGER NOT NULL DEFAULT 9671571,
      tertiary_color INTEGER NOT NULL DEFAULT 7064552,
      overlay_color INTEGER NOT NULL DEFAULT 15988735,
      overlay_alpha REAL NOT NULL DEFAULT 0.15,
      overlay_border_radius INTEGER NOT NULL DEFAULT 52,
      avatar_border_color INTEGER NOT NULL DEFAULT 16777215,
      avatar_border_alpha REAL NOT NULL DEFAULT 0.09,
      avatar_border_radius INTEGER NOT NULL DEFAULT 103,
      progress_bar_color INTEGER NOT NULL DEFAULT 16777215,
      progress_bar_alpha REAL NOT NULL DEFAULT 0.16
    );
  `);

	// Bot-managed roles
	db.exec(`
    CREATE TABLE IF NOT EXISTS guild_roles (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      guild_id INTEGER NOT NULL,
      name TEXT NOT NULL COLLATE NOCASE,
      created_at INTEGER DEFAULT (strftime('%s', 'now')),
      UNIQUE(guild_id, name),
      FOREIGN KEY (guild_id) REFERENCES guilds(guild_id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS member_roles (
      guild_id INTEGER NOT NULL,
      user_id INTEGER NOT NULL,
      role_id INTEGER NOT NULL,
      granted_at INTEGER DEFAULT (strftime('%s', 'now')),
      PRIMARY KEY (guild_id, user_id, role_id),
      FOREIGN KEY (role_id) REFERENCES guild_roles(id) ON DELETE CASCADE
    );
  `);

	// Timers and giveaways
	db.exec(`
    CREATE TABLE IF NOT EXISTS timers (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      event TEXT NOT NULL,
      payload TEXT,
      expires_at INTEGER NOT NULL,
      created_at INTEGER NOT NULL,
      fired_at INTEGER
    );

    CREATE TABLE IF NOT EXISTS giveaways (
      timer_id INTEGER PRIMARY KEY,
      guild_id INTEGER NOT NULL,
      channel_id INTEGER NOT NULL,
      message_id INTEGER NOT NULL,
      host_id INTEGER NOT NULL,
      level_requirement INTEGER NOT NULL DEFAULT 0,
      prize TEXT NOT NULL,
      description TEXT,
      winners INTEGER NOT NULL CHECK(winners >= 1),
      ends_at INTEGER NOT NULL,
      FOREIGN KEY (timer_id) REFERENCES timers(id) ON DELETE CASCADE,
      FOREIGN KEY (guild_id) REFERENCES guilds(guild_id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS giveaway_role_requirements (
      giveaway_id INTEGER NOT NULL,
      role_id INTEGER NOT NULL,
      PRIMARY KEY (giveaway_id, role_id),
      FOREIGN KEY (giveaway_id) REFERENCES giveaways(timer_id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS giveaway_entrants (
      giveaway_id INTEGER NOT NULL,
      user_id INTEGER NOT NULL,
      entered_at INTEGER DEFAULT (strftime('%s', 'now')),
      PRIMARY KEY (giveaway_id, user_id),
      FOREIGN KEY (giveaway_id) REFERENCES giveaways(timer_id) ON DELETE CASCADE
    );
  `);

	db.exec(`
    CREATE INDEX IF NOT EXISTS idx_users_username ON users(username);
    CREATE INDEX IF NOT EXISTS idx_levels_rank ON levels(guild_id, level DESC, xp DESC);
    CREATE INDEX IF NOT EXISTS idx_member_roles_member ON member_roles(guild_id, user_id);
    CREATE INDEX IF NOT EXISTS idx_timers_due ON timers(expires_at) WHERE fired_at IS NULL;
    CREATE INDEX IF NOT EXISTS idx_giveaways_guild ON giveaways(guild_id);
    CREATE INDEX IF NOT EXISTS idx_giveaways_message ON giveaways(guild_id, message_id);
  `);

	logger.info("Database initialized successfully");
};
