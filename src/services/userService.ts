/** User management service - user records and permission tiers */

import { execute, get, query } from "../database";
import type { User, UserRole } from "../types";
import { StructuredLogger } from "../utils/logger";

/**
 * Create new user with all required fields
 * Returns null if user already exists
 */
export const createUser = (
	userId: number,
	username: string | null,
	role: UserRole = "member",
	source: string = "unknown",
): User | null => {
	const existing = get<User>("SELECT id FROM users WHERE id = ?", [userId]);

	if (existing) {
		return null; // User already exists
	}

	const now = Math.floor(Date.now() / 1000);
	execute(
		"INSERT INTO users (id, username, role, created_at, updated_at) VALUES (?, ?, ?, ?, ?)",
		[userId, username, role, now, now],
	);

	StructuredLogger.logUserAction("User created", {
		userId,
		username: username ?? undefined,
		role,
		operation: "user_created",
		source,
	});

	return getUserById(userId);
};

/**
 * Ensure user exists in database, create if missing
 * Primary function used by middleware/handlers (synchronous by design)
 *
 * Behavior:
 * - User doesn't exist: Creates with default role 'member'
 * - User exists: Updates username (Telegram usernames are mutable)
 */
export const ensureUserExists = (
	userId: number,
	username: string | null,
): void => {
	const existing = get<User>("SELECT id, username FROM users WHERE id = ?", [
		userId,
	]);

	if (!existing) {
		createUser(userId, username, "member", "ensure_exists");
	} else if (username && existing.username !== username) {
		execute("UPDATE users SET username = ?, updated_at = ? WHERE id = ?", [
			username,
			Math.floor(Date.now() / 1000),
			userId,
		]);
	}
};

/** Case-insensitive username lookup, with or without the leading @ */
export const getUserIdByUsername = (username: string): number | null => {
	const clean = username.startsWith("@") ? username.slice(1) : username;
	const user = get<User>(
		"SELECT id FROM users WHERE LOWER(username) = LOWER(?)",
		[clean],
	);
	return user ? user.id : null;
};

export const getUserById = (userId: number): User | null =>
	get<User>("SELECT * FROM users WHERE id = ?", [userId]) ?? null;

export const setUserRole = (userId: number, role: UserRole): void => {
	execute("UPDATE users SET role = ?, updated_at = ? WHERE id = ?", [
		role,
		Math.floor(Date.now() / 1000),
		userId,
	]);
};

/** Display names for a batch of users, keyed by id */
export const getUsernames = (userIds: readonly number[]): Map<number, string> => {
	if (userIds.length === 0) return new Map();

	const placeholders = userIds.map(() => "?").join(", ");
	const rows = query<Pick<User, "id" | "username">>(
		`SELECT id, username FROM users WHERE id IN (${placeholders})`,
		[...userIds],
	);

	const names = new Map<number, string>();
	for (const row of rows) {
		if (row.username) names.set(row.id, row.username);
	}
	return names;
};
