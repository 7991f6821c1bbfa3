/** Database entity types - snake_case matches SQLite columns */

export type UserRole = "owner" | "admin" | "member";

export interface User {
	id: number; // Telegram user ID
	username: string | null;
	role: UserRole;
	created_at: number;
	updated_at: number;
}

export interface GuildRow {
	guild_id: number; // Telegram group chat ID
	title: string | null;
	giveaway_role_id: number | null;
	created_at: number;
}

export interface LevelConfigRow {
	guild_id: number;
	module_enabled: number; // 0/1
	role_stack: number; // 0/1
	base: number;
	factor: number;
	min_gain: number;
	max_gain: number;
	cooldown_rate: number;
	cooldown_per: number; // seconds
	level_up_message: string;
	level_up_channel_mode: "suppress" | "source" | "dm" | "channel";
	level_up_channel_id: number | null;
	reset_on_leave: number; // 0/1
	updated_at: number;
}

export interface LevelRow {
	guild_id: number;
	user_id: number;
	level: number;
	xp: number; // remainder within the current level
}

export interface RankedLevelRow extends LevelRow {
	rank: number;
}

export interface GuildRoleRow {
	id: number;
	guild_id: number;
	name: string;
	created_at: number;
}

export interface TimerRow {
	id: number;
	event: string;
	payload: string | null;
	expires_at: number; // ms
	created_at: number; // ms
	fired_at: number | null; // ms
}

export interface GiveawayRow {
	timer_id: number;
	guild_id: number;
	channel_id: number;
	message_id: number;
	host_id: number;
	level_requirement: number;
	prize: string;
	description: string | null;
	winners: number;
	ends_at: number; // ms
}

export interface RankCardRow {
	user_id: number;
	background_color: number;
	background_url: string | null;
	background_blur: number;
	background_alpha: number;
	font: number;
	primary_color: number;
	secondary_color: number;
	tertiary_color: number;
	overlay_color: number;
	overlay_alpha: number;
	overlay_border_radius: number;
	avatar_border_color: number;
	avatar_border_alpha: number;
	avatar_border_radius: number;
	progress_bar_color: number;
	progress_bar_alpha: number;
}
