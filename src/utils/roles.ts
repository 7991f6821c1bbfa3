/** Role checking and authorization utilities for the bot's permission tiers */

import { config } from '../config';
import { get } from '../database';
import { GuildService } from '../services/guildService';
import { MemberRoleService } from '../services/memberRoleService';
import type { User, UserRole } from '../types';

/**
 * Check if user has specific role (exact match, not hierarchy-aware)
 * For hierarchy checks, use isAdminOrHigher
 */
export const hasRole = (userId: number, role: UserRole): boolean => {
  const user = get<User>('SELECT role FROM users WHERE id = ?', [userId]);
  return user?.role === role;
};

/** Owners come from config or the users table */
export const isOwner = (userId: number): boolean =>
  config.ownerIds.includes(userId) || hasRole(userId, 'owner');

/**
 * Role hierarchy: owner > admin > member
 */
export const isAdminOrHigher = (userId: number): boolean =>
  isOwner(userId) || config.adminIds.includes(userId) || hasRole(userId, 'admin');

/**
 * Giveaways may be hosted by admins, or by members holding the guild's
 * giveaway role when one is configured.
 */
export const canHostGiveaways = (guildId: number, userId: number): boolean => {
  if (isAdminOrHigher(userId)) return true;

  const giveawayRoleId = GuildService.getGuild(guildId)?.giveaway_role_id;
  if (giveawayRoleId === null || giveawayRoleId === undefined) return false;

  return MemberRoleService.getRoleIds(guildId, userId).includes(giveawayRoleId);
};
