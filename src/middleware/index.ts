/** User and guild registration, chat scope and permission control middleware */

import type { Context, MiddlewareFn } from 'telegraf';
import { GuildService } from '../services/guildService';
import { ensureUserExists } from '../services/userService';
import { isGroupChat } from '../utils/commandHelper';
import { logger } from '../utils/logger';
import { canHostGiveaways, isAdminOrHigher, isOwner } from '../utils/roles';

/**
 * Middleware that keeps the users and guilds tables in step with Telegram.
 * Every sender is registered as a user; every group or supergroup the bot
 * sees is registered as a guild, so leveling and giveaway rows always have a
 * guild to belong to.
 *
 * @example
 * ```typescript
 * bot.use(userManagementMiddleware);
 * ```
 */
export const userManagementMiddleware: MiddlewareFn<Context> = async (ctx, next) => {
  if (!ctx.from || !ctx.from.id) {
    logger.warn('Request received without user information');
    return next();
  }

  const userId = ctx.from.id;
  const username = ctx.from.username ?? null;

  try {
    ensureUserExists(userId, username);

    if (ctx.chat && isGroupChat(ctx)) {
      const title = 'title' in ctx.chat ? ctx.chat.title : null;
      GuildService.ensureGuild(ctx.chat.id, title);
    }

    logger.debug('User initialized', { userId, username, chatId: ctx.chat?.id });
  } catch (error) {
    logger.error('Error loading user', { userId, username, error });
    await ctx.reply('Error processing request');
    return;
  }

  return next();
};

/**
 * Restricts a command to group chats, where guild features live.
 */
export const groupOnly: MiddlewareFn<Context> = (ctx, next) => {
  if (!isGroupChat(ctx)) {
    return ctx.reply('This command only works in groups.');
  }
  return next();
};

/**
 * Middleware that restricts command access to bot owners (config or database).
 *
 * @example
 * bot.command('setadmin', ownerOnly, (ctx) => {
 *   // Only owners can reach this handler
 * });
 */
export const ownerOnly: MiddlewareFn<Context> = (ctx, next) => {
  const userId = ctx.from?.id;
  if (!userId) {
    return ctx.reply('User ID not found.');
  }

  if (isOwner(userId)) {
    return next();
  }

  return ctx.reply('Only owners can use this command.');
};

/**
 * Middleware that restricts command access to admins or higher roles (admin, owner).
 *
 * @example
 * bot.command('levelconfig', adminOrHigher, (ctx) => {
 *   // Only admins and owners can reach this handler
 * });
 */
export const adminOrHigher: MiddlewareFn<Context> = (ctx, next) => {
  const userId = ctx.from?.id;
  if (!userId) {
    return ctx.reply('User ID not found.');
  }

  if (isAdminOrHigher(userId)) {
    return next();
  }

  return ctx.reply('You do not have permission to use this command.');
};

/**
 * Admins, or members holding the guild's giveaway role.
 */
export const giveawayHost: MiddlewareFn<Context> = (ctx, next) => {
  const userId = ctx.from?.id;
  if (!userId || !ctx.chat) {
    return ctx.reply('User ID not found.');
  }

  if (canHostGiveaways(ctx.chat.id, userId)) {
    return next();
  }

  return ctx.reply('You need to be an admin or hold the giveaway role to host giveaways.');
};
