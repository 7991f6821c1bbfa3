/**
 * Integration tests for the role commands
 *
 * Updates go through a real Telegraf pipeline: command matching, the
 * permission middleware and the handlers, against the in-memory database.
 * Only the outgoing Telegram calls are stubbed.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { Telegraf, Telegram } from 'telegraf';
import type { Message, Update, UserFromGetMe } from 'telegraf/types';
import { registerRoleHandlers } from '../../src/handlers/roles';
import { MemberRoleService } from '../../src/services/memberRoleService';
import { getUserById } from '../../src/services/userService';
import {
  cleanTestDatabase,
  createTestGuild,
  createTestUser,
  initTestDatabase,
  TEST_GUILD_ID,
} from '../helpers/testDatabase';

const G = TEST_GUILD_ID;
const OWNER_ID = 1000;

const botInfo: UserFromGetMe = {
  id: 999000,
  is_bot: true,
  first_name: 'Test Bot',
  username: 'test_bot',
  can_join_groups: true,
  can_read_all_group_messages: false,
  supports_inline_queries: false,
};

const sent: Message.TextMessage = {
  message_id: 900,
  date: 1_700_000_000,
  chat: { id: G, type: 'supergroup', title: 'Test Group' },
  text: 'sent',
};

let updateId = 0;

const commandUpdate = (fromId: number, text: string, chatType: 'supergroup' | 'private' = 'supergroup'): Update => {
  updateId += 1;
  const command = text.split(' ')[0];
  return {
    update_id: updateId,
    message: {
      message_id: updateId,
      date: 1_700_000_000,
      chat:
        chatType === 'private'
          ? { id: fromId, type: 'private', first_name: 'Tester' }
          : { id: G, type: 'supergroup', title: 'Test Group' },
      from: { id: fromId, is_bot: false, first_name: 'Tester' },
      text,
      entities: [{ type: 'bot_command', offset: 0, length: command.length }],
    },
  };
};

describe('Role commands', () => {
  let bot: Telegraf;

  /** Sends a command and returns the bot's replies as plain text */
  const run = async (fromId: number, text: string, chatType?: 'supergroup' | 'private'): Promise<string[]> => {
    const sendMessage = vi.mocked(Telegram.prototype.sendMessage);
    sendMessage.mockClear();
    await bot.handleUpdate(commandUpdate(fromId, text, chatType));
    return sendMessage.mock.calls.map(([, body]) => (typeof body === 'string' ? body : body.text));
  };

  beforeAll(() => {
    initTestDatabase();
  });

  beforeEach(() => {
    cleanTestDatabase();
    createTestGuild();
    createTestUser(7, 'alice', 'admin');
    createTestUser(8, 'bob');

    vi.spyOn(Telegram.prototype, 'sendMessage').mockResolvedValue(sent);
    bot = new Telegraf('test-bot-token');
    bot.botInfo = botInfo;
    registerRoleHandlers(bot);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('admin management', () => {
    it('lets owners promote and demote admins', async () => {
      expect(await run(OWNER_ID, '/makeadmin @bob')).toEqual(['@bob is now an admin.']);
      expect(getUserById(8)?.role).toBe('admin');

      expect(await run(OWNER_ID, '/removeadmin @bob')).toEqual(['@bob is no longer an admin.']);
      expect(getUserById(8)?.role).toBe('member');
    });

    it('keeps admins from promoting', async () => {
      expect(await run(7, '/makeadmin @bob')).toEqual(['Only owners can use this command.']);
      expect(getUserById(8)?.role).toBe('member');
    });

    it('never demotes an owner', async () => {
      createTestUser(OWNER_ID, 'boss', 'owner');

      expect(await run(OWNER_ID, '/removeadmin @boss')).toEqual(['Owners cannot be demoted.']);
    });

    it('explains usage for unknown users', async () => {
      expect(await run(OWNER_ID, '/makeadmin @ghost')).toEqual([
        'Usage: /makeadmin <@user> (or reply to their message)',
      ]);
    });

    it('lists owners before admins', async () => {
      createTestUser(OWNER_ID, 'boss', 'owner');

      expect(await run(7, '/listadmins')).toEqual(['Bot staff\nowner: @boss\nadmin: @alice']);
    });
  });

  describe('group roles', () => {
    it('creates roles and refuses duplicates', async () => {
      expect(await run(7, '/createrole VIP Club')).toEqual(['Role "VIP Club" created.']);
      expect(await run(7, '/createrole vip club')).toEqual(['Role "vip club" already exists']);
      expect(MemberRoleService.listRoles(G).map((role) => role.name)).toEqual(['VIP Club']);
    });

    it('keeps members from managing roles', async () => {
      expect(await run(8, '/createrole VIP')).toEqual(['You do not have permission to use this command.']);
      expect(MemberRoleService.listRoles(G)).toEqual([]);
    });

    it('gives and takes roles', async () => {
      await run(7, '/createrole VIP');

      expect(await run(7, '/giverole @bob VIP')).toEqual(['@bob now has "VIP".']);
      expect(await run(7, '/giverole @bob vip')).toEqual(['@bob already has "VIP".']);
      expect(await run(8, '/myroles')).toEqual(['Your roles: VIP']);
      expect(await run(8, '/roles')).toEqual(['Roles\nVIP (1)']);

      expect(await run(7, '/takerole @bob VIP')).toEqual(['@bob no longer has "VIP".']);
      expect(await run(7, '/takerole @bob VIP')).toEqual(['@bob does not have "VIP".']);
      expect(await run(8, '/myroles')).toEqual(['You hold no roles here.']);
    });

    it('deletes roles by name', async () => {
      await run(7, '/createrole VIP');

      expect(await run(7, '/deleterole Nope')).toEqual(['Unknown role "Nope".']);
      expect(await run(7, '/deleterole vip')).toEqual(['Role "VIP" deleted.']);
      expect(await run(8, '/roles')).toEqual([
        'This group has no roles yet. Admins can add one with /createrole <name>.',
      ]);
    });

    it('only works in groups', async () => {
      expect(await run(8, '/roles', 'private')).toEqual(['This command only works in groups.']);
    });
  });
});
