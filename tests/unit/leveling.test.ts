import { describe, it, expect, afterEach, beforeAll, beforeEach, vi } from 'vitest';

/**
 * Tests for the leveling engine:
 * - Level curve arithmetic
 * - Multipliers, reward role resolution and message rendering
 * - recordActivity guards, cooldown and level-up events
 * - Admin adjustments, rank and leaderboard
 */

import { engagementEvents } from '../../src/services/engagementEvents';
import {
  advanceLevels,
  clampGain,
  computeMultiplier,
  LevelingService,
  type LevelUp,
  MAX_GAIN_PER_EVENT,
  renderLevelUpMessage,
  resolveRoleRewards,
  retreatLevels,
  rewardRolesForLevel,
  rollXp,
  xpForLevel,
} from '../../src/services/levelingService';
import { DEFAULT_LEVEL_UP_MESSAGE, defaultLevelConfig } from '../../src/services/levelConfigService';
import { MemberRoleService } from '../../src/services/memberRoleService';
import { ValidationError } from '../../src/utils/errors';
import {
  cleanTestDatabase,
  createTestGuild,
  createTestRole,
  enableLeveling,
  initTestDatabase,
  TEST_GUILD_ID,
} from '../helpers/testDatabase';

const G = TEST_GUILD_ID;
const T0 = 1_700_000_000_000;

const activity = (userId: number, timestamp: number, extra: { channelId?: number; roleIds?: number[] } = {}) => ({
  guildId: G,
  userId,
  channelId: extra.channelId ?? G,
  roleIds: extra.roleIds ?? [],
  timestamp,
});

const captureLevelUps = (): LevelUp[] => {
  const seen: LevelUp[] = [];
  engagementEvents.on('levelUp', (levelUp) => {
    seen.push(levelUp);
  });
  return seen;
};

describe('Level curve', () => {
  describe('xpForLevel', () => {
    it('grows geometrically and floors the result', () => {
      expect(xpForLevel(0, 100, 1.3)).toBe(100);
      expect(xpForLevel(1, 100, 1.3)).toBe(130);
      expect(xpForLevel(2, 100, 1.3)).toBe(169);
      expect(xpForLevel(3, 100, 1.3)).toBe(219);
      expect(xpForLevel(4, 100, 2)).toBe(1600);
    });

    it('is strictly increasing while base * (factor - 1) >= 1', () => {
      for (let level = 0; level < 50; level++) {
        expect(xpForLevel(level + 1, 10, 1.1)).toBeGreaterThan(xpForLevel(level, 10, 1.1));
      }
    });
  });

  describe('advanceLevels', () => {
    it('stays on the level when the gain falls short', () => {
      expect(advanceLevels(0, 40, 50, 100, 1.3)).toEqual({ level: 0, xp: 90, reached: [] });
    });

    it('carries the remainder into the next level', () => {
      expect(advanceLevels(0, 90, 15, 100, 1.3)).toEqual({ level: 1, xp: 5, reached: [1] });
    });

    it('applies several level-ups from one gain in ascending order', () => {
      expect(advanceLevels(0, 0, 500, 100, 1.3)).toEqual({ level: 3, xp: 101, reached: [1, 2, 3] });
    });
  });

  describe('retreatLevels', () => {
    it('drops a level when XP goes negative', () => {
      expect(retreatLevels(2, 10, 50, 100, 1.3)).toEqual({ level: 1, xp: 90 });
    });

    it('never goes below level 0 and 0 XP', () => {
      expect(retreatLevels(1, 5, 1000, 100, 1.3)).toEqual({ level: 0, xp: 0 });
    });
  });
});

describe('Leveling helpers', () => {
  it('multiplies the channel multiplier by every held role multiplier', () => {
    const config = defaultLevelConfig();
    config.multiplierRoles.set(1, 1.5);
    config.multiplierRoles.set(2, 2);
    config.multiplierChannels.set(55, 2);

    expect(computeMultiplier(config, 55, [1])).toBe(3);
    expect(computeMultiplier(config, 56, [1, 2])).toBe(3);
    expect(computeMultiplier(config, 56, [1, 1])).toBe(1.5);
    expect(computeMultiplier(config, 56, [9])).toBe(1);
  });

  it('rolls within the inclusive range', () => {
    expect(rollXp(8, 15, (_min, maxExclusive) => maxExclusive - 1)).toBe(15);
    expect(rollXp(8, 15, (min) => min)).toBe(8);
    for (let i = 0; i < 200; i++) {
      const roll = rollXp(8, 15);
      expect(roll).toBeGreaterThanOrEqual(8);
      expect(roll).toBeLessThanOrEqual(15);
    }
  });

  it('keeps a multiplied roll between 1 and the per-event ceiling', () => {
    expect(MAX_GAIN_PER_EVENT).toBe(1_000_000);
    expect(clampGain(0)).toBe(1);
    expect(clampGain(42)).toBe(42);
    expect(clampGain(Number.POSITIVE_INFINITY)).toBe(1_000_000);
  });

  describe('resolveRoleRewards', () => {
    const levelRoles = new Map([
      [2, 10],
      [5, 20],
    ]);

    it('grants every earned role when stacking', () => {
      expect(resolveRoleRewards(levelRoles, true, [1, 2, 3, 4, 5], [])).toEqual({ grant: [10, 20], revoke: [] });
    });

    it('skips roles already held', () => {
      expect(resolveRoleRewards(levelRoles, true, [5], [20])).toEqual({ grant: [], revoke: [] });
    });

    it('keeps only the highest reward without stacking', () => {
      expect(resolveRoleRewards(levelRoles, false, [3, 4, 5], [10, 99])).toEqual({ grant: [20], revoke: [10] });
    });

    it('changes nothing when no reward level was reached', () => {
      expect(resolveRoleRewards(levelRoles, false, [3, 4], [10])).toEqual({ grant: [], revoke: [] });
    });
  });

  it('lists the reward roles a level is entitled to', () => {
    const levelRoles = new Map([
      [5, 20],
      [2, 10],
    ]);
    expect(rewardRolesForLevel(levelRoles, true, 6)).toEqual([10, 20]);
    expect(rewardRolesForLevel(levelRoles, false, 6)).toEqual([20]);
    expect(rewardRolesForLevel(levelRoles, true, 1)).toEqual([]);
  });

  it('fills every placeholder', () => {
    expect(
      renderLevelUpMessage('{user.mention} ({user.id}) reached {level}, {user.mention}!', {
        mention: '@sam',
        userId: 7,
        level: 3,
      }),
    ).toBe('@sam (7) reached 3, @sam!');
  });
});

describe('LevelingService', () => {
  beforeAll(() => {
    initTestDatabase();
  });

  beforeEach(() => {
    cleanTestDatabase();
    createTestGuild();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('recordActivity guards', () => {
    it('credits nothing while the module is disabled', async () => {
      const result = await LevelingService.recordActivity(activity(1, T0));

      expect(result).toEqual({ credited: false, reason: 'disabled' });
      expect(LevelingService.getRank(G, 1)).toBeNull();
    });

    it('ignores blacklisted users, channels and roles', async () => {
      const role = createTestRole('Muted');
      enableLeveling(G, 10, (draft) => {
        draft.blacklistedUsers.add(1);
        draft.blacklistedChannels.add(77);
        draft.blacklistedRoles.add(role.id);
      });

      expect(await LevelingService.recordActivity(activity(1, T0))).toEqual({
        credited: false,
        reason: 'blacklisted',
      });
      expect(await LevelingService.recordActivity(activity(2, T0, { channelId: 77 }))).toEqual({
        credited: false,
        reason: 'blacklisted',
      });
      expect(await LevelingService.recordActivity(activity(3, T0, { roleIds: [role.id] }))).toEqual({
        credited: false,
        reason: 'blacklisted',
      });
      expect(LevelingService.getLeaderboard(G)).toEqual([]);
    });

    it('credits at most `rate` events per window', async () => {
      enableLeveling(G, 10, (draft) => {
        draft.cooldownRate = 2;
        draft.cooldownPer = 60;
      });

      const credited: boolean[] = [];
      for (const offset of [0, 1000, 2000]) {
        credited.push((await LevelingService.recordActivity(activity(1, T0 + offset))).credited);
      }

      expect(credited).toEqual([true, true, false]);
      expect(LevelingService.getUserLevel(G, 1).xp).toBe(20);
    });

    it('credits again once the oldest hit leaves the window', async () => {
      enableLeveling(G, 10, (draft) => {
        draft.cooldownRate = 1;
        draft.cooldownPer = 60;
      });

      expect((await LevelingService.recordActivity(activity(1, T0))).credited).toBe(true);
      expect((await LevelingService.recordActivity(activity(1, T0 + 59_999))).credited).toBe(false);
      expect((await LevelingService.recordActivity(activity(1, T0 + 60_000))).credited).toBe(true);
    });

    it('keeps cooldowns separate per member', async () => {
      enableLeveling(G, 10);

      expect((await LevelingService.recordActivity(activity(1, T0))).credited).toBe(true);
      expect((await LevelingService.recordActivity(activity(2, T0))).credited).toBe(true);
    });

    it('serializes concurrent events for one member', async () => {
      enableLeveling(G, 10, (draft) => {
        draft.cooldownRate = 1;
      });

      const results = await Promise.all([
        LevelingService.recordActivity(activity(1, T0)),
        LevelingService.recordActivity(activity(1, T0)),
        LevelingService.recordActivity(activity(1, T0)),
      ]);

      expect(results.filter((r) => r.credited)).toHaveLength(1);
      expect(LevelingService.getUserLevel(G, 1).xp).toBe(10);
    });
  });

  describe('recordActivity crediting', () => {
    it('applies role and channel multipliers to the roll', async () => {
      const booster = createTestRole('Booster');
      enableLeveling(G, 10, (draft) => {
        draft.multiplierRoles.set(booster.id, 1.5);
        draft.multiplierChannels.set(55, 2);
      });

      const result = await LevelingService.recordActivity(
        activity(1, T0, { channelId: 55, roleIds: [booster.id] }),
      );

      expect(result).toMatchObject({ credited: true, xpGained: 30, level: 0, xp: 30, leveledUpTo: null });
    });

    it('credits at least 1 XP however small the multiplier', async () => {
      enableLeveling(G, 1, (draft) => {
        draft.multiplierChannels.set(55, 0.1);
      });

      const result = await LevelingService.recordActivity(activity(1, T0, { channelId: 55 }));

      expect(result).toMatchObject({ credited: true, xpGained: 1 });
    });

    it('caps the gain when stacked multipliers are at their limit', async () => {
      const first = createTestRole('First');
      const second = createTestRole('Second');
      enableLeveling(G, 10_000, (draft) => {
        draft.multiplierRoles.set(first.id, 100);
        draft.multiplierRoles.set(second.id, 100);
      });

      const result = await LevelingService.recordActivity(
        activity(1, T0, { roleIds: [first.id, second.id] }),
      );

      expect(result).toMatchObject({ credited: true, xpGained: 1_000_000 });
      const stored = LevelingService.getUserLevel(G, 1);
      expect(Number.isFinite(stored.xp)).toBe(true);
      expect(stored.level).toBeGreaterThan(0);
    });

    it('gives the cooldown slot back when the write fails', async () => {
      enableLeveling(G, 10);
      vi.spyOn(MemberRoleService, 'getRoleIds').mockImplementationOnce(() => {
        throw new Error('disk I/O error');
      });

      await expect(LevelingService.recordActivity(activity(1, T0))).rejects.toThrow('disk I/O error');
      expect(LevelingService.getUserLevel(G, 1)).toMatchObject({ level: 0, xp: 0 });

      const retry = await LevelingService.recordActivity(activity(1, T0 + 1_000));

      expect(retry).toMatchObject({ credited: true, xpGained: 10, xp: 10 });
    });

    it('emits one levelUp per level reached, lowest first', async () => {
      enableLeveling(G, 700, (draft) => {
        draft.factor = 2;
      });
      const levelUps = captureLevelUps();

      const result = await LevelingService.recordActivity(activity(1, T0, { channelId: 55 }));

      expect(result).toMatchObject({ credited: true, level: 3, xp: 0, leveledUpTo: 3 });
      expect(levelUps.map((l) => l.level)).toEqual([1, 2, 3]);
      expect(levelUps[0]).toEqual({
        guildId: G,
        userId: 1,
        level: 1,
        rewardRoleId: null,
        template: DEFAULT_LEVEL_UP_MESSAGE,
        destination: { kind: 'source', channelId: 55 },
      });
    });

    it('uses per-level messages and the configured destination', async () => {
      enableLeveling(G, 300, (draft) => {
        draft.factor = 2;
        draft.specialLevelUpMessages.set(2, 'Level two, {user.mention}!');
        draft.levelUpChannel = { kind: 'channel', channelId: 88 };
      });
      const levelUps = captureLevelUps();

      await LevelingService.recordActivity(activity(1, T0));

      expect(levelUps.map((l) => [l.level, l.template])).toEqual([
        [1, DEFAULT_LEVEL_UP_MESSAGE],
        [2, 'Level two, {user.mention}!'],
      ]);
      expect(levelUps[1].destination).toEqual({ kind: 'channel', channelId: 88 });
    });

    it('still emits but carries no message when announcements are suppressed', async () => {
      enableLeveling(G, 100, (draft) => {
        draft.levelUpChannel = { kind: 'suppress' };
      });
      const levelUps = captureLevelUps();

      await LevelingService.recordActivity(activity(1, T0));

      expect(levelUps).toHaveLength(1);
      expect(levelUps[0]).toMatchObject({ level: 1, template: null, destination: null });
    });

    it('treats an empty level-up message as no message', async () => {
      enableLeveling(G, 100, (draft) => {
        draft.levelUpMessage = '';
      });
      const levelUps = captureLevelUps();

      await LevelingService.recordActivity(activity(1, T0));

      expect(levelUps[0].template).toBeNull();
      expect(levelUps[0].destination).toEqual({ kind: 'source', channelId: G });
    });

    it('stacks every reward role when role stacking is on', async () => {
      const bronze = createTestRole('Bronze');
      const silver = createTestRole('Silver');
      enableLeveling(G, 3100, (draft) => {
        draft.factor = 2;
        draft.levelRoles.set(2, bronze.id);
        draft.levelRoles.set(5, silver.id);
      });
      const levelUps = captureLevelUps();

      await LevelingService.recordActivity(activity(1, T0));

      expect(MemberRoleService.getRoleIds(G, 1)).toEqual([bronze.id, silver.id]);
      expect(levelUps.map((l) => l.rewardRoleId)).toEqual([null, bronze.id, null, null, silver.id]);
    });

    it('keeps only the highest reward role when stacking is off', async () => {
      const bronze = createTestRole('Bronze');
      const silver = createTestRole('Silver');
      enableLeveling(G, 2800, (draft) => {
        draft.factor = 2;
        draft.roleStack = false;
        draft.levelRoles.set(2, bronze.id);
        draft.levelRoles.set(5, silver.id);
      });
      await LevelingService.setLevel(G, 1, 2);
      expect(MemberRoleService.getRoleIds(G, 1)).toEqual([bronze.id]);
      const levelUps = captureLevelUps();

      const result = await LevelingService.recordActivity(activity(1, T0));

      expect(result).toMatchObject({ credited: true, level: 5, xp: 0 });
      expect(MemberRoleService.getRoleIds(G, 1)).toEqual([silver.id]);
      expect(levelUps.map((l) => [l.level, l.rewardRoleId])).toEqual([
        [3, null],
        [4, null],
        [5, silver.id],
      ]);
    });

    it('leaves roles that are not level rewards alone', async () => {
      const bronze = createTestRole('Bronze');
      const helper = createTestRole('Helper');
      enableLeveling(G, 300, (draft) => {
        draft.factor = 2;
        draft.roleStack = false;
        draft.levelRoles.set(2, bronze.id);
      });
      MemberRoleService.grant(G, 1, helper.id);

      await LevelingService.recordActivity(activity(1, T0, { roleIds: [helper.id] }));

      expect(MemberRoleService.getRoleIds(G, 1)).toEqual([bronze.id, helper.id]);
    });
  });

  describe('adjustXp', () => {
    it('levels up and emits like activity, announcing in the group', async () => {
      const levelUps = captureLevelUps();

      const result = await LevelingService.adjustXp(G, 1, 100);

      expect(result.level).toBe(1);
      expect(result.xp).toBe(0);
      expect(levelUps).toHaveLength(1);
      expect(levelUps[0].destination).toEqual({ kind: 'source', channelId: G });
    });

    it('walks levels down on a negative delta without events', async () => {
      await LevelingService.setLevel(G, 1, 2);
      const levelUps = captureLevelUps();

      const result = await LevelingService.adjustXp(G, 1, -50);

      expect(result).toEqual({ level: 1, xp: 80, levelUps: [] });
      expect(levelUps).toEqual([]);
    });

    it('clamps at level 0 and 0 XP', async () => {
      await LevelingService.adjustXp(G, 1, 50);

      const result = await LevelingService.adjustXp(G, 1, -10_000);

      expect(result).toEqual({ level: 0, xp: 0, levelUps: [] });
      expect(LevelingService.getUserLevel(G, 1)).toEqual({ level: 0, xp: 0, requiredXp: 100 });
    });

    it('rejects fractional amounts', async () => {
      await expect(LevelingService.adjustXp(G, 1, 1.5)).rejects.toThrow(ValidationError);
    });
  });

  describe('setLevel', () => {
    it('sets the level, clears XP and grants the rewards up to it', async () => {
      const bronze = createTestRole('Bronze');
      const silver = createTestRole('Silver');
      enableLeveling(G, 10, (draft) => {
        draft.levelRoles.set(2, bronze.id);
        draft.levelRoles.set(5, silver.id);
      });
      await LevelingService.adjustXp(G, 1, 50);

      const diff = await LevelingService.setLevel(G, 1, 5);

      expect(diff).toEqual({ grant: [bronze.id, silver.id], revoke: [] });
      expect(LevelingService.getUserLevel(G, 1)).toMatchObject({ level: 5, xp: 0 });
    });

    it('revokes rewards above the new level', async () => {
      const bronze = createTestRole('Bronze');
      const silver = createTestRole('Silver');
      enableLeveling(G, 10, (draft) => {
        draft.levelRoles.set(2, bronze.id);
        draft.levelRoles.set(5, silver.id);
      });
      await LevelingService.setLevel(G, 1, 5);

      const diff = await LevelingService.setLevel(G, 1, 3);

      expect(diff).toEqual({ grant: [], revoke: [silver.id] });
      expect(MemberRoleService.getRoleIds(G, 1)).toEqual([bronze.id]);
    });

    it('emits no level-up events', async () => {
      const levelUps = captureLevelUps();
      await LevelingService.setLevel(G, 1, 10);
      expect(levelUps).toEqual([]);
    });

    it('rejects levels outside 0 to 500', async () => {
      await expect(LevelingService.setLevel(G, 1, -1)).rejects.toThrow(ValidationError);
      await expect(LevelingService.setLevel(G, 1, 1_000_000_000)).rejects.toThrow(
        'Level must be a whole number from 0 to 500',
      );
      expect(LevelingService.getRank(G, 1)).toBeNull();
    });

    it('keeps the XP needed for the top level finite', async () => {
      await LevelingService.setLevel(G, 1, 500);

      expect(Number.isFinite(LevelingService.getUserLevel(G, 1).requiredXp)).toBe(true);
    });
  });

  describe('rank and leaderboard', () => {
    beforeEach(async () => {
      await LevelingService.setLevel(G, 1, 3);
      await LevelingService.setLevel(G, 2, 5);
      await LevelingService.setLevel(G, 3, 3);
      await LevelingService.adjustXp(G, 3, 10);
      await LevelingService.setLevel(G, 4, 3);
    });

    it('ranks by level, then XP, with ties sharing a rank', () => {
      expect(LevelingService.getRank(G, 2)).toBe(1);
      expect(LevelingService.getRank(G, 3)).toBe(2);
      expect(LevelingService.getRank(G, 1)).toBe(3);
      expect(LevelingService.getRank(G, 4)).toBe(3);
      expect(LevelingService.getRank(G, 99)).toBeNull();
    });

    it('pages the leaderboard', () => {
      expect(LevelingService.getLeaderboard(G, 2, 0).map((r) => [r.user_id, r.rank])).toEqual([
        [2, 1],
        [3, 2],
      ]);
      expect(LevelingService.getLeaderboard(G, 2, 2).map((r) => [r.user_id, r.rank])).toEqual([
        [1, 3],
        [4, 3],
      ]);
    });

    it('reports XP towards the next level', () => {
      expect(LevelingService.getUserLevel(G, 3)).toEqual({ level: 3, xp: 10, requiredXp: 219 });
    });
  });

  describe('handleMemberLeave', () => {
    it('keeps progress unless the guild resets on leave', async () => {
      await LevelingService.adjustXp(G, 1, 50);

      expect(LevelingService.handleMemberLeave(G, 1)).toBe(false);
      expect(LevelingService.getUserLevel(G, 1).xp).toBe(50);
    });

    it('deletes progress when resetOnLeave is on', async () => {
      enableLeveling(G, 10, (draft) => {
        draft.resetOnLeave = true;
      });
      await LevelingService.adjustXp(G, 1, 50);

      expect(LevelingService.handleMemberLeave(G, 1)).toBe(true);
      expect(LevelingService.getRank(G, 1)).toBeNull();
      expect(LevelingService.handleMemberLeave(G, 1)).toBe(false);
    });

    it('forgets the member cooldown', async () => {
      enableLeveling(G, 10);
      await LevelingService.recordActivity(activity(1, T0));
      expect((await LevelingService.recordActivity(activity(1, T0 + 1000))).credited).toBe(false);

      LevelingService.handleMemberLeave(G, 1);

      expect((await LevelingService.recordActivity(activity(1, T0 + 2000))).credited).toBe(true);
    });
  });
});
