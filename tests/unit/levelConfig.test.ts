import { describe, it, expect, beforeAll, beforeEach } from 'vitest';

/**
 * Tests for per-guild leveling configuration: defaults, validation,
 * persistence and cache invalidation.
 */

import {
  defaultLevelConfig,
  LevelConfigService,
  type LevelUpChannel,
} from '../../src/services/levelConfigService';
import { GuildService } from '../../src/services/guildService';
import { MemberRoleService } from '../../src/services/memberRoleService';
import { NotFoundError, ValidationError } from '../../src/utils/errors';
import {
  cleanTestDatabase,
  createTestGuild,
  createTestRole,
  initTestDatabase,
  TEST_GUILD_ID,
} from '../helpers/testDatabase';

const G = TEST_GUILD_ID;

const captureValidation = (fn: () => unknown): ValidationError => {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
};

describe('LevelConfigService', () => {
  beforeAll(() => {
    initTestDatabase();
  });

  beforeEach(() => {
    cleanTestDatabase();
    createTestGuild();
  });

  it('hands out the defaults for a guild that never saved a config', () => {
    const config = LevelConfigService.getConfig(G);

    expect(config).toEqual(defaultLevelConfig());
    expect(config.moduleEnabled).toBe(false);
    expect(config.base).toBe(100);
    expect(config.factor).toBe(1.3);
    expect(config.levelUpChannel).toEqual({ kind: 'source' });
  });

  it('persists every setting', () => {
    const bronze = createTestRole('Bronze');
    const booster = createTestRole('Booster');
    const muted = createTestRole('Muted');

    LevelConfigService.updateConfig(G, (draft) => {
      draft.moduleEnabled = true;
      draft.roleStack = false;
      draft.base = 50;
      draft.factor = 1.5;
      draft.minGain = 5;
      draft.maxGain = 9;
      draft.cooldownRate = 3;
      draft.cooldownPer = 60;
      draft.levelUpMessage = 'GG {user.mention}';
      draft.specialLevelUpMessages.set(10, 'Double digits!');
      draft.levelUpChannel = { kind: 'channel', channelId: 12 };
      draft.blacklistedRoles.add(muted.id);
      draft.blacklistedChannels.add(77);
      draft.blacklistedUsers.add(5);
      draft.levelRoles.set(5, bronze.id);
      draft.multiplierRoles.set(booster.id, 1.5);
      draft.multiplierChannels.set(12, 2);
      draft.resetOnLeave = true;
    });
    const saved = LevelConfigService.getConfig(G);

    LevelConfigService.invalidate(G);
    const reloaded = LevelConfigService.getConfig(G);

    expect(reloaded).not.toBe(saved);
    expect(reloaded).toEqual(saved);
    expect(reloaded.levelRoles).toEqual(new Map([[5, bronze.id]]));
    expect(reloaded.blacklistedUsers).toEqual(new Set([5]));
  });

  it.each<[string, LevelUpChannel]>([
    ['suppress', { kind: 'suppress' }],
    ['dm', { kind: 'dm' }],
    ['source', { kind: 'source' }],
  ])('round-trips the %s destination', (_label, channel) => {
    LevelConfigService.updateConfig(G, (draft) => {
      draft.levelUpChannel = channel;
    });
    LevelConfigService.invalidate(G);

    expect(LevelConfigService.getConfig(G).levelUpChannel).toEqual(channel);
  });

  it('edits a copy, leaving the cached config alone until saved', () => {
    const before = LevelConfigService.getConfig(G);

    expect(() =>
      LevelConfigService.updateConfig(G, (draft) => {
        draft.moduleEnabled = true;
        draft.minGain = 20;
        draft.maxGain = 10;
      }),
    ).toThrow(ValidationError);

    expect(LevelConfigService.getConfig(G)).toBe(before);
    expect(before.moduleEnabled).toBe(false);
  });

  describe('validation', () => {
    it('rejects minGain above maxGain', () => {
      const error = captureValidation(() =>
        LevelConfigService.updateConfig(G, (draft) => {
          draft.minGain = 20;
          draft.maxGain = 10;
        }),
      );

      expect(error.issues).toEqual(['minGain: minGain must not exceed maxGain']);
      expect(error.message).toBe(
        'Invalid leveling configuration: minGain: minGain must not exceed maxGain',
      );
    });

    it('rejects a factor of 1 or less', () => {
      const error = captureValidation(() =>
        LevelConfigService.updateConfig(G, (draft) => {
          draft.factor = 1;
        }),
      );

      // the curve check still runs on the out-of-range factor
      expect(error.issues).toEqual([
        'factor: Factor must be greater than 1',
        'factor: base * (factor - 1) must be at least 1',
      ]);
    });

    it('rejects a curve that would stop growing', () => {
      const error = captureValidation(() =>
        LevelConfigService.updateConfig(G, (draft) => {
          draft.base = 1;
          draft.factor = 1.5;
        }),
      );

      expect(error.issues).toEqual(['factor: base * (factor - 1) must be at least 1']);
    });

    it('rejects non-positive multipliers', () => {
      expect(() =>
        LevelConfigService.updateConfig(G, (draft) => {
          draft.multiplierChannels.set(12, 0);
        }),
      ).toThrow(ValidationError);
    });

    it('caps multipliers', () => {
      const booster = createTestRole('Booster');

      const error = captureValidation(() =>
        LevelConfigService.updateConfig(G, (draft) => {
          draft.multiplierRoles.set(booster.id, 1e200);
        }),
      );

      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatch(/Multipliers are limited to 100$/);
      expect(() =>
        LevelConfigService.updateConfig(G, (draft) => {
          draft.multiplierChannels.set(12, Number.POSITIVE_INFINITY);
        }),
      ).toThrow(ValidationError);
      expect(LevelConfigService.getConfig(G).multiplierRoles.size).toBe(0);
    });

    it('caps XP gains', () => {
      const error = captureValidation(() =>
        LevelConfigService.updateConfig(G, (draft) => {
          draft.maxGain = 2 ** 48;
        }),
      );

      expect(error.issues).toEqual(['maxGain: XP gains are limited to 10000']);
    });

    it('caps the curve base and factor', () => {
      const base = captureValidation(() =>
        LevelConfigService.updateConfig(G, (draft) => {
          draft.base = 1e9;
        }),
      );
      const factor = captureValidation(() =>
        LevelConfigService.updateConfig(G, (draft) => {
          draft.factor = 1e200;
        }),
      );

      expect(base.issues).toEqual(['base: Base is limited to 1000000']);
      expect(factor.issues).toEqual(['factor: Factor is limited to 3']);
    });

    it('rejects reward roles for level 0', () => {
      const role = createTestRole('Starter');
      expect(() =>
        LevelConfigService.updateConfig(G, (draft) => {
          draft.levelRoles.set(0, role.id);
        }),
      ).toThrow(ValidationError);
    });

    it('rejects templates over 2000 characters', () => {
      expect(() =>
        LevelConfigService.updateConfig(G, (draft) => {
          draft.levelUpMessage = 'x'.repeat(2001);
        }),
      ).toThrow(ValidationError);
    });

    it('accepts an empty level-up message', () => {
      const config = LevelConfigService.updateConfig(G, (draft) => {
        draft.levelUpMessage = '';
      });
      expect(config.levelUpMessage).toBe('');
    });
  });

  it('refuses to save for an unknown guild', () => {
    expect(() => LevelConfigService.saveConfig(-100999, defaultLevelConfig())).toThrow(NotFoundError);
  });

  it('drops references to a deleted role', () => {
    const role = createTestRole('Gold');
    LevelConfigService.updateConfig(G, (draft) => {
      draft.levelRoles.set(5, role.id);
      draft.multiplierRoles.set(role.id, 2);
      draft.blacklistedRoles.add(role.id);
    });

    MemberRoleService.deleteRole(G, role.id);
    const config = LevelConfigService.getConfig(G);

    expect(config.levelRoles.size).toBe(0);
    expect(config.multiplierRoles.size).toBe(0);
    expect(config.blacklistedRoles.size).toBe(0);
  });

  it('goes back to defaults when the guild is removed', () => {
    LevelConfigService.updateConfig(G, (draft) => {
      draft.moduleEnabled = true;
    });

    GuildService.removeGuild(G);

    expect(LevelConfigService.getConfig(G).moduleEnabled).toBe(false);
  });
});
