import { describe, it, expect, beforeAll, beforeEach } from 'vitest';

/**
 * Tests for the role-based help menu
 */

import { buildHelpMenu, effectiveRole, getHelpTextForCategory } from '../../src/commands/help';
import { cleanTestDatabase, createTestUser, initTestDatabase } from '../helpers/testDatabase';

const callbacks = (role: 'member' | 'admin' | 'owner') =>
  buildHelpMenu(role).inline_keyboard.flat().map((button) => ('callback_data' in button ? button.callback_data : null));

describe('Help', () => {
  beforeAll(() => {
    initTestDatabase();
  });

  beforeEach(() => {
    cleanTestDatabase();
  });

  describe('buildHelpMenu', () => {
    it('shows members the public categories', () => {
      expect(buildHelpMenu('member').inline_keyboard).toHaveLength(2);
      expect(callbacks('member')).toEqual(['help_leveling', 'help_giveaways', 'help_roles']);
    });

    it('adds the admin category for admins', () => {
      expect(callbacks('admin')).toEqual(['help_leveling', 'help_giveaways', 'help_roles', 'help_admin']);
    });

    it('shows owners everything', () => {
      expect(buildHelpMenu('owner').inline_keyboard).toHaveLength(4);
      expect(callbacks('owner')).toContain('help_owner');
    });
  });

  describe('getHelpTextForCategory', () => {
    it('hides staff categories from members', () => {
      expect(getHelpTextForCategory('admin', 'member')).toBeNull();
      expect(getHelpTextForCategory('owner', 'admin')).toBeNull();
    });

    it('returns the category text to those allowed', () => {
      expect(getHelpTextForCategory('roles', 'member')?.text).toBe(
        'Role Commands\n\n/roles\n  List this group\'s roles and how many members hold each.\n\n/myroles\n  Roles you hold in this group.',
      );
      expect(getHelpTextForCategory('admin', 'owner')?.text.startsWith('Admin Commands')).toBe(true);
    });
  });

  describe('effectiveRole', () => {
    it('counts configured owners', () => {
      expect(effectiveRole(1000)).toBe('owner');
    });

    it('reads the stored role for everyone else', () => {
      createTestUser(7, 'alice', 'admin');

      expect(effectiveRole(7)).toBe('admin');
      expect(effectiveRole(8)).toBe('member');
    });
  });
});
