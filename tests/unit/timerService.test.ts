import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';

/**
 * Tests for the persistent timer service
 */

import { get } from '../../src/database';
import { type Timer, TimerService } from '../../src/services/timerService';
import type { TimerRow } from '../../src/types';
import { cleanTestDatabase, initTestDatabase } from '../helpers/testDatabase';

const EVENT = 'test_event';

const firedAt = (timerId: number): number | null | undefined =>
  get<TimerRow>('SELECT * FROM timers WHERE id = ?', [timerId])?.fired_at;

describe('TimerService', () => {
  beforeAll(() => {
    initTestDatabase();
  });

  beforeEach(() => {
    cleanTestDatabase();
  });

  afterEach(() => {
    TimerService.stop();
    TimerService.unregister(EVENT);
  });

  it('stores scheduled timers', () => {
    const timerId = TimerService.schedule(EVENT, 5_000, 'payload');

    expect(timerId).toBe(1);
    expect(TimerService.getTimer(timerId)).toMatchObject({
      id: 1,
      event: EVENT,
      payload: 'payload',
      expiresAt: 5_000,
    });
  });

  it('fires due timers once and deletes them', async () => {
    const seen: Timer[] = [];
    TimerService.register(EVENT, (timer) => {
      seen.push(timer);
    });
    const due = TimerService.schedule(EVENT, 1_000);
    const later = TimerService.schedule(EVENT, 9_000);

    expect(await TimerService.dispatchDue(1_000)).toBe(1);
    expect(await TimerService.dispatchDue(1_000)).toBe(0);

    expect(seen.map((t) => t.id)).toEqual([due]);
    expect(TimerService.getTimer(due)).toBeNull();
    expect(TimerService.getTimer(later)).not.toBeNull();
  });

  it('fires in expiry order', async () => {
    const order: number[] = [];
    TimerService.register(EVENT, (timer) => {
      order.push(timer.id);
    });
    const second = TimerService.schedule(EVENT, 2_000);
    const first = TimerService.schedule(EVENT, 1_000);

    await TimerService.dispatchDue(5_000);

    expect(order).toEqual([first, second]);
  });

  it('never fires a cancelled timer', async () => {
    const handler = vi.fn();
    TimerService.register(EVENT, handler);
    const timerId = TimerService.schedule(EVENT, 1_000);

    expect(TimerService.cancel(timerId)).toBe(true);
    expect(TimerService.cancel(timerId)).toBe(false);
    expect(await TimerService.dispatchDue(10_000)).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });

  it('leaves timers without a handler untouched', async () => {
    const timerId = TimerService.schedule('unhandled_event', 1_000);

    expect(await TimerService.dispatchDue(5_000)).toBe(0);
    expect(firedAt(timerId)).toBeNull();
  });

  it('keeps a timer claimed when its handler throws', async () => {
    const handler = vi.fn().mockRejectedValue(new Error('boom'));
    TimerService.register(EVENT, handler);
    const timerId = TimerService.schedule(EVENT, 1_000);

    expect(await TimerService.dispatchDue(2_000)).toBe(0);
    expect(firedAt(timerId)).toBe(2_000);

    // claimed timers are neither retried nor cancellable in the same run
    expect(await TimerService.dispatchDue(3_000)).toBe(0);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(TimerService.cancel(timerId)).toBe(false);
  });

  it('releases claimed timers on start', async () => {
    TimerService.register(EVENT, () => {
      throw new Error('boom');
    });
    const timerId = TimerService.schedule(EVENT, 1_000);
    await TimerService.dispatchDue(2_000);

    TimerService.start(60_000);

    expect(TimerService.running).toBe(true);
    expect(firedAt(timerId)).toBeNull();
  });

  it('stops polling', () => {
    TimerService.start(60_000);
    TimerService.stop();

    expect(TimerService.running).toBe(false);
  });
});
