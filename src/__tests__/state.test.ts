import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { MemoryStateRepository, type StateRepository, type UserState } from '@core/repositories/state.repo.js';

import { RedisStateRepository, type KeyValueClient } from '@infra/redis/redis-state.repo.js';

import { FailoverStateRepository } from '@services/conversation/failover-state.repo.js';
import { StateManager } from '@services/conversation/state.manager.js';
import { MAIN_MENU, previousStep, type ConversationStep } from '@services/conversation/state.types.js';

import { getCounter, resetMetrics } from '@utils/metrics.js';

import { createTestStore, ManualClock, type TestStore } from '@test/utils/fixtures.js';

class FakeKeyValue implements KeyValueClient {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.values.set(key, value);
    this.ttls.set(key, ttlSeconds);
  }

  async del(key: string): Promise<void> {
    this.values.delete(key);
  }

  async incr(key: string): Promise<number> {
    const next = Number(this.values.get(key) ?? '0') + 1;
    this.values.set(key, String(next));
    return next;
  }

  async expire(key: string, seconds: number): Promise<void> {
    this.ttls.set(key, seconds);
  }
}

class BrokenRepository implements StateRepository {
  readonly getState = vi.fn(async (): Promise<UserState | null> => {
    throw new Error('connection refused');
  });
  readonly setState = vi.fn(async (): Promise<void> => {
    throw new Error('connection refused');
  });
  readonly clearState = vi.fn(async (): Promise<void> => {
    throw new Error('connection refused');
  });
  readonly checkRateLimit = vi.fn(async (): Promise<boolean> => {
    throw new Error('connection refused');
  });
}

const confirmation: ConversationStep = {
  step: 'confirmation',
  item_id: 3,
  date: '2025-06-12',
  user_name: 'Иван',
  phone: '79991234567',
};

describe('previousStep', () => {
  it('walks the user flow back keeping the scratch it needs', () => {
    expect(previousStep(confirmation)).toEqual({
      step: 'phone_number',
      item_id: 3,
      date: '2025-06-12',
      user_name: 'Иван',
    });
    expect(previousStep({ step: 'waiting_date', item_id: 3 })).toEqual({ step: 'select_item' });
    expect(previousStep({ step: 'select_item' })).toEqual(MAIN_MENU);
  });

  it('returns a range comment step to the end date', () => {
    expect(
      previousStep({
        step: 'manager_waiting_comment',
        is_manager_booking: true,
        client_name: 'Пётр',
        client_phone: '79990000000',
        item_id: 3,
        date_type: 'range',
        dates: ['2025-06-12', '2025-06-13'],
      }),
    ).toEqual({
      step: 'manager_waiting_end_date',
      is_manager_booking: true,
      client_name: 'Пётр',
      client_phone: '79990000000',
      item_id: 3,
      date_type: 'range',
      start_date: '2025-06-12',
    });
  });

  it('drops the comment when leaving the manager confirmation', () => {
    const back = previousStep({
      step: 'manager_confirm_booking',
      is_manager_booking: true,
      client_name: 'Пётр',
      client_phone: '79990000000',
      item_id: 3,
      date_type: 'single',
      dates: ['2025-06-12'],
      comment: 'нет',
    });
    expect(back.step).toBe('manager_waiting_comment');
    expect(back).not.toHaveProperty('comment');
  });
});

describe('StateManager', () => {
  let clock: ManualClock;
  let repo: MemoryStateRepository;
  let states: StateManager;

  beforeEach(() => {
    resetMetrics();
    clock = new ManualClock();
    repo = new MemoryStateRepository(60, clock.now);
    states = new StateManager(repo, { messages: 2, windowSeconds: 60 }, clock.now);
  });

  it('round-trips a step with its scratch', async () => {
    await states.set(1, confirmation);
    expect(await states.get(1)).toEqual(confirmation);
  });

  it('reads unknown users and stale entries as the main menu', async () => {
    expect(await states.get(1)).toEqual(MAIN_MENU);
    await states.set(1, confirmation);
    clock.advance(61_000);
    expect(await states.get(1)).toEqual(MAIN_MENU);
  });

  it('treats scratch that does not fit its step as the main menu', async () => {
    await repo.setState({ userId: 1, step: 'confirmation', data: { item_id: 3 }, updatedAt: clock.now() });
    expect(await states.get(1)).toEqual(MAIN_MENU);
  });

  it('clears the stored state when moving to the main menu', async () => {
    await states.set(1, confirmation);
    await states.set(1, MAIN_MENU);
    expect(await repo.getState(1)).toBeNull();
  });

  it('steps back and stores the previous step', async () => {
    await states.set(1, { step: 'enter_name', item_id: 3, date: '2025-06-12' });

    expect(await states.back(1)).toEqual({ step: 'waiting_date', item_id: 3 });
    expect(await states.get(1)).toEqual({ step: 'waiting_date', item_id: 3 });
  });

  it('throttles users past the window limit and never managers', async () => {
    expect(await states.allow(1, false)).toBe(true);
    expect(await states.allow(1, false)).toBe(true);
    expect(await states.allow(1, false)).toBe(false);
    expect(getCounter('rate_limited')).toBe(1);

    expect(await states.allow(2, true)).toBe(true);

    clock.advance(60_000);
    expect(await states.allow(1, false)).toBe(true);
  });

  it('lets updates through when the limiter fails', async () => {
    const broken = new StateManager(new BrokenRepository(), { messages: 1, windowSeconds: 60 });
    expect(await broken.allow(1, false)).toBe(true);
  });
});

describe('SqliteStateRepository', () => {
  let handle: TestStore;

  beforeEach(() => {
    handle = createTestStore();
  });

  afterEach(() => handle.close());

  it('persists and clears state', async () => {
    const states = new StateManager(handle.store.states, { messages: 5, windowSeconds: 60 });
    await states.set(7, confirmation);
    expect(await states.get(7)).toEqual(confirmation);

    await states.reset(7);
    expect(await states.get(7)).toEqual(MAIN_MENU);
  });

  it('counts attempts within a window', async () => {
    const repo = handle.store.states;
    expect(await repo.checkRateLimit(7, 2, 60)).toBe(true);
    expect(await repo.checkRateLimit(7, 2, 60)).toBe(true);
    expect(await repo.checkRateLimit(7, 2, 60)).toBe(false);
  });
});

describe('RedisStateRepository', () => {
  it('stores state under the prefixed key with the TTL', async () => {
    const kv = new FakeKeyValue();
    const repo = new RedisStateRepository(kv, 3600);
    const updatedAt = new Date('2025-06-10T09:00:00Z');

    await repo.setState({ userId: 5, step: 'waiting_date', data: { item_id: 3 }, updatedAt });

    expect(kv.ttls.get('booking:state:5')).toBe(3600);
    expect(await repo.getState(5)).toEqual({ userId: 5, step: 'waiting_date', data: { item_id: 3 }, updatedAt });
  });

  it('ignores unreadable values', async () => {
    const kv = new FakeKeyValue();
    kv.values.set('booking:state:5', 'not json');
    expect(await new RedisStateRepository(kv, 60).getState(5)).toBeNull();
  });

  it('sets the window expiry on the first hit only', async () => {
    const kv = new FakeKeyValue();
    const repo = new RedisStateRepository(kv, 60);
    const expire = vi.spyOn(kv, 'expire');

    expect(await repo.checkRateLimit(5, 2, 30)).toBe(true);
    expect(await repo.checkRateLimit(5, 2, 30)).toBe(true);
    expect(await repo.checkRateLimit(5, 2, 30)).toBe(false);

    expect(expire).toHaveBeenCalledTimes(1);
    expect(expire).toHaveBeenCalledWith('booking:rate:5', 30);
  });
});

describe('FailoverStateRepository', () => {
  it('falls back while the primary is down and retries it later', async () => {
    resetMetrics();
    const clock = new ManualClock();
    const primary = new BrokenRepository();
    const fallback = new MemoryStateRepository(3600, clock.now);
    const repo = new FailoverStateRepository(primary, fallback, 1000, clock.now);
    const state: UserState = { userId: 1, step: 'select_item', data: {}, updatedAt: clock.now() };

    await repo.setState(state);
    expect(await repo.getState(1)).toEqual(state);
    expect(repo.primaryAvailable).toBe(false);
    expect(primary.getState).not.toHaveBeenCalled();
    expect(getCounter('state_failover')).toBe(1);

    clock.advance(1000);
    expect(repo.primaryAvailable).toBe(true);
    await repo.getState(1);
    expect(primary.getState).toHaveBeenCalledTimes(1);
  });
});
