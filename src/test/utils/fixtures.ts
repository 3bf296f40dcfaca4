import type { Item } from '@core/interfaces/item.types.js';
import { Store } from '@core/repositories/store.js';

import { openDatabase } from '@infra/database/sqlite.client.js';

import { readBookingRules, type BookingRules } from '@services/booking/config.defaults.js';

import type { Clock } from '@utils/time.js';

export const TZ = 'Europe/Moscow';

/** 2025-06-10 12:00 in Moscow. */
export const NOW = new Date('2025-06-10T09:00:00Z');
export const TODAY = '2025-06-10';

export function fixedClock(at: Date = NOW): Clock {
  return () => at;
}

/** A clock tests can move forward. */
export class ManualClock {
  constructor(private current: Date = NOW) {}

  readonly now: Clock = () => this.current;

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export function testRules(overrides: Partial<BookingRules> = {}): BookingRules {
  return readBookingRules({ timezone: TZ, maxBookingDays: 365, minAdvanceHours: 0, ...overrides });
}

export interface TestStore {
  store: Store;
  close(): void;
}

export function createTestStore(): TestStore {
  const handle = openDatabase(':memory:');
  return { store: new Store(handle.db, { busyRetry: { attempts: 3, pauseMs: 1 } }), close: handle.close };
}

export async function seedItem(store: Store, name: string, totalQuantity: number): Promise<Item> {
  return store.items.create({ name, totalQuantity });
}
