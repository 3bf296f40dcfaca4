import { eq, sql } from 'drizzle-orm';

import type { AppDatabase } from '@infra/database/sqlite.client.js';
import { rateLimits, userStates } from '@infra/database/schema.js';

import { runStorage } from './storage.util.js';

/** Stored conversation scratch: the step name plus its key/value map. */
export interface UserState {
  userId: number;
  step: string;
  data: Record<string, unknown>;
  updatedAt: Date;
}

export interface StateRepository {
  getState(userId: number): Promise<UserState | null>;
  setState(state: UserState): Promise<void>;
  clearState(userId: number): Promise<void>;
  /** Counts one attempt; false when the window already holds `limit` attempts. */
  checkRateLimit(userId: number, limit: number, windowSeconds: number): Promise<boolean>;
}

export class SqliteStateRepository implements StateRepository {
  constructor(
    private readonly db: AppDatabase,
    private readonly ttlSeconds = 0,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async getState(userId: number): Promise<UserState | null> {
    const row = runStorage('get_state', () => this.db.select().from(userStates).where(eq(userStates.userId, userId)).get());
    if (!row) return null;
    if (this.ttlSeconds > 0 && this.clock().getTime() - row.updatedAt.getTime() > this.ttlSeconds * 1000) {
      await this.clearState(userId);
      return null;
    }
    return { userId: row.userId, step: row.step, data: row.data, updatedAt: row.updatedAt };
  }

  async setState(state: UserState): Promise<void> {
    runStorage('set_state', () => {
      this.db
        .insert(userStates)
        .values(state)
        .onConflictDoUpdate({
          target: userStates.userId,
          set: { step: state.step, data: state.data, updatedAt: state.updatedAt },
        })
        .run();
    });
  }

  async clearState(userId: number): Promise<void> {
    runStorage('clear_state', () => {
      this.db.delete(userStates).where(eq(userStates.userId, userId)).run();
    });
  }

  async checkRateLimit(userId: number, limit: number, windowSeconds: number): Promise<boolean> {
    const now = this.clock();
    const windowStartFloor = new Date(now.getTime() - windowSeconds * 1000);
    return runStorage('check_rate_limit', () =>
      this.db.transaction(
        (tx) => {
          const row = tx.select().from(rateLimits).where(eq(rateLimits.userId, userId)).get();
          if (!row || row.windowStart <= windowStartFloor) {
            tx.insert(rateLimits)
              .values({ userId, windowStart: now, count: 1 })
              .onConflictDoUpdate({ target: rateLimits.userId, set: { windowStart: now, count: 1 } })
              .run();
            return limit > 0;
          }
          if (row.count >= limit) return false;
          tx.update(rateLimits)
            .set({ count: sql`${rateLimits.count} + 1` })
            .where(eq(rateLimits.userId, userId))
            .run();
          return true;
        },
        { behavior: 'immediate' },
      ),
    );
  }
}

interface Expiring<T> {
  value: T;
  expiresAt: number;
}

/** Process-local state, used on its own or as the failover target. */
export class MemoryStateRepository implements StateRepository {
  private readonly states = new Map<number, Expiring<UserState>>();
  private readonly counters = new Map<number, Expiring<number>>();

  constructor(
    private readonly ttlSeconds = 24 * 60 * 60,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async getState(userId: number): Promise<UserState | null> {
    const entry = this.states.get(userId);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock().getTime()) {
      this.states.delete(userId);
      return null;
    }
    return structuredClone(entry.value);
  }

  async setState(state: UserState): Promise<void> {
    this.states.set(state.userId, {
      value: structuredClone(state),
      expiresAt: this.clock().getTime() + this.ttlSeconds * 1000,
    });
  }

  async clearState(userId: number): Promise<void> {
    this.states.delete(userId);
  }

  async checkRateLimit(userId: number, limit: number, windowSeconds: number): Promise<boolean> {
    const now = this.clock().getTime();
    const entry = this.counters.get(userId);
    if (!entry || entry.expiresAt <= now) {
      this.counters.set(userId, { value: 1, expiresAt: now + windowSeconds * 1000 });
      return limit > 0;
    }
    if (entry.value >= limit) return false;
    entry.value += 1;
    return true;
  }
}
