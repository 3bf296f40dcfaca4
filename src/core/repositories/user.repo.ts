import { desc, eq, gte } from 'drizzle-orm';

import { NotFoundError } from '@core/errors/not-found.error.js';
import type { User, UserProfile } from '@core/interfaces/user.types.js';

import type { AppDatabase } from '@infra/database/sqlite.client.js';
import { users } from '@infra/database/schema.js';

import { runStorage } from './storage.util.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export class UserRepository {
  constructor(private readonly db: AppDatabase) {}

  /** Inserts or refreshes the profile keyed by the platform id; bumps last activity. */
  async upsert(profile: UserProfile): Promise<User> {
    return runStorage('upsert_user', () => {
      const now = new Date();
      const values = {
        telegramId: profile.telegramId,
        username: profile.username ?? null,
        firstName: profile.firstName ?? null,
        lastName: profile.lastName ?? null,
        languageCode: profile.languageCode ?? null,
        isManager: profile.isManager ?? false,
        isBlacklisted: profile.isBlacklisted ?? false,
        lastActivity: now,
        updatedAt: now,
      };
      return this.db
        .insert(users)
        .values({ ...values, phone: profile.phone ?? null, createdAt: now })
        .onConflictDoUpdate({
          target: users.telegramId,
          set: profile.phone ? { ...values, phone: profile.phone } : values,
        })
        .returning()
        .get();
    });
  }

  async findByTelegramId(telegramId: number): Promise<User | null> {
    return runStorage(
      'get_user_by_platform_id',
      () => this.db.select().from(users).where(eq(users.telegramId, telegramId)).get() ?? null,
    );
  }

  async findById(id: number): Promise<User | null> {
    return runStorage('get_user_by_id', () => this.db.select().from(users).where(eq(users.id, id)).get() ?? null);
  }

  async listAll(): Promise<User[]> {
    return runStorage('list_all_users', () =>
      this.db.select().from(users).orderBy(desc(users.lastActivity), desc(users.id)).all(),
    );
  }

  async listActiveSince(days: number, now = new Date()): Promise<User[]> {
    const since = new Date(now.getTime() - days * DAY_MS);
    return runStorage('list_active_users_since', () =>
      this.db
        .select()
        .from(users)
        .where(gte(users.lastActivity, since))
        .orderBy(desc(users.lastActivity))
        .all(),
    );
  }

  async listByManagerFlag(isManager: boolean): Promise<User[]> {
    return runStorage('list_users_by_manager_flag', () =>
      this.db.select().from(users).where(eq(users.isManager, isManager)).orderBy(desc(users.lastActivity)).all(),
    );
  }

  async updatePhone(telegramId: number, phone: string): Promise<void> {
    runStorage('update_user_phone', () => {
      const result = this.db
        .update(users)
        .set({ phone, updatedAt: new Date() })
        .where(eq(users.telegramId, telegramId))
        .run();
      if (result.changes === 0) throw new NotFoundError(`User ${telegramId} not found`);
    });
  }

  /** Touches last_activity only; unknown users are ignored. */
  async touchActivity(telegramId: number, at = new Date()): Promise<void> {
    runStorage('touch_user_activity', () => {
      this.db.update(users).set({ lastActivity: at }).where(eq(users.telegramId, telegramId)).run();
    });
  }
}
