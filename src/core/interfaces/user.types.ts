import type { users } from '@infra/database/schema.js';

export type User = typeof users.$inferSelect;

export interface UserProfile {
  telegramId: number;
  username?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  phone?: string | null;
  languageCode?: string | null;
  isManager?: boolean;
  isBlacklisted?: boolean;
}
