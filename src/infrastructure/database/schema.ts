import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

import { BOOKING_STATUSES } from '@core/interfaces/booking.types.js';
import { SYNC_TASK_KINDS, SYNC_TASK_STATUSES } from '@core/interfaces/sync.types.js';

const timestamps = {
  createdAt: integer('created_at', { mode: 'timestamp_ms' })
    .notNull()
    .$defaultFn(() => new Date()),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' })
    .notNull()
    .$defaultFn(() => new Date()),
};

/**
 * Column definitions for the query builder. DDL (indexes, checks) lives in
 * schema.sql and is applied when the database is opened.
 */
export const items = sqliteTable('items', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  description: text('description'),
  totalQuantity: integer('total_quantity').notNull(),
  sortOrder: integer('sort_order').notNull().default(0),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  ...timestamps,
});

export const users = sqliteTable('users', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  telegramId: integer('telegram_id').notNull().unique(),
  username: text('username'),
  firstName: text('first_name'),
  lastName: text('last_name'),
  phone: text('phone'),
  isManager: integer('is_manager', { mode: 'boolean' }).notNull().default(false),
  isBlacklisted: integer('is_blacklisted', { mode: 'boolean' }).notNull().default(false),
  languageCode: text('language_code'),
  lastActivity: integer('last_activity', { mode: 'timestamp_ms' })
    .notNull()
    .$defaultFn(() => new Date()),
  ...timestamps,
});

export const bookings = sqliteTable('bookings', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  userId: integer('user_id').notNull(),
  userName: text('user_name').notNull(),
  userNickname: text('user_nickname').notNull().default(''),
  phone: text('phone').notNull().default(''),
  itemId: integer('item_id').notNull(),
  itemName: text('item_name').notNull(),
  /** Day key, yyyy-MM-dd in the service time zone. */
  date: text('date').notNull(),
  status: text('status', { enum: BOOKING_STATUSES }).notNull(),
  comment: text('comment').notNull().default(''),
  version: integer('version').notNull().default(1),
  ...timestamps,
});

export const userStates = sqliteTable('user_states', {
  userId: integer('user_id').primaryKey(),
  step: text('step').notNull(),
  data: text('data', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

export const syncQueue = sqliteTable('sync_queue', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  taskType: text('task_type', { enum: SYNC_TASK_KINDS }).notNull(),
  bookingId: integer('booking_id').notNull().default(0),
  payload: text('payload').notNull(),
  status: text('status', { enum: SYNC_TASK_STATUSES }).notNull().default('pending'),
  retryCount: integer('retry_count').notNull().default(0),
  lastError: text('last_error'),
  nextRetryAt: integer('next_retry_at', { mode: 'timestamp_ms' }),
  processedAt: integer('processed_at', { mode: 'timestamp_ms' }),
  ...timestamps,
});

export const rateLimits = sqliteTable('rate_limits', {
  userId: integer('user_id').primaryKey(),
  windowStart: integer('window_start', { mode: 'timestamp_ms' }).notNull(),
  count: integer('count').notNull(),
});
