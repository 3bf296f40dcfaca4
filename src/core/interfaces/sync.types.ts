import { z } from 'zod';

import type { syncQueue } from '@infra/database/schema.js';

import { BOOKING_STATUSES, type Booking } from './booking.types.js';

export const SYNC_TASK_KINDS = ['upsert', 'update_status', 'sync_schedule'] as const;
export type SyncTaskKind = (typeof SYNC_TASK_KINDS)[number];

export const SYNC_TASK_STATUSES = ['pending', 'retry', 'completed', 'failed'] as const;
export type SyncTaskStatus = (typeof SYNC_TASK_STATUSES)[number];

export const BookingSnapshotSchema = z.object({
  id: z.number().int(),
  userId: z.number().int(),
  userName: z.string(),
  userNickname: z.string(),
  phone: z.string(),
  itemId: z.number().int(),
  itemName: z.string(),
  date: z.string(),
  status: z.enum(BOOKING_STATUSES),
  comment: z.string(),
  version: z.number().int(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

/** Outbox payload; timestamps travel as ISO strings and are revived on read. */
export const SyncTaskPayloadSchema = z.object({
  booking: BookingSnapshotSchema.optional(),
  status: z.string().optional(),
  start_date: z.string().optional(),
  end_date: z.string().optional(),
});

export type SyncTaskPayload = z.infer<typeof SyncTaskPayloadSchema>;

export type SyncTaskRow = typeof syncQueue.$inferSelect;

export type SyncTask = Omit<SyncTaskRow, 'payload'> & { payload: SyncTaskPayload };

export type EnqueueTaskInput =
  | { kind: 'upsert'; booking: Booking }
  | { kind: 'update_status'; bookingId: number; status: string }
  | { kind: 'sync_schedule'; startDate: string; endDate: string };
