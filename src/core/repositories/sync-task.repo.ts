import { and, asc, desc, eq, inArray, isNull, lt, lte, notExists, or, sql } from 'drizzle-orm';
import { alias, type SQLiteUpdateSetSource } from 'drizzle-orm/sqlite-core';

import { NotFoundError } from '@core/errors/not-found.error.js';
import {
  SyncTaskPayloadSchema,
  type EnqueueTaskInput,
  type SyncTask,
  type SyncTaskKind,
  type SyncTaskPayload,
  type SyncTaskRow,
} from '@core/interfaces/sync.types.js';

import type { AppDatabase } from '@infra/database/sqlite.client.js';
import { syncQueue } from '@infra/database/schema.js';

import { logger } from '@utils/logger.js';

import { runStorage } from './storage.util.js';

const older = alias(syncQueue, 'older');

function encode(input: EnqueueTaskInput): { bookingId: number; payload: SyncTaskPayload } {
  switch (input.kind) {
    case 'upsert':
      return { bookingId: input.booking.id, payload: { booking: input.booking } };
    case 'update_status':
      return { bookingId: input.bookingId, payload: { status: input.status } };
    case 'sync_schedule':
      return { bookingId: 0, payload: { start_date: input.startDate, end_date: input.endDate } };
  }
}

function decode(row: SyncTaskRow): SyncTask {
  let raw: unknown;
  try {
    raw = JSON.parse(row.payload);
  } catch (err) {
    logger.warn('[outbox] unreadable payload', { id: row.id, err });
    raw = {};
  }
  const parsed = SyncTaskPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('[outbox] payload does not match schema', { id: row.id, issues: parsed.error.issues });
  }
  return { ...row, payload: parsed.success ? parsed.data : {} };
}

export class SyncTaskRepository {
  constructor(private readonly db: AppDatabase) {}

  async enqueue(input: EnqueueTaskInput): Promise<SyncTask> {
    const { bookingId, payload } = encode(input);
    return runStorage('enqueue_task', () => {
      const now = new Date();
      const row = this.db
        .insert(syncQueue)
        .values({
          taskType: input.kind,
          bookingId,
          payload: JSON.stringify(payload),
          status: 'pending',
          retryCount: 0,
          createdAt: now,
          updatedAt: now,
        })
        .returning()
        .get();
      return decode(row);
    });
  }

  /**
   * Due tasks, oldest first. A task is held back while an older unfinished
   * task of the same booking exists, so one booking's tasks run in order.
   * Rows are not modified: an interrupted task stays leasable.
   */
  async leaseDue(limit: number, now = new Date(), kind?: SyncTaskKind): Promise<SyncTask[]> {
    return runStorage('lease_due_pending_tasks', () => {
      const olderUnfinished = this.db
        .select({ one: sql`1` })
        .from(older)
        .where(
          and(
            eq(older.bookingId, syncQueue.bookingId),
            lt(older.id, syncQueue.id),
            inArray(older.status, ['pending', 'retry']),
          ),
        );
      const conditions = [
        inArray(syncQueue.status, ['pending', 'retry']),
        or(isNull(syncQueue.nextRetryAt), lte(syncQueue.nextRetryAt, now)),
        or(eq(syncQueue.bookingId, 0), notExists(olderUnfinished)),
      ];
      if (kind) conditions.push(eq(syncQueue.taskType, kind));
      return this.db
        .select()
        .from(syncQueue)
        .where(and(...conditions))
        .orderBy(asc(syncQueue.createdAt), asc(syncQueue.id))
        .limit(limit)
        .all()
        .map(decode);
    });
  }

  async markCompleted(id: number, at = new Date()): Promise<void> {
    this.mustUpdate('mark_completed', id, { status: 'completed', lastError: null, processedAt: at, updatedAt: at });
  }

  async markRetry(id: number, nextRetryAt: Date, error: string): Promise<void> {
    this.mustUpdate('mark_retry', id, {
      status: 'retry',
      retryCount: sql`${syncQueue.retryCount} + 1`,
      lastError: error,
      nextRetryAt,
      updatedAt: new Date(),
    });
  }

  async markFailed(id: number, error: string, at = new Date()): Promise<void> {
    this.mustUpdate('mark_failed', id, {
      status: 'failed',
      retryCount: sql`${syncQueue.retryCount} + 1`,
      lastError: error,
      processedAt: at,
      updatedAt: at,
    });
  }

  async listFailed(limit = 100): Promise<SyncTask[]> {
    return runStorage('list_failed', () =>
      this.db
        .select()
        .from(syncQueue)
        .where(eq(syncQueue.status, 'failed'))
        .orderBy(desc(syncQueue.updatedAt), desc(syncQueue.id))
        .limit(limit)
        .all()
        .map(decode),
    );
  }

  async findById(id: number): Promise<SyncTask | null> {
    return runStorage('get_task', () => {
      const row = this.db.select().from(syncQueue).where(eq(syncQueue.id, id)).get();
      return row ? decode(row) : null;
    });
  }

  async countByStatus(): Promise<Record<string, number>> {
    return runStorage('count_tasks', () => {
      const rows = this.db
        .select({ status: syncQueue.status, count: sql<number>`count(*)` })
        .from(syncQueue)
        .groupBy(syncQueue.status)
        .all();
      return Object.fromEntries(rows.map((r) => [r.status, Number(r.count)]));
    });
  }

  private mustUpdate(operation: string, id: number, set: SQLiteUpdateSetSource<typeof syncQueue>): void {
    runStorage(operation, () => {
      const result = this.db.update(syncQueue).set(set).where(eq(syncQueue.id, id)).run();
      if (result.changes === 0) throw new NotFoundError(`Sync task ${id} not found`);
    });
  }
}
