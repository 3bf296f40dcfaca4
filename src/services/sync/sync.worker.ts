import { setTimeout as sleep } from 'timers/promises';

import { ValidationError } from '@core/errors/validation.error.js';
import { SYNC_TASK_KINDS, type SyncTask, type SyncTaskKind } from '@core/interfaces/sync.types.js';
import type { Store } from '@core/repositories/store.js';

import { scheduleWindowFor, type BookingRules } from '@services/booking/config.defaults.js';

import { logger } from '@utils/logger.js';
import { incrementCounter, setGauge } from '@utils/metrics.js';
import { systemClock, type Clock } from '@utils/time.js';

import type { MirrorSink } from './mirror.sink.js';

export interface SyncWorkerOptions {
  pollIntervalMs: number;
  batchSize: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_SYNC_OPTIONS: SyncWorkerOptions = {
  pollIntervalMs: 2000,
  batchSize: 20,
  maxAttempts: 5,
  baseDelayMs: 2000,
  maxDelayMs: 60_000,
};

/** Delay before the next try after failed attempt `attempt` (1-based). */
export function retryDelay(attempt: number, options: Pick<SyncWorkerOptions, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(options.baseDelayMs * 2 ** (attempt - 1), options.maxDelayMs);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Drains the outbox into the mirror: one loop per task kind, tasks of the
 * same booking serialised through a per-booking gate.
 */
export class SyncWorker {
  private readonly gates = new Map<number, Promise<void>>();

  constructor(
    private readonly store: Store,
    private readonly sink: MirrorSink,
    private readonly rules: BookingRules,
    private readonly options: SyncWorkerOptions = DEFAULT_SYNC_OPTIONS,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Runs until `signal` aborts; resolves once every loop has exited. */
  async start(signal: AbortSignal): Promise<void> {
    logger.info('[sync] worker started', { kinds: SYNC_TASK_KINDS, pollIntervalMs: this.options.pollIntervalMs });
    await Promise.all(SYNC_TASK_KINDS.map((kind) => this.loop(kind, signal)));
    logger.info('[sync] worker stopped');
  }

  /** Leases one batch of due tasks (of `kind`, if given) and processes it. */
  async runOnce(kind?: SyncTaskKind, signal: AbortSignal = new AbortController().signal): Promise<number> {
    const tasks = await this.store.outbox.leaseDue(this.options.batchSize, this.clock(), kind);
    for (const task of tasks) {
      if (signal.aborted) break;
      await this.process(task, signal);
    }
    return tasks.length;
  }

  /** Rewrites the bookings and users sheets for the default window. */
  async syncAllBookings(signal?: AbortSignal): Promise<number> {
    const { startDate, endDate } = scheduleWindowFor(this.rules, this.clock);
    const bookings = await this.store.bookings.listInRange(startDate, endDate);
    await this.sink.replaceBookingsSheet(bookings, signal);
    await this.sink.updateUsersSheet(await this.store.users.listAll(), signal);
    logger.info('[sync] full bookings sync done', { count: bookings.length, startDate, endDate });
    return bookings.length;
  }

  async syncScheduleNow(signal?: AbortSignal): Promise<void> {
    const { startDate, endDate } = scheduleWindowFor(this.rules, this.clock);
    await this.syncSchedule(startDate, endDate, signal);
    logger.info('[sync] schedule sync done', { startDate, endDate });
  }

  private async loop(kind: SyncTaskKind, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.runOnce(kind, signal);
        await this.refreshGauges();
      } catch (err) {
        logger.error('[sync] poll failed', { kind, err });
      }
      try {
        await sleep(this.options.pollIntervalMs, undefined, { signal });
      } catch (err) {
        if (!signal.aborted) throw err;
      }
    }
  }

  private async process(task: SyncTask, signal: AbortSignal): Promise<void> {
    try {
      await this.withGate(task.bookingId, () => this.apply(task, signal));
    } catch (err) {
      if (signal.aborted) {
        logger.info('[sync] task interrupted, left pending', { id: task.id, kind: task.taskType });
        return;
      }
      await this.recordFailure(task, err);
      return;
    }
    await this.store.outbox.markCompleted(task.id, this.clock());
    incrementCounter('sync_completed');
    logger.debug('[sync] task completed', { id: task.id, kind: task.taskType, bookingId: task.bookingId });
  }

  private async recordFailure(task: SyncTask, err: unknown): Promise<void> {
    const attempt = task.retryCount + 1;
    const message = errorMessage(err);
    if (attempt >= this.options.maxAttempts) {
      await this.store.outbox.markFailed(task.id, message, this.clock());
      incrementCounter('sync_failed');
      logger.error('[sync] task failed permanently', { id: task.id, kind: task.taskType, attempt, err });
      return;
    }
    const delay = retryDelay(attempt, this.options);
    await this.store.outbox.markRetry(task.id, new Date(this.clock().getTime() + delay), message);
    incrementCounter('sync_retried');
    logger.warn('[sync] task will retry', { id: task.id, kind: task.taskType, attempt, delayMs: delay, error: message });
  }

  private async apply(task: SyncTask, signal: AbortSignal): Promise<void> {
    switch (task.taskType) {
      case 'upsert': {
        const { booking } = task.payload;
        if (!booking) throw new ValidationError(`Task ${task.id} carries no booking`);
        await this.sink.upsertBooking(booking, signal);
        return;
      }
      case 'update_status': {
        const { status } = task.payload;
        if (!status) throw new ValidationError(`Task ${task.id} carries no status`);
        await this.sink.updateBookingStatus(task.bookingId, status, signal);
        return;
      }
      case 'sync_schedule': {
        const fallback = scheduleWindowFor(this.rules, this.clock);
        await this.syncSchedule(
          task.payload.start_date ?? fallback.startDate,
          task.payload.end_date ?? fallback.endDate,
          signal,
        );
        return;
      }
    }
  }

  private async syncSchedule(startDate: string, endDate: string, signal?: AbortSignal): Promise<void> {
    const daily = await this.store.bookings.dailyInRange(startDate, endDate);
    const items = await this.store.items.listActive();
    await this.sink.updateScheduleSheet(startDate, endDate, daily, items, signal);
  }

  /** Chains `fn` behind earlier work for the same booking. Booking 0 is never gated. */
  private withGate(bookingId: number, fn: () => Promise<void>): Promise<void> {
    if (bookingId === 0) return fn();
    const previous = this.gates.get(bookingId) ?? Promise.resolve();
    const run = previous.then(fn);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.gates.set(bookingId, settled);
    void settled.then(() => {
      if (this.gates.get(bookingId) === settled) this.gates.delete(bookingId);
    });
    return run;
  }

  private async refreshGauges(): Promise<void> {
    const counts = await this.store.outbox.countByStatus();
    for (const [status, count] of Object.entries(counts)) {
      setGauge(`outbox_${status}`, count);
    }
  }
}
