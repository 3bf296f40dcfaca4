import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { TransportError } from '@core/errors/infra.errors.js';
import type { Booking } from '@core/interfaces/booking.types.js';
import type { Item } from '@core/interfaces/item.types.js';
import type { Store } from '@core/repositories/store.js';

import { MemoryMirrorSink } from '@services/sync/mirror.sink.js';
import { DEFAULT_SYNC_OPTIONS, retryDelay, SyncWorker } from '@services/sync/sync.worker.js';

import { getCounter, resetMetrics } from '@utils/metrics.js';

import { createTestStore, ManualClock, NOW, seedItem, testRules, type TestStore } from '@test/utils/fixtures.js';

/** Fails the first `failures` upserts, then behaves like the memory mirror. */
class FlakySink extends MemoryMirrorSink {
  calls = 0;

  constructor(private failures: number) {
    super();
  }

  override async upsertBooking(booking: Booking): Promise<void> {
    this.calls += 1;
    if (this.failures > 0) {
      this.failures -= 1;
      throw new TransportError('mirror unreachable');
    }
    await super.upsertBooking(booking);
  }
}

/** Hangs on every upsert until the signal aborts. */
class StallingSink extends MemoryMirrorSink {
  private notify: () => void = () => undefined;
  readonly started = new Promise<void>((resolve) => {
    this.notify = resolve;
  });

  override upsertBooking(_booking: Booking, signal?: AbortSignal): Promise<void> {
    this.notify();
    return new Promise((_resolve, reject) => {
      signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  }
}

describe('retryDelay', () => {
  it('doubles from the base delay and caps at the maximum', () => {
    const opts = { baseDelayMs: 2000, maxDelayMs: 60_000 };
    expect(retryDelay(1, opts)).toBe(2000);
    expect(retryDelay(2, opts)).toBe(4000);
    expect(retryDelay(5, opts)).toBe(32_000);
    expect(retryDelay(6, opts)).toBe(60_000);
  });
});

describe('SyncWorker', () => {
  let handle: TestStore;
  let store: Store;
  let clock: ManualClock;
  let boat: Item;
  let booking: Booking;

  beforeEach(async () => {
    resetMetrics();
    handle = createTestStore();
    store = handle.store;
    clock = new ManualClock();
    boat = await seedItem(store, 'Лодка', 2);
    booking = await store.bookings.createWithLock({
      userId: 100,
      userName: 'Иван',
      userNickname: 'ivan',
      phone: '79991234567',
      itemId: boat.id,
      itemName: boat.name,
      date: '2025-06-12',
      comment: '',
    });
  });

  afterEach(() => handle.close());

  function workerFor(sink: MemoryMirrorSink): SyncWorker {
    return new SyncWorker(store, sink, testRules(), DEFAULT_SYNC_OPTIONS, clock.now);
  }

  it('mirrors an upsert and completes the task', async () => {
    const sink = new MemoryMirrorSink();
    const task = await store.outbox.enqueue({ kind: 'upsert', booking });

    expect(await workerFor(sink).runOnce('upsert')).toBe(1);

    expect(sink.rows.get(booking.id)?.item_name).toBe('Лодка');
    expect((await store.outbox.findById(task.id))?.status).toBe('completed');
    expect(getCounter('sync_completed')).toBe(1);
  });

  it('retries a failed task after the backoff delay', async () => {
    const sink = new FlakySink(1);
    const worker = workerFor(sink);
    const task = await store.outbox.enqueue({ kind: 'upsert', booking });

    await worker.runOnce('upsert');
    const retrying = await store.outbox.findById(task.id);
    expect(retrying?.status).toBe('retry');
    expect(retrying?.retryCount).toBe(1);
    expect(retrying?.lastError).toBe('mirror unreachable');
    expect(retrying?.nextRetryAt?.getTime()).toBe(NOW.getTime() + 2000);

    expect(await worker.runOnce('upsert')).toBe(0);

    clock.advance(2000);
    expect(await worker.runOnce('upsert')).toBe(1);
    expect((await store.outbox.findById(task.id))?.status).toBe('completed');
    expect(sink.calls).toBe(2);
    expect(getCounter('sync_retried')).toBe(1);
  });

  it('gives up after the configured number of attempts', async () => {
    const sink = new FlakySink(Number.POSITIVE_INFINITY);
    const worker = workerFor(sink);
    const task = await store.outbox.enqueue({ kind: 'upsert', booking });

    for (let i = 0; i < DEFAULT_SYNC_OPTIONS.maxAttempts; i += 1) {
      await worker.runOnce('upsert');
      clock.advance(DEFAULT_SYNC_OPTIONS.maxDelayMs);
    }

    const failed = await store.outbox.findById(task.id);
    expect(failed?.status).toBe('failed');
    expect(failed?.retryCount).toBe(5);
    expect(sink.calls).toBe(5);
    expect(getCounter('sync_failed')).toBe(1);
    expect(await store.outbox.listFailed()).toHaveLength(1);

    expect(await worker.runOnce('upsert')).toBe(0);
  });

  it('applies the tasks of one booking in enqueue order', async () => {
    const sink = new MemoryMirrorSink();
    const worker = workerFor(sink);
    await store.outbox.enqueue({ kind: 'upsert', booking });
    await store.outbox.enqueue({ kind: 'update_status', bookingId: booking.id, status: 'confirmed' });

    expect(await worker.runOnce('update_status')).toBe(0);
    expect(await worker.runOnce()).toBe(1);
    expect(sink.rows.get(booking.id)?.status).toBe('pending');

    expect(await worker.runOnce()).toBe(1);
    expect(sink.rows.get(booking.id)?.status).toBe('confirmed');
  });

  it('leases the oldest task of each booking and every schedule task', async () => {
    const other = await store.bookings.createWithLock({
      userId: 200,
      userName: 'Пётр',
      userNickname: '',
      phone: '',
      itemId: boat.id,
      itemName: boat.name,
      date: '2025-06-13',
      comment: '',
    });
    const first = await store.outbox.enqueue({ kind: 'upsert', booking });
    const held = await store.outbox.enqueue({ kind: 'update_status', bookingId: booking.id, status: 'confirmed' });
    const second = await store.outbox.enqueue({ kind: 'upsert', booking: other });
    const schedule = await store.outbox.enqueue({ kind: 'sync_schedule', startDate: '2025-06-01', endDate: '2025-06-30' });
    const again = await store.outbox.enqueue({ kind: 'sync_schedule', startDate: '2025-06-01', endDate: '2025-06-30' });

    const due = await store.outbox.leaseDue(10, NOW);
    expect(due.map((t) => t.id)).toEqual([first.id, second.id, schedule.id, again.id]);

    await store.outbox.markCompleted(first.id);
    const next = await store.outbox.leaseDue(10, NOW, 'update_status');
    expect(next.map((t) => t.id)).toEqual([held.id]);
  });

  it('leaves an interrupted task pending without counting an attempt', async () => {
    const sink = new StallingSink();
    const task = await store.outbox.enqueue({ kind: 'upsert', booking });
    const controller = new AbortController();

    const running = workerFor(sink).runOnce('upsert', controller.signal);
    await sink.started;
    controller.abort();

    expect(await running).toBe(1);
    const row = await store.outbox.findById(task.id);
    expect(row?.status).toBe('pending');
    expect(row?.retryCount).toBe(0);
    expect(row?.lastError).toBeNull();
    expect(getCounter('sync_retried')).toBe(0);

    const mirror = new MemoryMirrorSink();
    expect(await workerFor(mirror).runOnce('upsert')).toBe(1);
    expect((await store.outbox.findById(task.id))?.status).toBe('completed');
  });

  it('rewrites the schedule window carried by the task', async () => {
    const sink = new MemoryMirrorSink();
    await store.outbox.enqueue({ kind: 'sync_schedule', startDate: '2025-06-01', endDate: '2025-06-30' });

    await workerFor(sink).runOnce('sync_schedule');

    expect(sink.schedule?.startDate).toBe('2025-06-01');
    expect(sink.schedule?.endDate).toBe('2025-06-30');
    expect(sink.schedule?.daily['2025-06-12']?.map((b) => b.id)).toEqual([booking.id]);
    expect(sink.schedule?.items.map((i) => i.name)).toEqual(['Лодка']);
  });

  it('replaces the bookings sheet on a full sync', async () => {
    const sink = new MemoryMirrorSink();
    await sink.upsertBooking({ ...booking, id: 999 });

    expect(await workerFor(sink).syncAllBookings()).toBe(1);
    expect([...sink.rows.keys()]).toEqual([booking.id]);
  });

  it('stops when the signal aborts', async () => {
    const controller = new AbortController();
    const worker = new SyncWorker(
      store,
      new MemoryMirrorSink(),
      testRules(),
      { ...DEFAULT_SYNC_OPTIONS, pollIntervalMs: 5 },
      clock.now,
    );

    const running = worker.start(controller.signal);
    controller.abort();

    await expect(running).resolves.toBeUndefined();
  });
});
