import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { BusinessRuleError } from '@core/errors/business-rule.error.js';
import { ConcurrentModificationError, NotAvailableError } from '@core/errors/booking.errors.js';
import { NotFoundError } from '@core/errors/not-found.error.js';
import type { NewBooking } from '@core/interfaces/booking.types.js';
import type { Item } from '@core/interfaces/item.types.js';
import type { Store } from '@core/repositories/store.js';

import { BookingService } from '@services/booking/booking.service.js';
import type { EventPublisher, EventType } from '@services/events/event-bus.js';

import { getCounter, resetMetrics } from '@utils/metrics.js';

import { createTestStore, fixedClock, seedItem, testRules, type TestStore } from '@test/utils/fixtures.js';

class RecordingPublisher implements EventPublisher {
  readonly events: Array<{ type: EventType; payload: Record<string, unknown> }> = [];

  publishJSON(type: EventType, payload: unknown): void {
    this.events.push({ type, payload: JSON.parse(JSON.stringify(payload)) });
  }
}

function request(item: Item, date: string, userId = 100): NewBooking {
  return {
    userId,
    userName: 'Иван',
    userNickname: 'ivan',
    phone: '79991234567',
    itemId: item.id,
    itemName: item.name,
    date,
    comment: '',
  };
}

describe('BookingService', () => {
  let handle: TestStore;
  let store: Store;
  let events: RecordingPublisher;
  let service: BookingService;
  let boat: Item;

  beforeEach(async () => {
    resetMetrics();
    handle = createTestStore();
    store = handle.store;
    events = new RecordingPublisher();
    service = new BookingService(store, events, testRules(), fixedClock());
    boat = await seedItem(store, 'Лодка', 1);
  });

  afterEach(() => handle.close());

  describe('createBooking', () => {
    it('creates a pending booking at version 1', async () => {
      const booking = await service.createBooking(request(boat, '2025-06-12'));

      expect(booking.status).toBe('pending');
      expect(booking.version).toBe(1);
      expect(await service.getBookedCount(boat.id, '2025-06-12')).toBe(1);
      expect(getCounter('booking_created')).toBe(1);
    });

    it('publishes booking_created with the acting user', async () => {
      const booking = await service.createBooking(request(boat, '2025-06-12'));

      expect(events.events).toHaveLength(1);
      expect(events.events[0]?.type).toBe('booking_created');
      expect(events.events[0]?.payload).toMatchObject({
        booking_id: booking.id,
        item_name: 'Лодка',
        status: 'pending',
        changed_by: 'user',
        changed_by_id: 100,
      });
    });

    it('enqueues an upsert followed by a schedule resync', async () => {
      const booking = await service.createBooking(request(boat, '2025-06-12'));

      const tasks = await store.outbox.leaseDue(10, new Date());
      expect(tasks.map((t) => t.taskType)).toEqual(['upsert', 'sync_schedule']);
      expect(tasks[0]?.bookingId).toBe(booking.id);
      expect(tasks[0]?.payload.booking?.id).toBe(booking.id);
      expect(tasks[1]?.bookingId).toBe(0);
      expect(tasks[1]?.payload).toEqual({ start_date: '2025-05-10', end_date: '2025-08-10' });
    });

    it('refuses a date with no free unit', async () => {
      await service.createBooking(request(boat, '2025-06-12'));

      await expect(service.createBooking(request(boat, '2025-06-12', 200))).rejects.toBeInstanceOf(
        NotAvailableError,
      );
      expect(events.events).toHaveLength(1);
    });

    it('lets exactly one of two concurrent requests take the last unit', async () => {
      const results = await Promise.allSettled([
        service.createBooking(request(boat, '2025-06-12', 100)),
        service.createBooking(request(boat, '2025-06-12', 200)),
      ]);

      const fulfilled = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]).toBeInstanceOf(NotAvailableError);
      expect(await service.getBookedCount(boat.id, '2025-06-12')).toBe(1);
    });

    it('frees the unit once a booking is canceled', async () => {
      const booking = await service.createBooking(request(boat, '2025-06-12'));
      await service.rejectBooking(booking.id, booking.version, 1);

      expect(await service.checkAvailability(boat.id, '2025-06-12')).toBe(true);
    });
  });

  describe('transitions', () => {
    it('confirms and bumps the version', async () => {
      const booking = await service.createBooking(request(boat, '2025-06-12'));
      const confirmed = await service.confirmBooking(booking.id, 1, 1);

      expect(confirmed.status).toBe('confirmed');
      expect(confirmed.version).toBe(2);
      expect(events.events.map((e) => e.type)).toEqual(['booking_created', 'booking_confirmed']);
      expect(events.events[1]?.payload).toMatchObject({ changed_by: 'manager', changed_by_id: 1 });
    });

    it('holds a status update behind the earlier upsert of its booking', async () => {
      const booking = await service.createBooking(request(boat, '2025-06-12'));
      await service.confirmBooking(booking.id, 1, 1);

      expect(await store.outbox.countByStatus()).toEqual({ pending: 4 });
      const due = await store.outbox.leaseDue(10, new Date());
      expect(due.map((t) => t.taskType)).toEqual(['upsert', 'sync_schedule', 'sync_schedule']);

      const upsert = due[0];
      if (!upsert) throw new Error('upsert not leased');
      await store.outbox.markCompleted(upsert.id);
      const next = await store.outbox.leaseDue(10, new Date(), 'update_status');
      expect(next.map((t) => t.payload)).toEqual([{ status: 'confirmed' }]);
    });

    it('rejects a stale version before checking legality', async () => {
      const booking = await service.createBooking(request(boat, '2025-06-12'));
      await service.confirmBooking(booking.id, 1, 1);

      await expect(service.confirmBooking(booking.id, 1, 1)).rejects.toBeInstanceOf(ConcurrentModificationError);
    });

    it('refuses illegal transitions', async () => {
      const booking = await service.createBooking(request(boat, '2025-06-12'));

      await expect(service.completeBooking(booking.id, 1, 1)).rejects.toBeInstanceOf(BusinessRuleError);
      expect((await service.getBooking(booking.id)).status).toBe('pending');
    });

    it('walks confirm, reopen, confirm, complete', async () => {
      const booking = await service.createBooking(request(boat, '2025-06-12'));
      await service.confirmBooking(booking.id, 1, 1);
      await service.reopenBooking(booking.id, 2, 1);
      await service.confirmBooking(booking.id, 3, 1);
      const done = await service.completeBooking(booking.id, 4, 1);

      expect(done.status).toBe('completed');
      expect(done.version).toBe(5);
      expect(await service.checkAvailability(boat.id, '2025-06-12')).toBe(true);
    });

    it('keeps a rescheduled booking holding its unit', async () => {
      const booking = await service.createBooking(request(boat, '2025-06-12'));
      const moved = await service.rescheduleBooking(booking.id, 1, 1);

      expect(moved.status).toBe('rescheduled');
      expect(await service.checkAvailability(boat.id, '2025-06-12')).toBe(false);
    });

    it('reports unknown bookings', async () => {
      await expect(service.confirmBooking(999, 1, 1)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('changeBookingItem', () => {
    it('moves the booking and marks it changed', async () => {
      const kayak = await seedItem(store, 'Каяк', 1);
      const booking = await service.createBooking(request(boat, '2025-06-12'));

      const changed = await service.changeBookingItem(booking.id, 1, kayak.id, 1);

      expect(changed).toMatchObject({ itemId: kayak.id, itemName: 'Каяк', status: 'changed', version: 2 });
      expect(await service.checkAvailability(boat.id, '2025-06-12')).toBe(true);
      expect(await service.checkAvailability(kayak.id, '2025-06-12')).toBe(false);
      expect(events.events.at(-1)?.type).toBe('booking_item_changed');
    });

    it('refuses a target item without a free unit', async () => {
      const kayak = await seedItem(store, 'Каяк', 1);
      await service.createBooking(request(kayak, '2025-06-12', 300));
      const booking = await service.createBooking(request(boat, '2025-06-12'));

      await expect(service.changeBookingItem(booking.id, 1, kayak.id, 1)).rejects.toBeInstanceOf(NotAvailableError);
    });

    it('refuses an inactive target item', async () => {
      const kayak = await seedItem(store, 'Каяк', 1);
      await store.items.deactivate(kayak.id);
      const booking = await service.createBooking(request(boat, '2025-06-12'));

      await expect(service.changeBookingItem(booking.id, 1, kayak.id, 1)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('createManagerBookings', () => {
    it('creates confirmed bookings and reports the dates it skipped', async () => {
      await service.createBooking(request(boat, '2025-06-12'));

      const result = await service.createManagerBookings(
        { managerId: 1, clientName: 'Пётр', clientPhone: '79990000000', itemId: boat.id, comment: 'с веслами' },
        ['2025-06-11', '2025-06-12', '2025-06-09'],
      );

      expect(result.created.map((b) => [b.date, b.status])).toEqual([['2025-06-11', 'confirmed']]);
      expect(result.failed).toEqual([
        { date: '2025-06-12', reason: 'NOT_AVAILABLE' },
        { date: '2025-06-09', reason: 'PAST_DATE' },
      ]);
      expect(result.created[0]).toMatchObject({ userId: 1, userName: 'Пётр', comment: 'с веслами' });
      expect(events.events.at(-1)?.payload).toMatchObject({ changed_by: 'manager', changed_by_id: 1 });
    });

    it('fails fast on an unknown item', async () => {
      await expect(
        service.createManagerBookings(
          { managerId: 1, clientName: 'Пётр', clientPhone: '79990000000', itemId: 999, comment: '' },
          ['2025-06-11'],
        ),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it('groups bookings by day', async () => {
    const kayak = await seedItem(store, 'Каяк', 2);
    await service.createBooking(request(kayak, '2025-06-12'));
    await service.createBooking(request(kayak, '2025-06-12', 200));
    await service.createBooking(request(boat, '2025-06-13'));

    const daily = await service.getDailyBookings('2025-06-12', '2025-06-13');
    expect(Object.keys(daily)).toEqual(['2025-06-12', '2025-06-13']);
    expect(daily['2025-06-12']).toHaveLength(2);

    const grid = await service.getAvailability(kayak.id, '2025-06-12', 2);
    expect(grid).toEqual([
      { date: '2025-06-12', booked: 2, available: 0 },
      { date: '2025-06-13', booked: 0, available: 2 },
    ]);
  });
});
