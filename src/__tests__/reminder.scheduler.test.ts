import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ValidationError } from '@core/errors/validation.error.js';
import type { BookingStatus } from '@core/interfaces/booking.types.js';
import type { Item } from '@core/interfaces/item.types.js';

import { Messenger } from '@services/chat/messenger.js';
import { ReminderScheduler } from '@services/reminders/reminder.scheduler.js';

import { getCounter, resetMetrics } from '@utils/metrics.js';

import { FakeTransport } from '@test/utils/chat.harness.js';
import { createTestStore, fixedClock, seedItem, TZ, type TestStore } from '@test/utils/fixtures.js';

describe('ReminderScheduler', () => {
  let handle: TestStore;
  let transport: FakeTransport;
  let scheduler: ReminderScheduler;
  let boat: Item;

  beforeEach(async () => {
    resetMetrics();
    handle = createTestStore();
    transport = new FakeTransport();
    scheduler = new ReminderScheduler(
      handle.store,
      new Messenger(transport),
      { time: '10:00', timezone: TZ },
      fixedClock(),
    );
    boat = await seedItem(handle.store, 'Лодка', 10);
  });

  afterEach(() => handle.close());

  async function book(userId: number, date: string, status: BookingStatus): Promise<void> {
    await handle.store.bookings.createWithLock({
      userId,
      userName: 'Иван',
      userNickname: '',
      phone: '',
      itemId: boat.id,
      itemName: boat.name,
      date,
      comment: '',
      status,
    });
  }

  it('reminds owners of tomorrow confirmed and changed bookings', async () => {
    await book(101, '2025-06-11', 'confirmed');
    await book(102, '2025-06-11', 'changed');
    await book(103, '2025-06-11', 'pending');
    await book(104, '2025-06-12', 'confirmed');

    expect(await scheduler.runOnce()).toBe(2);

    expect(transport.sent.map((m) => m.chatId)).toEqual([101, 102]);
    expect(transport.last(101)?.text).toBe('Напоминание: завтра у вас бронь Лодка на 11.06.2025. Статус: ✅ Подтверждена');
    expect(getCounter('reminders_sent')).toBe(2);
  });

  it('counts only the reminders that went out', async () => {
    await book(101, '2025-06-11', 'confirmed');
    await book(102, '2025-06-11', 'confirmed');
    transport.unreachable.add(101);

    expect(await scheduler.runOnce()).toBe(1);
    expect(transport.sent.map((m) => m.chatId)).toEqual([102]);
  });

  it('rejects a malformed time of day', () => {
    expect(
      () => new ReminderScheduler(handle.store, new Messenger(transport), { time: '9am', timezone: TZ }),
    ).toThrow(ValidationError);
  });

  it('stops waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const running = scheduler.start(controller.signal);
    controller.abort();

    await expect(running).resolves.toBeUndefined();
    expect(transport.sent).toHaveLength(0);
  });
});
