import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { BookingService } from '@services/booking/booking.service.js';
import { bookingActions } from '@services/chat/keyboards.js';
import { Messenger } from '@services/chat/messenger.js';
import { ManagerNotifier } from '@services/chat/notifications.js';
import { EventBus } from '@services/events/event-bus.js';

import { FakeTransport } from '@test/utils/chat.harness.js';
import { createTestStore, fixedClock, seedItem, testRules, type TestStore } from '@test/utils/fixtures.js';

describe('ManagerNotifier', () => {
  let handle: TestStore;
  let transport: FakeTransport;
  let bookings: BookingService;
  let notifier: ManagerNotifier;

  beforeEach(() => {
    handle = createTestStore();
    transport = new FakeTransport();
    bookings = new BookingService(handle.store, new EventBus(), testRules(), fixedClock());
    notifier = new ManagerNotifier(bookings, new Messenger(transport), [1, 2]);
  });

  afterEach(() => handle.close());

  async function createdEvent(changedBy: string) {
    const boat = await seedItem(handle.store, 'Лодка', 1);
    const booking = await handle.store.bookings.createWithLock({
      userId: 100,
      userName: 'Иван',
      userNickname: 'ivan',
      phone: '79991234567',
      itemId: boat.id,
      itemName: boat.name,
      date: '2025-06-12',
      comment: '',
    });
    const event = {
      type: 'booking_created' as const,
      payload: JSON.stringify({ booking_id: booking.id, changed_by: changedBy }),
      createdAt: new Date(),
    };
    return { booking, event };
  }

  it('sends every manager the card with its actions', async () => {
    const { booking, event } = await createdEvent('user');

    await notifier.onCreated(event);

    expect(transport.sent.map((m) => [m.method, m.chatId])).toEqual([
      ['inline', 1],
      ['inline', 2],
    ]);
    expect(transport.last(2)?.text?.split('\n')[0]).toBe('🆕 Новая заявка');
    expect(transport.last(2)?.keyboard).toEqual(bookingActions(booking));
  });

  it('stays quiet about bookings managers entered', async () => {
    const { event } = await createdEvent('manager');

    await notifier.onCreated(event);

    expect(transport.sent).toHaveLength(0);
  });

  it('skips malformed payloads', async () => {
    await notifier.onCreated({ type: 'booking_created', payload: '{"booking_id":"x"}', createdAt: new Date() });

    expect(transport.sent).toHaveLength(0);
  });

  it('reaches the remaining managers when one is unreachable', async () => {
    const { event } = await createdEvent('user');
    transport.unreachable.add(1);

    await notifier.onCreated(event);

    expect(transport.sent.map((m) => m.chatId)).toEqual([2]);
  });
});
