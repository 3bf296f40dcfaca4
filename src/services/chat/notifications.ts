import { z } from 'zod';

import type { BookingService } from '@services/booking/booking.service.js';
import type { DomainEvent, EventBus } from '@services/events/event-bus.js';

import { logger } from '@utils/logger.js';

import { bookingActions } from './keyboards.js';
import type { Messenger } from './messenger.js';
import { newBookingForManagers } from './texts.js';

const CreatedPayloadSchema = z.object({
  booking_id: z.number().int(),
  changed_by: z.string(),
});

/**
 * Tells every configured manager about bookings users create themselves.
 * Bookings a manager enters on a client's behalf are not announced.
 */
export class ManagerNotifier {
  constructor(
    private readonly bookings: BookingService,
    private readonly messenger: Messenger,
    private readonly managerIds: readonly number[],
  ) {}

  /** Returns the unsubscribe function. */
  attach(bus: EventBus): () => void {
    return bus.subscribe('booking_created', (event) => this.onCreated(event));
  }

  async onCreated(event: DomainEvent): Promise<void> {
    const parsed = CreatedPayloadSchema.safeParse(JSON.parse(event.payload));
    if (!parsed.success) {
      logger.warn('[notify] malformed booking_created payload', { issues: parsed.error.issues });
      return;
    }
    if (parsed.data.changed_by !== 'user') return;

    const booking = await this.bookings.getBooking(parsed.data.booking_id);
    const text = newBookingForManagers(booking);
    const keyboard = bookingActions(booking);
    for (const managerId of this.managerIds) {
      await this.messenger.inline(managerId, text, keyboard);
    }
    logger.info('[notify] managers notified', { bookingId: booking.id, managers: this.managerIds.length });
  }
}
