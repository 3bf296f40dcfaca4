import { BaseError } from '@core/errors/base-error.js';
import { BusinessRuleError } from '@core/errors/business-rule.error.js';
import { ConcurrentModificationError, NotAvailableError } from '@core/errors/booking.errors.js';
import { NotFoundError } from '@core/errors/not-found.error.js';
import {
  BOOKING_TRANSITIONS,
  canTransition,
  type Booking,
  type BookingAction,
  type DailyBookings,
  type DayAvailability,
  type ManagerBookingRequest,
  type ManagerBookingResult,
  type NewBooking,
} from '@core/interfaces/booking.types.js';
import type { EnqueueTaskInput } from '@core/interfaces/sync.types.js';
import type { Store } from '@core/repositories/store.js';

import type { BookingEventPayload, EventPublisher, EventType } from '@services/events/event-bus.js';

import { logger } from '@utils/logger.js';
import { incrementCounter } from '@utils/metrics.js';
import { systemClock, type Clock } from '@utils/time.js';

import { AvailabilityService } from './availability.service.js';
import { readBookingRules, scheduleWindowFor, type BookingRules, type ScheduleWindow } from './config.defaults.js';
import { ValidationService } from './validation.service.js';

export interface Actor {
  kind: 'user' | 'manager';
  id: number;
}

const ACTION_EVENTS: Partial<Record<BookingAction, EventType>> = {
  confirm: 'booking_confirmed',
  reject: 'booking_canceled',
  complete: 'booking_completed',
  change_item: 'booking_item_changed',
};

const ACTION_COUNTERS: Record<BookingAction, string> = {
  confirm: 'booking_confirmed',
  reject: 'booking_canceled',
  complete: 'booking_completed',
  reopen: 'booking_reopened',
  reschedule: 'booking_rescheduled',
  change_item: 'booking_item_changed',
};

/**
 * Drives the booking lifecycle. Every successful mutation publishes its
 * domain event and enqueues the outbox tasks that mirror it.
 */
export class BookingService {
  readonly availability: AvailabilityService;

  constructor(
    private readonly store: Store,
    private readonly events: EventPublisher,
    private readonly rules: BookingRules = readBookingRules(),
    private readonly clock: Clock = systemClock,
    private readonly validation = new ValidationService(rules, clock),
  ) {
    this.availability = new AvailabilityService(store, rules.timezone);
  }

  validateDate(date: string): void {
    this.validation.validateDate(date);
  }

  validateRange(start: string, end: string): string[] {
    return this.validation.validateRange(start, end);
  }

  get maxBookingDays(): number {
    return this.rules.maxBookingDays;
  }

  async createBooking(input: NewBooking, actor: Actor = { kind: 'user', id: input.userId }): Promise<Booking> {
    this.validation.validateDate(input.date);

    const available = await this.availability.checkAvailability(input.itemId, input.date);
    if (!available) throw new NotAvailableError(input.itemId, input.date);

    const created = await this.store.bookings.createWithLock(input);

    incrementCounter('booking_created');
    logger.info('[booking] created', { id: created.id, itemId: created.itemId, date: created.date, status: created.status });
    this.publish('booking_created', created, actor);
    await this.enqueueSync({ kind: 'upsert', booking: created });
    return created;
  }

  /**
   * Creates confirmed bookings on behalf of a client, one per date. Dates that
   * fail validation or capacity are reported instead of aborting the batch.
   */
  async createManagerBookings(request: ManagerBookingRequest, dates: string[]): Promise<ManagerBookingResult> {
    const item = await this.store.items.findById(request.itemId);
    if (!item) throw new NotFoundError(`Item ${request.itemId} not found`);

    const result: ManagerBookingResult = { created: [], failed: [] };
    for (const date of dates) {
      try {
        const booking = await this.createBooking(
          {
            userId: request.managerId,
            userName: request.clientName,
            userNickname: request.clientName,
            phone: request.clientPhone,
            itemId: item.id,
            itemName: item.name,
            date,
            comment: request.comment,
            status: 'confirmed',
          },
          { kind: 'manager', id: request.managerId },
        );
        result.created.push(booking);
      } catch (err) {
        if (!(err instanceof BaseError)) throw err;
        logger.warn('[booking] manager booking skipped', { date, code: err.code });
        result.failed.push({ date, reason: err.code });
      }
    }
    return result;
  }

  async confirmBooking(id: number, version: number, managerId: number): Promise<Booking> {
    return this.transition('confirm', id, version, managerId);
  }

  async rejectBooking(id: number, version: number, managerId: number): Promise<Booking> {
    return this.transition('reject', id, version, managerId);
  }

  async completeBooking(id: number, version: number, managerId: number): Promise<Booking> {
    return this.transition('complete', id, version, managerId);
  }

  async reopenBooking(id: number, version: number, managerId: number): Promise<Booking> {
    return this.transition('reopen', id, version, managerId);
  }

  async rescheduleBooking(id: number, version: number, managerId: number): Promise<Booking> {
    return this.transition('reschedule', id, version, managerId);
  }

  async changeBookingItem(id: number, version: number, newItemId: number, managerId: number): Promise<Booking> {
    const item = await this.store.items.findById(newItemId);
    if (!item || !item.isActive) throw new NotFoundError(`Item ${newItemId} not found`);

    const { booking, available } = await this.store.bookings.findWithAvailability(id, newItemId);
    this.assertTransition(booking, 'change_item', version);
    if (!available) throw new NotAvailableError(newItemId, booking.date);

    const updated = await this.store.bookings.updateItemAndStatusWithVersion(
      id,
      version,
      item.id,
      item.name,
      BOOKING_TRANSITIONS.change_item.to,
    );

    incrementCounter(ACTION_COUNTERS.change_item);
    logger.info('[booking] item changed', { id, from: booking.itemId, to: item.id, managerId });
    this.publish('booking_item_changed', updated, { kind: 'manager', id: managerId });
    await this.enqueueSync({ kind: 'upsert', booking: updated });
    return updated;
  }

  async getBooking(id: number): Promise<Booking> {
    const booking = await this.store.bookings.findById(id);
    if (!booking) throw new NotFoundError(`Booking ${id} not found`);
    return booking;
  }

  async checkAvailability(itemId: number, date: string): Promise<boolean> {
    return this.availability.checkAvailability(itemId, date);
  }

  async getBookedCount(itemId: number, date: string): Promise<number> {
    return this.availability.bookedCount(itemId, date);
  }

  async getAvailability(itemId: number, start: string, days: number): Promise<DayAvailability[]> {
    return this.availability.getAvailability(itemId, start, days);
  }

  async getBookingsByDateRange(start: string, end: string): Promise<Booking[]> {
    return this.store.bookings.listInRange(start, end);
  }

  async getDailyBookings(start: string, end: string): Promise<DailyBookings> {
    return this.store.bookings.dailyInRange(start, end);
  }

  scheduleWindow(): ScheduleWindow {
    return scheduleWindowFor(this.rules, this.clock);
  }

  private async transition(action: BookingAction, id: number, version: number, managerId: number): Promise<Booking> {
    const current = await this.getBooking(id);
    this.assertTransition(current, action, version);

    const updated = await this.store.bookings.updateStatusWithVersion(id, version, BOOKING_TRANSITIONS[action].to);

    incrementCounter(ACTION_COUNTERS[action]);
    logger.info(`[booking] ${action}`, { id, from: current.status, to: updated.status, version: updated.version, managerId });

    const event = ACTION_EVENTS[action];
    if (event) this.publish(event, updated, { kind: 'manager', id: managerId });
    await this.enqueueSync({ kind: 'update_status', bookingId: updated.id, status: updated.status });
    return updated;
  }

  private assertTransition(booking: Booking, action: BookingAction, version: number): void {
    if (booking.version !== version) {
      throw new ConcurrentModificationError(
        `Booking ${booking.id} is at version ${booking.version}, expected ${version}`,
      );
    }
    if (!canTransition(booking.status, action)) {
      throw new BusinessRuleError(`Cannot ${action} a booking in status ${booking.status}`);
    }
  }

  private publish(type: EventType, booking: Booking, actor: Actor): void {
    const payload: BookingEventPayload = {
      booking_id: booking.id,
      user_id: booking.userId,
      user_name: booking.userName,
      item_id: booking.itemId,
      item_name: booking.itemName,
      status: booking.status,
      date: booking.date,
      comment: booking.comment,
      changed_by: actor.kind,
      changed_by_id: actor.id,
    };
    this.events.publishJSON(type, payload);
  }

  /** The booking task first, then a schedule resync for the default window. */
  private async enqueueSync(task: EnqueueTaskInput): Promise<void> {
    try {
      await this.store.outbox.enqueue(task);
      await this.store.outbox.enqueue({ kind: 'sync_schedule', ...this.scheduleWindow() });
    } catch (err) {
      incrementCounter('outbox_enqueue_failed');
      logger.error('[booking] outbox enqueue failed', { kind: task.kind, err });
    }
  }
}
