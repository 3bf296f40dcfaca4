import { and, asc, desc, eq, gte, inArray, lte, ne, sql } from 'drizzle-orm';

import { ConcurrentModificationError, NotAvailableError } from '@core/errors/booking.errors.js';
import { NotFoundError } from '@core/errors/not-found.error.js';
import {
  ACTIVE_STATUSES,
  type Booking,
  type BookingStatus,
  type DailyBookings,
  type DayAvailability,
  type NewBooking,
} from '@core/interfaces/booking.types.js';

import type { AppDatabase } from '@infra/database/sqlite.client.js';
import { bookings, items } from '@infra/database/schema.js';

import { runStorage, withBusyRetry, type BusyRetryOptions } from './storage.util.js';

type Reader = Pick<AppDatabase, 'select'>;

function countActive(db: Reader, itemId: number, date: string, excludeId?: number): number {
  const conditions = [
    eq(bookings.itemId, itemId),
    eq(bookings.date, date),
    inArray(bookings.status, [...ACTIVE_STATUSES]),
  ];
  if (excludeId !== undefined) conditions.push(ne(bookings.id, excludeId));
  const row = db
    .select({ count: sql<number>`count(*)` })
    .from(bookings)
    .where(and(...conditions))
    .get();
  return Number(row?.count ?? 0);
}

function capacityOf(db: Reader, itemId: number): number {
  const item = db.select({ totalQuantity: items.totalQuantity }).from(items).where(eq(items.id, itemId)).get();
  if (!item) throw new NotFoundError(`Item ${itemId} not found`);
  return item.totalQuantity;
}

export interface BookingWithAvailability {
  booking: Booking;
  available: boolean;
}

export class BookingRepository {
  constructor(
    private readonly db: AppDatabase,
    private readonly retry: BusyRetryOptions = {},
  ) {}

  async findById(id: number): Promise<Booking | null> {
    return runStorage('get_booking', () => this.db.select().from(bookings).where(eq(bookings.id, id)).get() ?? null);
  }

  /** Inclusive range of day keys, ordered by date then id. */
  async listInRange(start: string, end: string): Promise<Booking[]> {
    return runStorage('list_bookings_in_range', () =>
      this.db
        .select()
        .from(bookings)
        .where(and(gte(bookings.date, start), lte(bookings.date, end)))
        .orderBy(asc(bookings.date), asc(bookings.id))
        .all(),
    );
  }

  async dailyInRange(start: string, end: string): Promise<DailyBookings> {
    const list = await this.listInRange(start, end);
    const daily: DailyBookings = {};
    for (const b of list) {
      (daily[b.date] ??= []).push(b);
    }
    return daily;
  }

  /** Bookings of one status-agnostic date, used by the reminder. */
  async listOnDate(date: string, statuses: readonly BookingStatus[]): Promise<Booking[]> {
    return runStorage('list_bookings_on_date', () =>
      this.db
        .select()
        .from(bookings)
        .where(and(eq(bookings.date, date), inArray(bookings.status, [...statuses])))
        .orderBy(asc(bookings.id))
        .all(),
    );
  }

  async bookedCount(itemId: number, date: string): Promise<number> {
    return runStorage('booked_count', () => countActive(this.db, itemId, date));
  }

  async isAvailable(itemId: number, date: string): Promise<boolean> {
    return runStorage('check_availability', () => countActive(this.db, itemId, date) < capacityOf(this.db, itemId));
  }

  async availabilityForPeriod(itemId: number, dates: string[]): Promise<DayAvailability[]> {
    if (dates.length === 0) return [];
    return runStorage('availability_for_period', () => {
      const total = capacityOf(this.db, itemId);
      const rows = this.db
        .select({ date: bookings.date, count: sql<number>`count(*)` })
        .from(bookings)
        .where(
          and(
            eq(bookings.itemId, itemId),
            gte(bookings.date, dates[0] ?? ''),
            lte(bookings.date, dates[dates.length - 1] ?? ''),
            inArray(bookings.status, [...ACTIVE_STATUSES]),
          ),
        )
        .groupBy(bookings.date)
        .all();
      const byDate = new Map(rows.map((r) => [r.date, Number(r.count)]));
      return dates.map((date) => {
        const booked = byDate.get(date) ?? 0;
        return { date, booked, available: Math.max(0, total - booked) };
      });
    });
  }

  /** Bookings of a user dated on or after `sinceDay`, newest date first. */
  async listForUser(userId: number, sinceDay: string): Promise<Booking[]> {
    return runStorage('user_bookings', () =>
      this.db
        .select()
        .from(bookings)
        .where(and(eq(bookings.userId, userId), gte(bookings.date, sinceDay)))
        .orderBy(desc(bookings.date), desc(bookings.id))
        .all(),
    );
  }

  /**
   * Inserts a booking after re-counting the active bookings for its item and
   * date under SQLite's write lock (BEGIN IMMEDIATE).
   */
  async createWithLock(input: NewBooking): Promise<Booking> {
    return withBusyRetry(
      'create_booking_with_lock',
      () =>
        this.db.transaction(
          (tx) => {
            const booked = countActive(tx, input.itemId, input.date);
            if (booked >= capacityOf(tx, input.itemId)) {
              throw new NotAvailableError(input.itemId, input.date);
            }
            const now = new Date();
            return tx
              .insert(bookings)
              .values({
                ...input,
                status: input.status ?? 'pending',
                version: 1,
                createdAt: now,
                updatedAt: now,
              })
              .returning()
              .get();
          },
          { behavior: 'immediate' },
        ),
      this.retry,
    );
  }

  async updateStatusWithVersion(id: number, expectedVersion: number, status: BookingStatus): Promise<Booking> {
    return runStorage('update_booking_status_with_version', () => {
      const updated = this.db
        .update(bookings)
        .set({ status, version: sql`${bookings.version} + 1`, updatedAt: new Date() })
        .where(and(eq(bookings.id, id), eq(bookings.version, expectedVersion)))
        .returning()
        .get();
      if (updated) return updated;
      return this.explainMissedUpdate(id);
    });
  }

  /**
   * Moves a booking to another item. The target capacity is re-checked on the
   * booking date inside the same write transaction.
   */
  async updateItemAndStatusWithVersion(
    id: number,
    expectedVersion: number,
    itemId: number,
    itemName: string,
    status: BookingStatus,
  ): Promise<Booking> {
    return withBusyRetry(
      'update_booking_item_and_status_with_version',
      () =>
        this.db.transaction(
          (tx) => {
            const current = tx.select().from(bookings).where(eq(bookings.id, id)).get();
            if (!current) throw new NotFoundError(`Booking ${id} not found`);
            if (current.version !== expectedVersion) {
              throw new ConcurrentModificationError(
                `Booking ${id} is at version ${current.version}, expected ${expectedVersion}`,
              );
            }
            if (countActive(tx, itemId, current.date, id) >= capacityOf(tx, itemId)) {
              throw new NotAvailableError(itemId, current.date);
            }
            const updated = tx
              .update(bookings)
              .set({
                itemId,
                itemName,
                status,
                version: sql`${bookings.version} + 1`,
                updatedAt: new Date(),
              })
              .where(and(eq(bookings.id, id), eq(bookings.version, expectedVersion)))
              .returning()
              .get();
            if (!updated) throw new ConcurrentModificationError(`Booking ${id} changed during update`);
            return updated;
          },
          { behavior: 'immediate' },
        ),
      this.retry,
    );
  }

  /** Reads a booking and whether `newItemId` has a free unit on its date, in one snapshot. */
  async findWithAvailability(id: number, newItemId: number): Promise<BookingWithAvailability> {
    return runStorage('get_booking_with_availability', () =>
      this.db.transaction((tx) => {
        const booking = tx.select().from(bookings).where(eq(bookings.id, id)).get();
        if (!booking) throw new NotFoundError(`Booking ${id} not found`);
        const available = countActive(tx, newItemId, booking.date, id) < capacityOf(tx, newItemId);
        return { booking, available };
      }),
    );
  }

  private explainMissedUpdate(id: number): never {
    const current = this.db.select({ version: bookings.version }).from(bookings).where(eq(bookings.id, id)).get();
    if (!current) throw new NotFoundError(`Booking ${id} not found`);
    throw new ConcurrentModificationError(`Booking ${id} is at version ${current.version}`);
  }
}
