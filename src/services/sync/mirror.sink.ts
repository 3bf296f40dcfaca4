import type { Booking, DailyBookings } from '@core/interfaces/booking.types.js';
import type { Item } from '@core/interfaces/item.types.js';
import type { User } from '@core/interfaces/user.types.js';

import { logger } from '@utils/logger.js';

/** The external spreadsheet mirror. Every operation is idempotent per booking id. */
export interface MirrorSink {
  appendBooking(booking: Booking, signal?: AbortSignal): Promise<void>;
  upsertBooking(booking: Booking, signal?: AbortSignal): Promise<void>;
  updateBookingStatus(bookingId: number, status: string, signal?: AbortSignal): Promise<void>;
  replaceBookingsSheet(bookings: Booking[], signal?: AbortSignal): Promise<void>;
  updateUsersSheet(users: User[], signal?: AbortSignal): Promise<void>;
  updateScheduleSheet(
    startDate: string,
    endDate: string,
    daily: DailyBookings,
    items: Item[],
    signal?: AbortSignal,
  ): Promise<void>;
}

export interface MirrorBookingRow {
  id: number;
  user_id: number;
  user_name: string;
  user_nickname: string;
  phone: string;
  item_id: number;
  item_name: string;
  date: string;
  status: string;
  comment: string;
  version: number;
  created_at: string;
  updated_at: string;
}

export function toMirrorRow(b: Booking): MirrorBookingRow {
  return {
    id: b.id,
    user_id: b.userId,
    user_name: b.userName,
    user_nickname: b.userNickname,
    phone: b.phone,
    item_id: b.itemId,
    item_name: b.itemName,
    date: b.date,
    status: b.status,
    comment: b.comment,
    version: b.version,
    created_at: b.createdAt.toISOString(),
    updated_at: b.updatedAt.toISOString(),
  };
}

export interface ScheduleCell {
  date: string;
  item_id: number;
  item_name: string;
  booked: number;
  total: number;
}

/** Day × item grid of active bookings over [startDate, endDate]. */
export function buildScheduleGrid(daily: DailyBookings, items: Item[], dates: string[]): ScheduleCell[] {
  return dates.flatMap((date) =>
    items.map((item) => ({
      date,
      item_id: item.id,
      item_name: item.name,
      booked: (daily[date] ?? []).filter((b) => b.itemId === item.id).length,
      total: item.totalQuantity,
    })),
  );
}

/**
 * Keeps the mirror in process memory. Used when no remote mirror is
 * configured, and as the sink in tests.
 */
export class MemoryMirrorSink implements MirrorSink {
  readonly rows = new Map<number, MirrorBookingRow>();
  users: User[] = [];
  schedule: { startDate: string; endDate: string; daily: DailyBookings; items: Item[] } | null = null;

  async appendBooking(booking: Booking): Promise<void> {
    if (!this.rows.has(booking.id)) this.rows.set(booking.id, toMirrorRow(booking));
  }

  async upsertBooking(booking: Booking): Promise<void> {
    this.rows.set(booking.id, toMirrorRow(booking));
  }

  async updateBookingStatus(bookingId: number, status: string): Promise<void> {
    const row = this.rows.get(bookingId);
    if (!row) {
      logger.debug('[mirror] status for unknown booking', { bookingId, status });
      return;
    }
    this.rows.set(bookingId, { ...row, status });
  }

  async replaceBookingsSheet(bookings: Booking[]): Promise<void> {
    this.rows.clear();
    for (const b of bookings) this.rows.set(b.id, toMirrorRow(b));
  }

  async updateUsersSheet(users: User[]): Promise<void> {
    this.users = [...users];
  }

  async updateScheduleSheet(startDate: string, endDate: string, daily: DailyBookings, items: Item[]): Promise<void> {
    this.schedule = { startDate, endDate, daily, items };
  }
}
