import axios, { type AxiosInstance } from 'axios';

import { RemoteSinkError, TransportError } from '@core/errors/infra.errors.js';
import type { Booking, DailyBookings } from '@core/interfaces/booking.types.js';
import type { Item } from '@core/interfaces/item.types.js';
import type { User } from '@core/interfaces/user.types.js';

import { buildScheduleGrid, toMirrorRow, type MirrorSink } from '@services/sync/mirror.sink.js';

import { logger } from '@utils/logger.js';
import { dayKeysBetween, formatTimestamp } from '@utils/time.js';

export interface HttpMirrorOptions {
  url: string;
  token?: string;
  timeoutMs: number;
  timezone: string;
}

export function createMirrorAxios(options: HttpMirrorOptions): AxiosInstance {
  return axios.create({
    baseURL: options.url,
    headers: {
      'Content-Type': 'application/json',
      ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
    },
    timeout: options.timeoutMs,
    validateStatus: (s) => s < 500,
  });
}

/**
 * Posts `{operation, ...payload}` to the mirror endpoint. Network errors and
 * 5xx responses are TransportError; any other non-2xx is RemoteSinkError.
 */
export class HttpMirrorSink implements MirrorSink {
  private readonly http: AxiosInstance;

  constructor(
    private readonly options: HttpMirrorOptions,
    http?: AxiosInstance,
  ) {
    this.http = http ?? createMirrorAxios(options);
  }

  appendBooking(booking: Booking, signal?: AbortSignal): Promise<void> {
    return this.post('append_booking', { booking: toMirrorRow(booking) }, signal);
  }

  upsertBooking(booking: Booking, signal?: AbortSignal): Promise<void> {
    return this.post('upsert_booking', { booking: toMirrorRow(booking) }, signal);
  }

  updateBookingStatus(bookingId: number, status: string, signal?: AbortSignal): Promise<void> {
    return this.post('update_booking_status', { booking_id: bookingId, status }, signal);
  }

  replaceBookingsSheet(bookings: Booking[], signal?: AbortSignal): Promise<void> {
    return this.post('replace_bookings_sheet', { bookings: bookings.map(toMirrorRow) }, signal);
  }

  updateUsersSheet(users: User[], signal?: AbortSignal): Promise<void> {
    const rows = users.map((u) => ({
      id: u.id,
      telegram_id: u.telegramId,
      username: u.username ?? '',
      first_name: u.firstName ?? '',
      last_name: u.lastName ?? '',
      phone: u.phone ?? '',
      is_manager: u.isManager,
      is_blacklisted: u.isBlacklisted,
      last_activity: formatTimestamp(u.lastActivity, this.options.timezone),
    }));
    return this.post('update_users_sheet', { users: rows }, signal);
  }

  updateScheduleSheet(
    startDate: string,
    endDate: string,
    daily: DailyBookings,
    items: Item[],
    signal?: AbortSignal,
  ): Promise<void> {
    const dates = dayKeysBetween(startDate, endDate, this.options.timezone);
    return this.post(
      'update_schedule_sheet',
      {
        start_date: startDate,
        end_date: endDate,
        items: items.map((i) => ({ id: i.id, name: i.name, total: i.totalQuantity })),
        cells: buildScheduleGrid(daily, items, dates),
      },
      signal,
    );
  }

  private async post(operation: string, payload: Record<string, unknown>, signal?: AbortSignal): Promise<void> {
    let status: number;
    try {
      const res = await this.http.post('', { operation, ...payload }, { signal });
      status = res.status;
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new TransportError(`Mirror ${operation} failed: ${err instanceof Error ? err.message : String(err)}`, err);
    }
    if (status < 200 || status >= 300) {
      throw new RemoteSinkError(`Mirror ${operation} rejected with HTTP ${status}`);
    }
    logger.debug('[mirror] delivered', { operation, status });
  }
}
