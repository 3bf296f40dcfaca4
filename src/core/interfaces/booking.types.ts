import type { bookings } from '@infra/database/schema.js';

export const BOOKING_STATUSES = [
  'pending',
  'confirmed',
  'changed',
  'rescheduled',
  'canceled',
  'completed',
] as const;

export type BookingStatus = (typeof BOOKING_STATUSES)[number];

/** Statuses that hold a unit of the item on the booking date. */
export const ACTIVE_STATUSES = ['pending', 'confirmed', 'changed', 'rescheduled'] as const satisfies readonly BookingStatus[];

export const BOOKING_ACTIONS = ['confirm', 'reject', 'complete', 'reopen', 'reschedule', 'change_item'] as const;
export type BookingAction = (typeof BOOKING_ACTIONS)[number];

export const BOOKING_TRANSITIONS: Record<BookingAction, { from: readonly BookingStatus[]; to: BookingStatus }> = {
  confirm: { from: ['pending', 'changed'], to: 'confirmed' },
  reject: { from: ['pending', 'changed'], to: 'canceled' },
  complete: { from: ['confirmed'], to: 'completed' },
  reopen: { from: ['confirmed'], to: 'pending' },
  reschedule: { from: ['pending', 'confirmed'], to: 'rescheduled' },
  change_item: { from: ['pending', 'confirmed'], to: 'changed' },
};

export function isActiveStatus(status: BookingStatus): boolean {
  return ACTIVE_STATUSES.some((s) => s === status);
}

export function canTransition(from: BookingStatus, action: BookingAction): boolean {
  return BOOKING_TRANSITIONS[action].from.includes(from);
}

export type Booking = typeof bookings.$inferSelect;

export type NewBooking = Pick<
  Booking,
  'userId' | 'userName' | 'userNickname' | 'phone' | 'itemId' | 'itemName' | 'date' | 'comment'
> & { status?: BookingStatus };

/** Bookings grouped by day key (yyyy-MM-dd). */
export type DailyBookings = Record<string, Booking[]>;

export interface DayAvailability {
  date: string;
  booked: number;
  available: number;
}

export interface ItemAvailability {
  itemName: string;
  available: boolean;
  bookedCount: number;
  total: number;
}

export interface ManagerBookingRequest {
  managerId: number;
  clientName: string;
  clientPhone: string;
  itemId: number;
  comment: string;
}

export interface ManagerBookingResult {
  created: Booking[];
  failed: Array<{ date: string; reason: string }>;
}
