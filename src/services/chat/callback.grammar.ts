import { BOOKING_ACTIONS, type BookingAction } from '@core/interfaces/booking.types.js';

export type CallbackEvent =
  | { type: 'back_to_main' }
  | { type: 'back_to_main_from_schedule' }
  | { type: 'items_page'; page: number }
  | { type: 'select_item'; itemId: number }
  | { type: 'schedule_items_page'; page: number }
  | { type: 'schedule_select_item'; itemId: number }
  | { type: 'manager_items_page'; page: number }
  | { type: 'manager_select_item'; itemId: number }
  | { type: 'manager_date_type'; dateType: 'single' | 'range' }
  | { type: 'booking_action'; action: BookingAction; bookingId: number }
  | { type: 'change_to'; bookingId: number; itemId: number }
  | { type: 'call_booking'; bookingId: number }
  | { type: 'show_booking'; bookingId: number }
  | { type: 'bookings_page'; page: number }
  | { type: 'my_bookings_page'; page: number }
  | { type: 'export_users' }
  | { type: 'unknown'; data: string };

const PAGE_PREFIXES = ['items_page', 'schedule_items_page', 'manager_items_page', 'bookings_page', 'my_bookings_page'] as const;
const ITEM_PREFIXES = ['select_item', 'schedule_select_item', 'manager_select_item'] as const;
const BOOKING_PREFIXES = ['call_booking', 'show_booking'] as const;

const ACTION_RE = new RegExp(`^(${BOOKING_ACTIONS.join('|')})_(\\d+)$`);
const CHANGE_TO_RE = /^change_to_(\d+)_(\d+)$/;
const PREFIXED_RE = /^([a-z_]+):(\d+)$/;

function isOneOf<T extends string>(list: readonly T[], value: string): value is T {
  return list.some((entry) => entry === value);
}

function isBookingAction(value: string): value is BookingAction {
  return isOneOf(BOOKING_ACTIONS, value);
}

/** Parses inline-button data into a tagged event; anything unrecognised is `unknown`. */
export function parseCallback(data: string): CallbackEvent {
  switch (data) {
    case 'back_to_main':
    case 'back_to_main_from_schedule':
    case 'export_users':
      return { type: data };
    case 'manager_single_date':
      return { type: 'manager_date_type', dateType: 'single' };
    case 'manager_date_range':
      return { type: 'manager_date_type', dateType: 'range' };
  }

  const changeTo = CHANGE_TO_RE.exec(data);
  if (changeTo) {
    return { type: 'change_to', bookingId: Number(changeTo[1]), itemId: Number(changeTo[2]) };
  }

  const action = ACTION_RE.exec(data);
  const actionName = action?.[1] ?? '';
  if (action && isBookingAction(actionName)) {
    return { type: 'booking_action', action: actionName, bookingId: Number(action[2]) };
  }

  const prefixed = PREFIXED_RE.exec(data);
  if (prefixed) {
    const prefix = prefixed[1] ?? '';
    const n = Number(prefixed[2]);
    if (isOneOf(PAGE_PREFIXES, prefix)) return { type: prefix, page: n };
    if (isOneOf(ITEM_PREFIXES, prefix)) return { type: prefix, itemId: n };
    if (isOneOf(BOOKING_PREFIXES, prefix)) return { type: prefix, bookingId: n };
  }

  return { type: 'unknown', data };
}

/** Builders for the data strings, kept next to the parser. */
export const cb = {
  backToMain: 'back_to_main',
  backToMainFromSchedule: 'back_to_main_from_schedule',
  exportUsers: 'export_users',
  managerSingleDate: 'manager_single_date',
  managerDateRange: 'manager_date_range',
  page: (prefix: (typeof PAGE_PREFIXES)[number], page: number) => `${prefix}:${page}`,
  item: (prefix: (typeof ITEM_PREFIXES)[number], itemId: number) => `${prefix}:${itemId}`,
  action: (action: BookingAction, bookingId: number) => `${action}_${bookingId}`,
  changeTo: (bookingId: number, itemId: number) => `change_to_${bookingId}_${itemId}`,
  callBooking: (bookingId: number) => `call_booking:${bookingId}`,
  showBooking: (bookingId: number) => `show_booking:${bookingId}`,
} as const;

export type PagePrefix = (typeof PAGE_PREFIXES)[number];
