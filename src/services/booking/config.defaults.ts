import { DateTime } from 'luxon';

import { config } from '@config/env.config';

import { DAY_KEY_FORMAT, systemClock, type Clock } from '@utils/time.js';

export interface BookingRules {
  timezone: string;
  maxBookingDays: number;
  minAdvanceHours: number;
  /** Largest manager range, counted in dates (end - start + 1). */
  maxRangeDates: number;
  /** Window rewritten by a schedule resync, relative to today. */
  scheduleWindow: { monthsBack: number; monthsAhead: number };
}

export const DEFAULT_MAX_BOOKING_DAYS = 365;
export const DEFAULT_MAX_RANGE_DATES = 31;

export function readBookingRules(overrides: Partial<BookingRules> = {}): BookingRules {
  return {
    timezone: config.TIMEZONE,
    maxBookingDays: config.BOT_MAX_BOOKING_DAYS > 0 ? config.BOT_MAX_BOOKING_DAYS : DEFAULT_MAX_BOOKING_DAYS,
    minAdvanceHours: Math.max(0, config.BOT_MIN_BOOKING_ADVANCE_HOURS),
    maxRangeDates: DEFAULT_MAX_RANGE_DATES,
    scheduleWindow: { monthsBack: 1, monthsAhead: 2 },
    ...overrides,
  };
}

export interface ScheduleWindow {
  startDate: string;
  endDate: string;
}

/** Default resync window around today in the rules' time zone. */
export function scheduleWindowFor(rules: BookingRules, clock: Clock = systemClock): ScheduleWindow {
  const today = DateTime.fromJSDate(clock(), { zone: rules.timezone }).startOf('day');
  const { monthsBack, monthsAhead } = rules.scheduleWindow;
  return {
    startDate: today.minus({ months: monthsBack }).toFormat(DAY_KEY_FORMAT),
    endDate: today.plus({ months: monthsAhead }).toFormat(DAY_KEY_FORMAT),
  };
}
