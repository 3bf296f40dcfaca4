import { DateTime } from 'luxon';

import { DateTooFarError, PastDateError } from '@core/errors/booking.errors.js';
import { ValidationError } from '@core/errors/validation.error.js';

import { dayKeysBetween, dayStart, diffInDays, systemClock, type Clock } from '@utils/time.js';

import { readBookingRules, type BookingRules } from './config.defaults.js';

export class ValidationService {
  constructor(
    private readonly rules: BookingRules = readBookingRules(),
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Accepts a day key when it is not in the past (or, with a minimum advance
   * configured, when the day starts at least that many hours from now) and
   * not more than `maxBookingDays` after today.
   */
  validateDate(dayKey: string): void {
    const tz = this.rules.timezone;
    const day = dayStart(dayKey, tz);
    const now = DateTime.fromJSDate(this.clock(), { zone: tz });
    const today = now.startOf('day');

    if (this.rules.minAdvanceHours > 0) {
      if (day < now.plus({ hours: this.rules.minAdvanceHours })) {
        throw new PastDateError(dayKey);
      }
    } else if (day < today) {
      throw new PastDateError(dayKey);
    }

    if (day > today.plus({ days: this.rules.maxBookingDays })) {
      throw new DateTooFarError(dayKey, this.rules.maxBookingDays);
    }
  }

  /** Validates both ends of a manager range and returns every date in it. */
  validateRange(startKey: string, endKey: string): string[] {
    const tz = this.rules.timezone;
    if (diffInDays(startKey, endKey, tz) < 0) {
      throw new ValidationError('Конечная дата не может быть раньше начальной.');
    }
    const dates = dayKeysBetween(startKey, endKey, tz);
    if (dates.length > this.rules.maxRangeDates) {
      throw new ValidationError(`Интервал не может превышать ${this.rules.maxRangeDates} дней.`);
    }
    this.validateDate(startKey);
    this.validateDate(endKey);
    return dates;
  }

  get maxBookingDays(): number {
    return this.rules.maxBookingDays;
  }
}
