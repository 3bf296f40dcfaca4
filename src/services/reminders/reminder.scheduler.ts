import { setTimeout as sleep } from 'timers/promises';

import { ValidationError } from '@core/errors/validation.error.js';
import type { BookingStatus } from '@core/interfaces/booking.types.js';
import type { Store } from '@core/repositories/store.js';

import type { Messenger } from '@services/chat/messenger.js';
import { reminder } from '@services/chat/texts.js';

import { logger } from '@utils/logger.js';
import { incrementCounter } from '@utils/metrics.js';
import { addDays, msUntilNext, parseClockTime, systemClock, todayKey, type Clock } from '@utils/time.js';

export const REMINDER_STATUSES: readonly BookingStatus[] = ['confirmed', 'changed'];

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ReminderOptions {
  /** "HH:MM" in the service time zone. */
  time: string;
  timezone: string;
}

/** Once a day, reminds owners of tomorrow's confirmed bookings. */
export class ReminderScheduler {
  private readonly at: { hour: number; minute: number };

  constructor(
    private readonly store: Store,
    private readonly messenger: Messenger,
    private readonly options: ReminderOptions,
    private readonly clock: Clock = systemClock,
  ) {
    const at = parseClockTime(options.time);
    if (!at) throw new ValidationError(`Invalid reminder time "${options.time}", expected HH:MM`);
    this.at = at;
  }

  /** Runs until `signal` aborts. */
  async start(signal: AbortSignal): Promise<void> {
    let wait = msUntilNext(this.at, this.options.timezone, this.clock);
    logger.info('[reminders] scheduled', { time: this.options.time, firstRunInMs: wait });
    while (!signal.aborted) {
      try {
        await sleep(wait, undefined, { signal });
      } catch (err) {
        if (signal.aborted) break;
        throw err;
      }
      try {
        await this.runOnce();
      } catch (err) {
        logger.error('[reminders] run failed', { err });
      }
      wait = DAY_MS;
    }
    logger.info('[reminders] stopped');
  }

  /** Sends today's batch; returns how many reminders went out. */
  async runOnce(): Promise<number> {
    const tomorrow = addDays(todayKey(this.options.timezone, this.clock), 1, this.options.timezone);
    const due = await this.store.bookings.listOnDate(tomorrow, REMINDER_STATUSES);
    let sent = 0;
    for (const booking of due) {
      if (await this.messenger.text(booking.userId, reminder(booking))) {
        sent += 1;
        incrementCounter('reminders_sent');
      } else {
        logger.error('[reminders] send failed', { bookingId: booking.id, userId: booking.userId });
      }
    }
    logger.info('[reminders] sent', { date: tomorrow, due: due.length, sent });
    return sent;
  }
}
