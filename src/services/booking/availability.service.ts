import { NotFoundError } from '@core/errors/not-found.error.js';
import type { DayAvailability, ItemAvailability } from '@core/interfaces/booking.types.js';
import type { Store } from '@core/repositories/store.js';

import { addDays, dayKeysBetween } from '@utils/time.js';

export class AvailabilityService {
  constructor(
    private readonly store: Store,
    private readonly timezone: string,
  ) {}

  async checkAvailability(itemId: number, date: string): Promise<boolean> {
    return this.store.bookings.isAvailable(itemId, date);
  }

  async bookedCount(itemId: number, date: string): Promise<number> {
    return this.store.bookings.bookedCount(itemId, date);
  }

  /** Per-day free units for `days` consecutive days starting at `start`. */
  async getAvailability(itemId: number, start: string, days: number): Promise<DayAvailability[]> {
    if (days <= 0) return [];
    const dates = dayKeysBetween(start, addDays(start, days - 1, this.timezone), this.timezone);
    return this.store.bookings.availabilityForPeriod(itemId, dates);
  }

  async itemAvailabilityByName(itemName: string, date: string): Promise<ItemAvailability> {
    const item = await this.store.items.findByName(itemName);
    if (!item) throw new NotFoundError(`Item "${itemName}" not found`);
    const bookedCount = await this.store.bookings.bookedCount(item.id, date);
    return {
      itemName: item.name,
      available: bookedCount < item.totalQuantity,
      bookedCount,
      total: item.totalQuantity,
    };
  }
}
