import { BaseError } from './base-error.js';

/** The item has no free unit left on the requested date. */
export class NotAvailableError extends BaseError {
  constructor(
    public readonly itemId: number,
    public readonly date: string,
  ) {
    super('NOT_AVAILABLE', 409, `Item ${itemId} is not available on ${date}`);
  }
}

export class PastDateError extends BaseError {
  constructor(public readonly date: string) {
    super('PAST_DATE', 422, `Date ${date} is in the past`);
  }
}

export class DateTooFarError extends BaseError {
  constructor(
    public readonly date: string,
    public readonly maxDays: number,
  ) {
    super('DATE_TOO_FAR', 422, `Date ${date} is more than ${maxDays} days ahead`);
  }
}

/** Raised when an optimistic version check fails or the store stays busy. */
export class ConcurrentModificationError extends BaseError {
  constructor(message = 'Booking was modified concurrently') {
    super('CONCURRENT_MODIFICATION', 409, message);
  }
}
