import { setTimeout as sleep } from 'node:timers/promises';

import { BaseError } from '@core/errors/base-error.js';
import { ConcurrentModificationError } from '@core/errors/booking.errors.js';
import { StorageError } from '@core/errors/infra.errors.js';

export function sqliteCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

export function isBusy(err: unknown): boolean {
  const code = sqliteCode(err);
  return code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED';
}

export function isUniqueViolation(err: unknown): boolean {
  const code = sqliteCode(err);
  return code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

/** Runs a storage call, passing domain errors through and wrapping engine errors. */
export function runStorage<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof BaseError) throw err;
    throw new StorageError(operation, err);
  }
}

export interface BusyRetryOptions {
  attempts?: number;
  pauseMs?: number;
}

/**
 * Retries a write transaction while SQLite reports the database busy or a
 * uniqueness race; gives up with ConcurrentModificationError.
 */
export async function withBusyRetry<T>(
  operation: string,
  fn: () => T,
  { attempts = 3, pauseMs = 25 }: BusyRetryOptions = {},
): Promise<T> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      return fn();
    } catch (err) {
      if (err instanceof BaseError) throw err;
      if (!isBusy(err) && !isUniqueViolation(err)) throw new StorageError(operation, err);
      if (attempt >= attempts) {
        throw new ConcurrentModificationError(`Storage stayed busy during "${operation}"`);
      }
      await sleep(pauseMs * attempt);
    }
  }
}
