import type { StateRepository, UserState } from '@core/repositories/state.repo.js';

import { logger } from '@utils/logger.js';
import { incrementCounter } from '@utils/metrics.js';
import { systemClock, type Clock } from '@utils/time.js';

export const PRIMARY_RETRY_MS = 60_000;

/**
 * Serves from `primary` until it fails, then from `fallback` until
 * `retryAfterMs` has passed, when the primary is tried again.
 */
export class FailoverStateRepository implements StateRepository {
  private downUntil = 0;

  constructor(
    private readonly primary: StateRepository,
    private readonly fallback: StateRepository,
    private readonly retryAfterMs = PRIMARY_RETRY_MS,
    private readonly clock: Clock = systemClock,
  ) {}

  get primaryAvailable(): boolean {
    return this.clock().getTime() >= this.downUntil;
  }

  getState(userId: number): Promise<UserState | null> {
    return this.run('get_state', (repo) => repo.getState(userId));
  }

  setState(state: UserState): Promise<void> {
    return this.run('set_state', (repo) => repo.setState(state));
  }

  clearState(userId: number): Promise<void> {
    return this.run('clear_state', (repo) => repo.clearState(userId));
  }

  checkRateLimit(userId: number, limit: number, windowSeconds: number): Promise<boolean> {
    return this.run('check_rate_limit', (repo) => repo.checkRateLimit(userId, limit, windowSeconds));
  }

  private async run<T>(operation: string, fn: (repo: StateRepository) => Promise<T>): Promise<T> {
    if (!this.primaryAvailable) return fn(this.fallback);
    try {
      return await fn(this.primary);
    } catch (err) {
      this.downUntil = this.clock().getTime() + this.retryAfterMs;
      incrementCounter('state_failover');
      logger.warn('[state] primary store failed, using fallback', { operation, err });
      return fn(this.fallback);
    }
  }
}
