import type { StateRepository } from '@core/repositories/state.repo.js';

import { logger } from '@utils/logger.js';
import { incrementCounter } from '@utils/metrics.js';
import { systemClock, type Clock } from '@utils/time.js';

import { ConversationStepSchema, MAIN_MENU, previousStep, type ConversationStep } from './state.types.js';

export interface RateLimitPolicy {
  messages: number;
  windowSeconds: number;
}

/**
 * Typed view over a StateRepository. Scratch that does not match its step
 * reads as the main menu.
 */
export class StateManager {
  constructor(
    private readonly repo: StateRepository,
    private readonly rateLimit: RateLimitPolicy,
    private readonly clock: Clock = systemClock,
  ) {}

  async get(userId: number): Promise<ConversationStep> {
    const stored = await this.repo.getState(userId);
    if (!stored) return MAIN_MENU;

    const parsed = ConversationStepSchema.safeParse({ ...stored.data, step: stored.step });
    if (!parsed.success) {
      logger.debug('[state] inconsistent scratch, resetting', { userId, step: stored.step });
      return MAIN_MENU;
    }
    return parsed.data;
  }

  async set(userId: number, next: ConversationStep): Promise<void> {
    if (next.step === 'main_menu') {
      await this.repo.clearState(userId);
      return;
    }
    const { step, ...data } = next;
    await this.repo.setState({ userId, step, data, updatedAt: this.clock() });
  }

  async reset(userId: number): Promise<void> {
    await this.repo.clearState(userId);
  }

  /** Moves to the preceding step and returns it. */
  async back(userId: number): Promise<ConversationStep> {
    const prev = previousStep(await this.get(userId));
    await this.set(userId, prev);
    return prev;
  }

  /** Managers are never throttled. A failing limiter lets the update through. */
  async allow(userId: number, isManager: boolean): Promise<boolean> {
    if (isManager) return true;
    try {
      const ok = await this.repo.checkRateLimit(userId, this.rateLimit.messages, this.rateLimit.windowSeconds);
      if (!ok) incrementCounter('rate_limited');
      return ok;
    } catch (err) {
      logger.warn('[state] rate limit check failed, allowing', { userId, err });
      return true;
    }
  }
}
