import { logger } from '@utils/logger.js';

export const EVENT_TYPES = [
  'booking_created',
  'booking_confirmed',
  'booking_canceled',
  'booking_completed',
  'booking_item_changed',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export interface DomainEvent {
  type: EventType;
  /** JSON-encoded payload. */
  payload: string;
  createdAt: Date;
}

export type EventHandler = (event: DomainEvent) => void | Promise<void>;

export interface EventPublisher {
  publishJSON(type: EventType, payload: unknown): void;
}

/**
 * In-process fan-out. Handlers run in the publisher's turn, over a snapshot
 * of the subscriber list; a failing handler is logged and its siblings still
 * receive the event.
 */
export class EventBus implements EventPublisher {
  private readonly handlers = new Map<EventType, EventHandler[]>();

  subscribe(type: EventType, handler: EventHandler): () => void {
    this.handlers.set(type, [...(this.handlers.get(type) ?? []), handler]);
    return () => {
      this.handlers.set(
        type,
        (this.handlers.get(type) ?? []).filter((h) => h !== handler),
      );
    };
  }

  publish(event: DomainEvent): void {
    const snapshot = this.handlers.get(event.type) ?? [];
    for (const handler of snapshot) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            logger.error('[events] async handler failed', { type: event.type, err });
          });
        }
      } catch (err) {
        logger.error('[events] handler failed', { type: event.type, err });
      }
    }
  }

  publishJSON(type: EventType, payload: unknown): void {
    let encoded: string;
    try {
      encoded = JSON.stringify(payload);
    } catch (err) {
      logger.error('[events] payload not serialisable', { type, err });
      return;
    }
    this.publish({ type, payload: encoded, createdAt: new Date() });
  }

  subscriberCount(type: EventType): number {
    return this.handlers.get(type)?.length ?? 0;
  }
}

export interface BookingEventPayload {
  booking_id: number;
  user_id: number;
  user_name: string;
  item_id: number;
  item_name: string;
  status: string;
  date: string;
  comment: string;
  changed_by: string;
  changed_by_id: number;
}
