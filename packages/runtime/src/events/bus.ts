// In-memory event pub/sub
//
// Fans published events out to subscribers registered for the event's type,
// or for every event with `*`. Publishing never blocks the publisher: handlers
// run asynchronously and their failures are logged.

import type { Event, EventPublisher } from '@asms/protocol';
import type { Logger } from '../logger.js';
import { consoleLogger } from '../logger.js';

export type EventHandler = (event: Event) => void | Promise<void>;

export const ALL_EVENTS = '*';

/**
 * In-memory event bus.
 *
 * This is a simple implementation suitable for a single process; the
 * EventPublisher seam is where a broker-backed publisher would plug in.
 */
export class EventBus implements EventPublisher {
  private subscriptions = new Map<string, Set<EventHandler>>();
  private pending = new Set<Promise<void>>();

  constructor(private readonly logger: Logger = consoleLogger) {}

  /**
   * Subscribe to events of one type, or to all events with `*`.
   *
   * @returns Unsubscribe function
   */
  subscribe(type: string, handler: EventHandler): () => void {
    let handlers = this.subscriptions.get(type);
    if (!handlers) {
      handlers = new Set();
      this.subscriptions.set(type, handlers);
    }
    handlers.add(handler);

    return () => {
      const subs = this.subscriptions.get(type);
      if (subs) {
        subs.delete(handler);
        if (subs.size === 0) {
          this.subscriptions.delete(type);
        }
      }
    };
  }

  /**
   * Fire-and-forget publish. Use `dispatch` to wait for the handlers.
   */
  publish(event: Event): void {
    const delivery = this.dispatch(event);
    this.pending.add(delivery);
    void delivery.finally(() => this.pending.delete(delivery));
  }

  /**
   * Deliver an event to every matching handler and wait for all of them.
   */
  async dispatch(event: Event): Promise<void> {
    const handlers = [
      ...(this.subscriptions.get(event.type) ?? []),
      ...(this.subscriptions.get(ALL_EVENTS) ?? []),
    ];
    if (handlers.length === 0) {
      return;
    }

    const results = await Promise.allSettled(
      handlers.map(async (handler) => {
        await handler(event);
      })
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        // Log but don't fail other handlers
        this.logger.error('Event handler error', {
          type: event.type,
          domain: event.domain,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    }
  }

  /**
   * Wait for every in-flight delivery started by `publish`.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  subscriberCount(type: string): number {
    return this.subscriptions.get(type)?.size ?? 0;
  }

  totalSubscriptions(): number {
    let total = 0;
    for (const subs of this.subscriptions.values()) {
      total += subs.size;
    }
    return total;
  }
}
