// Event construction and simple publishers

import { randomUUID } from 'node:crypto';
import type { Clock, Event, EventPublisher } from '@asms/protocol';
import { systemClock } from '@asms/protocol';

/**
 * Build an immutable event stamped with the clock's current time and a fresh
 * correlation id.
 */
export function createEvent<TPayload>(
  type: string,
  domain: string,
  payload: TPayload,
  clock: Clock = systemClock
): Event<TPayload> {
  return Object.freeze({
    type,
    domain,
    payload,
    timestamp: clock.now(),
    correlationId: randomUUID(),
  });
}

/**
 * Publisher that discards every event.
 */
export const noopPublisher: EventPublisher = {
  publish() {},
};

/**
 * Publisher that records events for inspection in tests.
 */
export function createCapturingPublisher(): EventPublisher & {
  events: Event[];
  ofType(type: string): Event[];
  clear(): void;
} {
  const events: Event[] = [];
  return {
    events,
    publish(event: Event) {
      events.push(event);
    },
    ofType(type: string) {
      return events.filter((event) => event.type === type);
    },
    clear() {
      events.length = 0;
    },
  };
}

/**
 * Publish without letting a failing sink reach the caller.
 */
export function safePublish(
  publisher: EventPublisher | undefined,
  event: Event,
  onError: (error: unknown) => void
): void {
  if (!publisher) return;
  try {
    publisher.publish(event);
  } catch (error) {
    onError(error);
  }
}
