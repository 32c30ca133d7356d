// Event model

import type { Timestamp } from './common.js';

/**
 * Immutable event record.
 * `correlationId` is generated per event.
 */
export type Event<TPayload = unknown> = {
  readonly type: string;
  readonly domain: string;
  readonly payload: TPayload;
  readonly timestamp: Date;
  readonly correlationId: string;
};

/**
 * Sink for events. Publishing is best-effort and must not block the caller.
 */
export type EventPublisher = {
  publish(event: Event): void;
};

export type ExecutionEventType = 'execution_started' | 'execution_completed' | 'execution_failed';

/**
 * Payload of the unit-level lifecycle events.
 */
export type ExecutionEventPayload = {
  event_type: ExecutionEventType;
  domain: string;
  unit_name: string;
  input?: unknown;
  output?: unknown;
  error?: string;
  error_code?: string;
  timestamp: Timestamp;
  duration_ms?: number;
};
