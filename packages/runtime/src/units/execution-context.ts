// Per-execution lifecycle events

import { randomBytes } from 'node:crypto';
import type {
  Clock,
  EventPublisher,
  ExecutionEventPayload,
  ExecutionEventType,
} from '@asms/protocol';
import { errorCodeOf, errorMessage, formatTimestamp, systemClock } from '@asms/protocol';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { createEvent, safePublish } from '../events/publishers.js';

/**
 * Generate a request id: `req_` followed by 16 hex characters.
 */
export function generateRequestId(): string {
  return `req_${randomBytes(8).toString('hex')}`;
}

/**
 * Generate a trace id: `trc_` followed by 32 hex characters.
 */
export function generateTraceId(): string {
  return `trc_${randomBytes(16).toString('hex')}`;
}

export type ExecutionContextOptions = {
  clock?: Clock;
  logger?: Logger;
  requestId?: string;
};

/**
 * Emits the Started / Completed / Failed events of one unit execution.
 *
 * Started must come first and exactly one terminal event is emitted; later
 * terminal calls are ignored. A missing publisher discards every event.
 */
export class ExecutionContext {
  readonly requestId: string;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private startedAt?: number;
  private finished = false;

  constructor(
    private readonly publisher: EventPublisher | undefined,
    readonly domain: string,
    readonly unitName: string,
    options: ExecutionContextOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.requestId = options.requestId ?? generateRequestId();
  }

  get isFinished(): boolean {
    return this.finished;
  }

  publishStarted(input: unknown): void {
    this.startedAt = this.clock.now().getTime();
    this.emit('execution_started', { input });
  }

  publishCompleted(output: unknown): void {
    if (this.finished) return;
    this.finished = true;
    this.emit('execution_completed', { output, duration_ms: this.elapsed() });
  }

  publishFailed(error: unknown): void {
    if (this.finished) return;
    this.finished = true;
    this.emit('execution_failed', {
      error: errorMessage(error),
      error_code: errorCodeOf(error),
      duration_ms: this.elapsed(),
    });
  }

  private elapsed(): number {
    if (this.startedAt === undefined) return 0;
    return Math.max(0, this.clock.now().getTime() - this.startedAt);
  }

  private emit(
    eventType: ExecutionEventType,
    fields: Omit<ExecutionEventPayload, 'event_type' | 'domain' | 'unit_name' | 'timestamp'>
  ): void {
    const now = this.clock.now();
    const payload: ExecutionEventPayload = {
      event_type: eventType,
      domain: this.domain,
      unit_name: this.unitName,
      timestamp: formatTimestamp(now),
      ...fields,
    };
    safePublish(this.publisher, createEvent(eventType, this.domain, payload, this.clock), (error) => {
      this.logger.warn('Failed to publish execution event', {
        unit: this.unitName,
        eventType,
        error: errorMessage(error),
      });
    });
  }
}
