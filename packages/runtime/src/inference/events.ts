// Inference request events

import type { Clock, EventPublisher, InferenceEventType } from '@asms/protocol';
import { errorCodeOf, errorMessage, systemClock } from '@asms/protocol';
import { createEvent, safePublish } from '../events/publishers.js';
import { INFERENCE_DOMAIN } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

export type RequestTrackingDeps = {
  events?: EventPublisher;
  clock?: Clock;
  logger?: Logger;
};

/**
 * Run one provider request between `inference.request_started` and either
 * `inference.request_completed` or `inference.request_failed`.
 */
export async function trackRequest<T>(
  deps: RequestTrackingDeps,
  request: { requestId: string; unit: string; model: string },
  run: () => Promise<T>
): Promise<T> {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? silentLogger;
  const base = { request_id: request.requestId, unit: request.unit, model: request.model };
  const startedAt = clock.now().getTime();

  const emit = (type: InferenceEventType, payload: Record<string, unknown>): void => {
    safePublish(deps.events, createEvent(type, INFERENCE_DOMAIN, payload, clock), (error) =>
      logger.warn('Failed to publish inference event', { type, error: errorMessage(error) })
    );
  };

  emit('inference.request_started', base);
  try {
    const result = await run();
    emit('inference.request_completed', {
      ...base,
      duration_ms: clock.now().getTime() - startedAt,
    });
    return result;
  } catch (error) {
    emit('inference.request_failed', {
      ...base,
      error: errorMessage(error),
      error_code: errorCodeOf(error),
      duration_ms: clock.now().getTime() - startedAt,
    });
    throw error;
  }
}
