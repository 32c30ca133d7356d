// Async iterables behind the subscription procedures

import type { Event, ResourceUpdate } from '@asms/protocol';
import { UnitError } from '@asms/protocol';
import type { EventBus, Logger } from '@asms/runtime';
import { ALL_EVENTS, Channel } from '@asms/runtime';

/**
 * Resource updates until the caller aborts or the resource stops the watch.
 */
export async function* watchUpdates(
  subscription: { updates: AsyncIterable<ResourceUpdate>; unsubscribe(): void },
  signal?: AbortSignal
): AsyncGenerator<ResourceUpdate, void, undefined> {
  const stop = (): void => subscription.unsubscribe();
  signal?.addEventListener('abort', stop, { once: true });
  try {
    for await (const update of subscription.updates) {
      yield update;
    }
  } finally {
    signal?.removeEventListener('abort', stop);
    subscription.unsubscribe();
  }
}

/**
 * Events published on the bus, optionally limited to one type. A subscriber
 * that falls `capacity` events behind loses the newest ones.
 */
export async function* subscribeEvents(
  bus: EventBus,
  options: { type?: string; capacity: number; logger: Logger; signal?: AbortSignal }
): AsyncGenerator<Event, void, undefined> {
  const { signal, logger } = options;
  if (signal?.aborted) return;
  const channel = new Channel<Event>(options.capacity);
  const unsubscribe = bus.subscribe(options.type || ALL_EVENTS, (event) => {
    if (!channel.trySend(event)) {
      logger.debug('Dropped event for slow subscriber', { type: event.type });
    }
  });
  const close = (): void => channel.close();
  signal?.addEventListener('abort', close, { once: true });

  try {
    for await (const event of channel) {
      yield event;
    }
  } finally {
    signal?.removeEventListener('abort', close);
    unsubscribe();
    channel.close();
  }
}

export function resourceNotFound(uri: string): UnitError {
  return new UnitError('not_found', `resource not found: ${uri}`, { details: { uri } });
}
