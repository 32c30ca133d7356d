// Polling resources
//
// Each watcher gets its own ticker and its own view of the previous snapshot,
// so subscribers never see each other's diffs. Ticks go out with a
// non-blocking send: a watcher that is not draining loses ticks rather than
// stalling the poller.

import type {
  Clock,
  DynamicMap,
  Resource,
  ResourceOperation,
  ResourceUpdate,
  Schema,
  WatchSubscription,
} from '@asms/protocol';
import { errorMessage, systemClock } from '@asms/protocol';
import { Channel } from '../channel.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

export const DEFAULT_WATCH_CAPACITY = 10;

/**
 * Operation to emit for a successful tick, plus the state the next tick of
 * the same watcher will see.
 */
export type TickDecision<S> = {
  operation: ResourceOperation;
  state: S;
};

export type PollingResourceOptions<S> = {
  uri: string;
  domain: string;
  schema: Schema;
  intervalMs: number;
  fetch: (signal?: AbortSignal) => Promise<DynamicMap>;
  /** Operation for ticks when `classify` is absent. Defaults to `refresh`. */
  operation?: ResourceOperation;
  classify?: (data: DynamicMap, previous: S | undefined) => TickDecision<S>;
  /** Called after every successful tick with the update that was emitted */
  onUpdate?: (update: ResourceUpdate) => void;
  capacity?: number;
  clock?: Clock;
  logger?: Logger;
};

type Watcher = {
  channel: Channel<ResourceUpdate>;
};

export class PollingResource<S = undefined> implements Resource {
  readonly uri: string;
  readonly domain: string;
  readonly schema: Schema;
  readonly intervalMs: number;
  private readonly watchers = new Set<Watcher>();
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly options: PollingResourceOptions<S>) {
    this.uri = options.uri;
    this.domain = options.domain;
    this.schema = options.schema;
    this.intervalMs = options.intervalMs;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  get(signal?: AbortSignal): Promise<DynamicMap> {
    return this.options.fetch(signal);
  }

  watch(signal?: AbortSignal): WatchSubscription {
    const channel = new Channel<ResourceUpdate>(this.options.capacity ?? DEFAULT_WATCH_CAPACITY);
    const watcher: Watcher = { channel };
    const controller = new AbortController();
    let previous: S | undefined;
    let inFlight = false;

    const deliver = (update: ResourceUpdate): void => {
      if (!channel.trySend(update)) {
        this.logger.debug('Dropped resource update for slow watcher', {
          uri: this.uri,
          operation: update.operation,
        });
      }
    };

    const tick = async (): Promise<void> => {
      try {
        const data = await this.options.fetch(controller.signal);
        if (controller.signal.aborted) return;
        let operation = this.options.operation ?? 'refresh';
        if (this.options.classify) {
          const decision = this.options.classify(data, previous);
          operation = decision.operation;
          previous = decision.state;
        }
        const update: ResourceUpdate = { uri: this.uri, timestamp: this.clock.now(), operation, data };
        deliver(update);
        this.options.onUpdate?.(update);
      } catch (error) {
        if (controller.signal.aborted) return;
        this.logger.warn('Resource poll failed', { uri: this.uri, error: errorMessage(error) });
        deliver({
          uri: this.uri,
          timestamp: this.clock.now(),
          operation: 'error',
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    };

    const timer = setInterval(() => {
      if (inFlight) {
        this.logger.debug('Skipped resource tick while previous poll is running', { uri: this.uri });
        return;
      }
      inFlight = true;
      void tick().finally(() => {
        inFlight = false;
      });
    }, this.intervalMs);

    const unsubscribe = (): void => {
      if (controller.signal.aborted) return;
      controller.abort();
      clearInterval(timer);
      signal?.removeEventListener('abort', unsubscribe);
      this.watchers.delete(watcher);
      channel.close();
    };

    this.watchers.add(watcher);
    if (signal?.aborted) {
      unsubscribe();
    } else {
      signal?.addEventListener('abort', unsubscribe, { once: true });
    }

    return { updates: channel, unsubscribe };
  }

  /**
   * Push an update to every current watcher outside the polling schedule.
   *
   * @returns Number of watchers that accepted the update
   */
  broadcast(operation: ResourceOperation, data?: DynamicMap): number {
    const update: ResourceUpdate = { uri: this.uri, timestamp: this.clock.now(), operation, data };
    let delivered = 0;
    for (const watcher of this.watchers) {
      if (watcher.channel.trySend(update)) {
        delivered++;
      }
    }
    return delivered;
  }

  get watcherCount(): number {
    return this.watchers.size;
  }
}

/**
 * Compare one field of consecutive snapshots: `changed` when it differs from
 * the previous tick, `refresh` on the first tick and when it is unchanged.
 */
export function diffField<K extends string>(
  field: K,
  changed: ResourceOperation
): (data: DynamicMap, previous: unknown) => TickDecision<unknown> {
  return (data, previous) => {
    const current = data[field];
    if (previous === undefined || previous === current) {
      return { operation: 'refresh', state: current };
    }
    return { operation: changed, state: current };
  };
}
