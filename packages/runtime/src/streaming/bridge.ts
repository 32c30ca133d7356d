// Provider stream → caller outbound
//
// The provider writes into a bounded internal channel; one forwarding worker
// maps each item to a StreamChunk and sends it to the caller's outbound in
// order. The bridge settles when the provider finishes and the worker has
// drained, when either side fails, or when the signal aborts (rejecting with
// the abort reason). It never closes `outbound`.

import type { ChunkSink, StreamChunk } from '@asms/protocol';
import { raceAbort } from '../abort.js';
import { Channel } from '../channel.js';

export const DEFAULT_STREAM_CAPACITY = 10;

export type StreamBridgeOptions<T> = {
  signal: AbortSignal;
  outbound: ChunkSink<StreamChunk>;
  /** Writes provider items; must stop once `signal` aborts */
  produce: (sink: ChunkSink<T>, signal: AbortSignal) => Promise<void>;
  toChunk: (item: T) => StreamChunk;
  capacity?: number;
};

export async function bridgeStream<T>(options: StreamBridgeOptions<T>): Promise<void> {
  const { signal, outbound, toChunk } = options;
  if (signal.aborted) {
    throw signal.reason;
  }

  const internal = new Channel<T>(options.capacity ?? DEFAULT_STREAM_CAPACITY);
  const producer = options.produce(internal, signal).finally(() => internal.close());
  const worker = (async () => {
    for await (const item of internal) {
      await outbound.send(toChunk(item), signal);
    }
  })();

  try {
    await raceAbort(Promise.all([producer, worker]), signal);
  } finally {
    internal.close();
  }
}

/**
 * Content frame with the provider's finish reason, model and id when known.
 */
export function contentChunk(
  data: unknown,
  meta: { finishReason?: string; model?: string; id?: string }
): StreamChunk {
  const metadata: Record<string, unknown> = {};
  if (meta.finishReason) metadata.finish_reason = meta.finishReason;
  if (meta.model) metadata.model = meta.model;
  if (meta.id) metadata.id = meta.id;
  return { type: 'content', data, metadata };
}
