// Name-based dispatch: look a unit up, validate its input, run it

import type { ChunkSink, DynamicMap, StreamChunk, StreamingCommand } from '@asms/protocol';
import { UnitError, isStreamingCommand, schemaError } from '@asms/protocol';
import { combineSignals, raceAbort } from '../abort.js';
import { Channel } from '../channel.js';
import { DEFAULT_STREAM_CAPACITY } from '../streaming/bridge.js';
import { generateRequestId } from './execution-context.js';
import type { UnitRegistry } from './registry.js';

export type DispatchOptions = {
  signal?: AbortSignal;
  /** Abort the call after this many milliseconds */
  timeoutMs?: number;
  requestId?: string;
};

export type StreamOptions = DispatchOptions & {
  /** Capacity of the outbound channel */
  bufferSize?: number;
};

function unitNotFound(name: string): UnitError {
  return new UnitError('not_found', `unit not found: ${name}`, { details: { name } });
}

function validateInput(schema: StreamingCommand['inputSchema'], input: unknown, domain: string): void {
  const error = schemaError(schema, input ?? {}, domain);
  if (error) throw error;
}

/**
 * Execute a command or query by name. Commands are looked up first.
 * Unknown names fail `not_found`; inputs that do not conform to the unit's
 * input schema fail `invalid_input` before the unit runs.
 */
export async function executeUnit(
  registry: UnitRegistry,
  name: string,
  input: unknown,
  options: DispatchOptions = {}
): Promise<DynamicMap> {
  const unit = registry.getUnit(name);
  if (!unit) {
    throw unitNotFound(name);
  }
  validateInput(unit.inputSchema, input, unit.domain);

  const signal = combineSignals(options.signal, options.timeoutMs);
  return raceAbort(
    unit.execute({ signal, requestId: options.requestId ?? generateRequestId() }, input),
    signal
  );
}

/**
 * Stream a command by name into a caller-owned sink.
 */
export async function streamUnit(
  registry: UnitRegistry,
  name: string,
  input: unknown,
  outbound: ChunkSink<StreamChunk>,
  options: DispatchOptions = {}
): Promise<void> {
  const command = registry.getCommand(name);
  if (!command) {
    throw unitNotFound(name);
  }
  if (!isStreamingCommand(command)) {
    throw new UnitError('invalid_input', `unit does not support streaming: ${name}`, {
      domain: command.domain,
    });
  }
  validateInput(command.inputSchema, input, command.domain);

  const signal = combineSignals(options.signal, options.timeoutMs);
  await raceAbort(
    command.executeStream(
      { signal, requestId: options.requestId ?? generateRequestId() },
      input,
      outbound
    ),
    signal
  );
}

/**
 * Stream a command as an async iterable of chunks. The iterable owns the
 * outbound channel; leaving the loop early cancels the stream.
 */
export async function* iterateStream(
  registry: UnitRegistry,
  name: string,
  input: unknown,
  options: StreamOptions = {}
): AsyncGenerator<StreamChunk, void, undefined> {
  const controller = new AbortController();
  const signal = options.signal ? AbortSignal.any([options.signal, controller.signal]) : controller.signal;
  const channel = new Channel<StreamChunk>(options.bufferSize ?? DEFAULT_STREAM_CAPACITY);

  const run: Promise<{ error: unknown } | undefined> = streamUnit(registry, name, input, channel, {
    ...options,
    signal,
  }).then(
    () => {
      channel.close();
      return undefined;
    },
    (error: unknown) => {
      channel.close();
      return { error };
    }
  );

  try {
    for await (const chunk of channel) {
      yield chunk;
    }
    const failure = await run;
    if (failure) {
      throw failure.error;
    }
  } finally {
    if (!controller.signal.aborted) {
      controller.abort(new UnitError('internal_error', 'stream closed by consumer'));
    }
    channel.close();
  }
}
