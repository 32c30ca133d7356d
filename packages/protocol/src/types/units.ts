// Unit contracts: commands, queries and streaming commands

import type { DynamicMap } from './common.js';
import type { Schema } from './schema.js';

/**
 * Documentation payload attached to a unit. Not validated at runtime.
 */
export type Example = {
  input: unknown;
  output: unknown;
  description: string;
};

/**
 * Per-call context handed to every unit.
 */
export type UnitContext = {
  /** Aborted when the caller cancels or the request times out */
  signal: AbortSignal;
  /** Transport-assigned request id, if any */
  requestId?: string;
};

export type UnitKind = 'command' | 'query';

/**
 * Descriptors shared by every unit. `name` has the form `<domain>.<verb>`.
 */
export type UnitMetadata = {
  name: string;
  domain: string;
  description: string;
  inputSchema: Schema;
  outputSchema: Schema;
  examples: readonly Example[];
};

/**
 * A uniformly described operation.
 *
 * `input` is the decoded wire payload; `execute` narrows it and returns a map
 * conforming to `outputSchema`, or rejects with a UnitError.
 */
export type Unit = UnitMetadata & {
  kind: UnitKind;
  execute(ctx: UnitContext, input: unknown): Promise<DynamicMap>;
};

/**
 * A unit that may mutate state.
 */
export type Command = Unit & {
  kind: 'command';
};

/**
 * A read-only unit.
 */
export type Query = Unit & {
  kind: 'query';
};

/**
 * Caller-facing stream frame. `type` is `content` for content frames.
 */
export type StreamChunk = {
  type: string;
  data: unknown;
  metadata: DynamicMap;
};

/**
 * Write side of a bounded channel owned by the caller.
 */
export type ChunkSink<T> = {
  /** Resolves once the value is buffered; rejects with the signal's reason if aborted first */
  send(value: T, signal?: AbortSignal): Promise<void>;
};

/**
 * A command that can also stream its output.
 *
 * `executeStream` writes zero or more frames to `outbound` in producer order
 * and settles when the provider stream completes, fails or `ctx.signal`
 * aborts (rejecting with the abort reason). It never closes `outbound`.
 */
export type StreamingCommand = Command & {
  supportsStreaming: true;
  executeStream(ctx: UnitContext, input: unknown, outbound: ChunkSink<StreamChunk>): Promise<void>;
};

export function isStreamingCommand(unit: Unit): unit is StreamingCommand {
  return 'supportsStreaming' in unit && unit.supportsStreaming === true;
}
