// Units as values
//
// A unit is a plain object carrying its metadata and an execute function.
// These constructors wrap the domain handler with the execution lifecycle:
// Started before anything else, then exactly one of Completed or Failed.

import type {
  ChunkSink,
  Clock,
  Command,
  DynamicMap,
  EventPublisher,
  Example,
  Query,
  StreamChunk,
  StreamingCommand,
  UnitContext,
  UnitMetadata,
} from '@asms/protocol';
import { requireMap } from '@asms/protocol';
import type { Logger } from '../logger.js';
import { ExecutionContext } from './execution-context.js';

/**
 * Collaborators shared by every unit of a domain.
 */
export type UnitDeps = {
  /** Absent means events are discarded */
  events?: EventPublisher;
  logger?: Logger;
  clock?: Clock;
};

export type UnitHandler = (
  input: DynamicMap,
  ctx: UnitContext,
  exec: ExecutionContext
) => Promise<DynamicMap>;

export type StreamHandler = (
  input: DynamicMap,
  ctx: UnitContext,
  outbound: ChunkSink<StreamChunk>,
  exec: ExecutionContext
) => Promise<void>;

export type UnitDefinition = Omit<UnitMetadata, 'examples'> & {
  examples?: readonly Example[];
  run: UnitHandler;
};

export type StreamingUnitDefinition = UnitDefinition & {
  stream: StreamHandler;
};

function createExecution(def: UnitDefinition, ctx: UnitContext, deps: UnitDeps): ExecutionContext {
  return new ExecutionContext(deps.events, def.domain, def.name, {
    clock: deps.clock,
    logger: deps.logger,
    requestId: ctx.requestId,
  });
}

function instrument(def: UnitDefinition, deps: UnitDeps) {
  return async (ctx: UnitContext, input: unknown): Promise<DynamicMap> => {
    const exec = createExecution(def, ctx, deps);
    exec.publishStarted(input);
    try {
      const output = await def.run(requireMap(input, def.domain), ctx, exec);
      exec.publishCompleted(output);
      return output;
    } catch (error) {
      exec.publishFailed(error);
      throw error;
    }
  };
}

function metadataOf(def: UnitDefinition): UnitMetadata {
  return {
    name: def.name,
    domain: def.domain,
    description: def.description,
    inputSchema: def.inputSchema,
    outputSchema: def.outputSchema,
    examples: def.examples ?? [],
  };
}

export function defineCommand(def: UnitDefinition, deps: UnitDeps = {}): Command {
  return {
    ...metadataOf(def),
    kind: 'command',
    execute: instrument(def, deps),
  };
}

export function defineQuery(def: UnitDefinition, deps: UnitDeps = {}): Query {
  return {
    ...metadataOf(def),
    kind: 'query',
    execute: instrument(def, deps),
  };
}

/**
 * A command with both a unary and a streaming form. The streaming form
 * reports the number of frames it forwarded as its completed output.
 */
export function defineStreamingCommand(
  def: StreamingUnitDefinition,
  deps: UnitDeps = {}
): StreamingCommand {
  return {
    ...metadataOf(def),
    kind: 'command',
    supportsStreaming: true,
    execute: instrument(def, deps),
    async executeStream(ctx, input, outbound) {
      const exec = createExecution(def, ctx, deps);
      exec.publishStarted(input);
      let chunks = 0;
      const counting: ChunkSink<StreamChunk> = {
        async send(chunk, signal) {
          await outbound.send(chunk, signal);
          chunks++;
        },
      };
      try {
        await def.stream(requireMap(input, def.domain), ctx, counting, exec);
        exec.publishCompleted({ chunks });
      } catch (error) {
        exec.publishFailed(error);
        throw error;
      }
    },
  };
}
