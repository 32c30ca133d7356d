// Units router - discovery, execution and streaming of commands and queries

import { z } from 'zod';
import { UnitError } from '@asms/protocol';
import { describeUnit, executeUnit, generateRequestId, iterateStream } from '@asms/runtime';
import { guard, toTRPCError } from '../errors.js';
import { publicProcedure, router } from '../trpc.js';

const UnitInputSchema = z.record(z.string(), z.unknown()).default({});

function unitNotFound(name: string): UnitError {
  return new UnitError('not_found', `unit not found: ${name}`, { details: { name } });
}

export const unitsRouter = router({
  /**
   * Discovery records for every command and query.
   */
  list: publicProcedure.query(({ ctx }) => ctx.registry.listUnits().map(describeUnit)),

  get: publicProcedure.input(z.object({ name: z.string().min(1) })).query(({ ctx, input }) =>
    guard(async () => {
      const unit = ctx.registry.getUnit(input.name);
      if (!unit) throw unitNotFound(input.name);
      return describeUnit(unit);
    })
  ),

  /**
   * Run a command or query under the configured request timeout.
   */
  execute: publicProcedure
    .input(z.object({ name: z.string().min(1), input: UnitInputSchema }))
    .mutation(({ ctx, input, signal }) =>
      guard(async () => {
        const requestId = generateRequestId();
        const startedAt = Date.now();
        const data = await executeUnit(ctx.registry, input.name, input.input, {
          signal,
          timeoutMs: ctx.config.requestTimeoutMs,
          requestId,
        });
        return { success: true as const, data, meta: { requestId, durationMs: Date.now() - startedAt } };
      })
    ),

  /**
   * Stream chunks of a streaming command. Unsubscribing cancels the command.
   */
  stream: publicProcedure
    .input(z.object({ name: z.string().min(1), input: UnitInputSchema }))
    .subscription(async function* ({ ctx, input, signal }) {
      try {
        yield* iterateStream(ctx.registry, input.name, input.input, {
          signal,
          bufferSize: ctx.config.streamBuffer,
        });
      } catch (error) {
        throw toTRPCError(error);
      }
    }),
});
