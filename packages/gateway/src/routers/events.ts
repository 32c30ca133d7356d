// Events router - live feed of published events

import { z } from 'zod';
import { subscribeEvents } from '../streams.js';
import { publicProcedure, router } from '../trpc.js';

export const eventsRouter = router({
  /**
   * Every event, or only those of `type` (e.g. `alert.triggered`).
   */
  subscribe: publicProcedure
    .input(z.object({ type: z.string().optional() }).default({}))
    .subscription(async function* ({ ctx, input, signal }) {
      yield* subscribeEvents(ctx.eventBus, {
        type: input.type,
        capacity: ctx.config.streamBuffer,
        logger: ctx.logger,
        signal,
      });
    }),
});
