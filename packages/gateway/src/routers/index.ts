// Root router - combines the unit, resource and event routers

import { publicProcedure, router } from '../trpc.js';
import { eventsRouter } from './events.js';
import { resourcesRouter } from './resources.js';
import { unitsRouter } from './units.js';

/**
 * Usage from a client:
 * ```ts
 * const models = await client.units.execute.mutate({ name: 'inference.models', input: {} });
 * client.resources.watch.subscribe({ uri: 'asms://services' }, { onData: console.log });
 * ```
 */
export const appRouter = router({
  units: unitsRouter,
  resources: resourcesRouter,
  events: eventsRouter,

  health: publicProcedure.query(({ ctx }) => {
    const counts = ctx.registry.counts();
    return {
      status: 'ok' as const,
      commands: counts.commands,
      queries: counts.queries,
      resources: counts.resources,
    };
  }),
});

export type AppRouter = typeof appRouter;
