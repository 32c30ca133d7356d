// Resources router - snapshots and live watches

import { z } from 'zod';
import { guard, toTRPCError } from '../errors.js';
import { resourceNotFound, watchUpdates } from '../streams.js';
import { publicProcedure, router } from '../trpc.js';

const UriInput = z.object({ uri: z.string().min(1) });

export const resourcesRouter = router({
  /**
   * Static resources plus the URI patterns that factories resolve.
   */
  list: publicProcedure.query(({ ctx }) => ({
    resources: ctx.registry.listResources().map((resource) => ({
      uri: resource.uri,
      domain: resource.domain,
      schema: resource.schema,
    })),
    patterns: ctx.registry.listResourceFactories().map((factory) => factory.pattern),
  })),

  get: publicProcedure.input(UriInput).query(({ ctx, input, signal }) =>
    guard(async () => {
      const resource = ctx.registry.getResource(input.uri);
      if (!resource) throw resourceNotFound(input.uri);
      return { uri: resource.uri, data: await resource.get(signal) };
    })
  ),

  watch: publicProcedure.input(UriInput).subscription(async function* ({ ctx, input, signal }) {
    const resource = ctx.registry.getResource(input.uri);
    if (!resource) throw toTRPCError(resourceNotFound(input.uri));
    yield* watchUpdates(resource.watch(signal), signal);
  }),
});
