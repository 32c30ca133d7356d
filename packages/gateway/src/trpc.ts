// tRPC initialization
//
// superjson carries Dates (event timestamps, resource update times) across the
// wire. The error formatter exposes the unit error code next to tRPC's own.

import { initTRPC } from '@trpc/server';
import superjson from 'superjson';
import { asUnitError, errorToHttpStatus } from '@asms/protocol';
import type { Context } from './context.js';

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    const unitError = asUnitError(error.cause);
    return {
      ...shape,
      data: {
        ...shape.data,
        unitCode: unitError?.code ?? null,
        domain: unitError?.domain ?? null,
        httpStatus: unitError ? errorToHttpStatus(unitError.code) : shape.data.httpStatus,
      },
    };
  },
});

export const router = t.router;

export const middleware = t.middleware;

const logFailures = middleware(async ({ ctx, path, type, next }) => {
  const result = await next();
  if (!result.ok) {
    ctx.logger.warn('Procedure failed', {
      path,
      type,
      code: result.error.code,
      error: result.error.message,
    });
  }
  return result;
});

/**
 * Every procedure logs its failures at warn.
 */
export const publicProcedure = t.procedure.use(logFailures);

export const createCallerFactory = t.createCallerFactory;
