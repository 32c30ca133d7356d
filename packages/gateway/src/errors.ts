// Unit errors → tRPC errors

import { TRPCError } from '@trpc/server';
import type { ErrorCode } from '@asms/protocol';
import { asUnitError, errorMessage, errorToHttpStatus } from '@asms/protocol';

export type TRPCErrorCode = TRPCError['code'];

/**
 * tRPC code for a unit error code, following its HTTP status.
 */
export function toTRPCCode(code: ErrorCode): TRPCErrorCode {
  switch (errorToHttpStatus(code)) {
    case 400:
      return 'BAD_REQUEST';
    case 404:
      return 'NOT_FOUND';
    case 408:
      return 'TIMEOUT';
    case 409:
      return 'CONFLICT';
    case 429:
      return 'TOO_MANY_REQUESTS';
    default:
      return 'INTERNAL_SERVER_ERROR';
  }
}

function isTimeoutReason(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

/**
 * Convert anything a unit throws. The original error stays as `cause` so the
 * error formatter can read its unit code.
 */
export function toTRPCError(error: unknown): TRPCError {
  if (error instanceof TRPCError) return error;
  const unitError = asUnitError(error);
  if (unitError) {
    return new TRPCError({ code: toTRPCCode(unitError.code), message: errorMessage(error), cause: error });
  }
  if (isTimeoutReason(error)) {
    return new TRPCError({ code: 'TIMEOUT', message: errorMessage(error), cause: error });
  }
  return new TRPCError({ code: 'INTERNAL_SERVER_ERROR', message: errorMessage(error), cause: error });
}

/**
 * Run a resolver body, converting whatever it throws.
 */
export async function guard<T>(run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw toTRPCError(error);
  }
}
