// Unit error taxonomy
//
// Errors are identified by a stable code. Messages may be wrapped with
// context as they propagate; callers dispatch on the code, never the text.

/**
 * Stable error codes shared by every domain and the transport.
 */
export type ErrorCode =
  // input
  | 'invalid_input'
  // resource
  | 'not_found'
  | 'already_exists'
  | 'alert_rule_not_found'
  | 'alert_not_found'
  | 'device_not_found'
  | 'service_not_found'
  | 'service_already_running'
  | 'inference_model_not_loaded'
  // operation
  | 'inference_timeout'
  | 'inference_rate_limited'
  | 'service_start_failed'
  | 'service_scale_failed'
  | 'device_unreachable'
  | 'device_metrics_error'
  // internal
  | 'internal_error';

export const ERROR_CODES: readonly ErrorCode[] = [
  'invalid_input',
  'not_found',
  'already_exists',
  'alert_rule_not_found',
  'alert_not_found',
  'device_not_found',
  'service_not_found',
  'service_already_running',
  'inference_model_not_loaded',
  'inference_timeout',
  'inference_rate_limited',
  'service_start_failed',
  'service_scale_failed',
  'device_unreachable',
  'device_metrics_error',
  'internal_error',
];

/**
 * Transport-facing error payload.
 */
export type ErrorInfo = {
  code: ErrorCode;
  message: string;
  domain?: string;
  details?: Record<string, unknown>;
};

export type UnitErrorOptions = {
  domain?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
};

/**
 * Base class for all unit errors.
 * Two errors with the same code are the same error for dispatch purposes.
 */
export class UnitError extends Error {
  readonly code: ErrorCode;
  readonly domain?: string;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options: UnitErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'UnitError';
    this.code = code;
    this.domain = options.domain;
    this.details = options.details;
  }

  /**
   * Copy of this error with extra details merged in.
   */
  withDetails(details: Record<string, unknown>): UnitError {
    return new UnitError(this.code, this.message, {
      domain: this.domain,
      details: { ...this.details, ...details },
      cause: this.cause,
    });
  }

  /**
   * Identity by code, not by message.
   */
  is(other: unknown): boolean {
    return other instanceof UnitError && other.code === this.code;
  }

  toInfo(): ErrorInfo {
    const info: ErrorInfo = { code: this.code, message: this.message };
    if (this.domain !== undefined) info.domain = this.domain;
    if (this.details !== undefined) info.details = this.details;
    return info;
  }
}

/**
 * Create an `invalid_input` error, optionally tagged with a domain.
 */
export function invalidInput(message: string, options: UnitErrorOptions = {}): UnitError {
  return new UnitError('invalid_input', message, options);
}

/**
 * Find the first UnitError in an error's cause chain.
 */
export function asUnitError(err: unknown): UnitError | undefined {
  let current: unknown = err;
  for (let depth = 0; current !== undefined && current !== null && depth < 32; depth++) {
    if (current instanceof UnitError) {
      return current;
    }
    if (current instanceof Error) {
      current = current.cause;
    } else {
      return undefined;
    }
  }
  return undefined;
}

/**
 * Wrap an error with a context phrase ("create rule: ...").
 * Code and domain of the wrapped UnitError survive; anything else becomes
 * `internal_error`.
 */
export function wrapError(context: string, err: unknown): UnitError {
  const message = `${context}: ${errorMessage(err)}`;
  const inner = asUnitError(err);
  if (inner) {
    return new UnitError(inner.code, message, {
      domain: inner.domain,
      details: inner.details,
      cause: err,
    });
  }
  return new UnitError('internal_error', message, { cause: err });
}

/**
 * Re-tag an error with a new code while keeping the original as its cause.
 */
export function wrapWithCode(
  code: ErrorCode,
  context: string,
  err: unknown,
  domain?: string
): UnitError {
  return new UnitError(code, `${context}: ${errorMessage(err)}`, {
    domain: domain ?? asUnitError(err)?.domain,
    cause: err,
  });
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * True when any error in the cause chain carries `code`.
 */
export function hasCode(err: unknown, code: ErrorCode): boolean {
  let current: unknown = err;
  for (let depth = 0; current instanceof Error && depth < 32; depth++) {
    if (current instanceof UnitError && current.code === code) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

/**
 * Code of the outermost UnitError, or `internal_error`.
 */
export function errorCodeOf(err: unknown): ErrorCode {
  return asUnitError(err)?.code ?? 'internal_error';
}

export function sameCode(a: unknown, b: unknown): boolean {
  const left = asUnitError(a);
  const right = asUnitError(b);
  return left !== undefined && right !== undefined && left.code === right.code;
}

export function isNotFoundCode(code: ErrorCode): boolean {
  return code === 'not_found' || code.endsWith('_not_found');
}

export function isNotFound(err: unknown): boolean {
  const unitError = asUnitError(err);
  return unitError !== undefined && isNotFoundCode(unitError.code);
}

export function isAlreadyExists(err: unknown): boolean {
  const code = asUnitError(err)?.code;
  return code === 'already_exists' || code === 'service_already_running';
}

export function isInvalidInput(err: unknown): boolean {
  return asUnitError(err)?.code === 'invalid_input';
}

export function isTimeout(err: unknown): boolean {
  return asUnitError(err)?.code === 'inference_timeout';
}

export function isRateLimited(err: unknown): boolean {
  return asUnitError(err)?.code === 'inference_rate_limited';
}

/**
 * HTTP status a transport should answer with for an error code.
 */
export function errorToHttpStatus(code: ErrorCode): number {
  if (code === 'invalid_input') return 400;
  if (isNotFoundCode(code)) return 404;
  switch (code) {
    case 'already_exists':
    case 'service_already_running':
      return 409;
    case 'inference_timeout':
      return 408;
    case 'inference_rate_limited':
      return 429;
    case 'device_unreachable':
      return 503;
    default:
      return 500;
  }
}

/**
 * Convert any thrown value into the transport payload.
 */
export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof UnitError) {
    return err.toInfo();
  }
  const inner = asUnitError(err);
  if (inner) {
    return { ...inner.toInfo(), message: errorMessage(err) };
  }
  return { code: 'internal_error', message: errorMessage(err) };
}
