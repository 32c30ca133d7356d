// Tests for the unit error taxonomy

import { describe, it, expect } from 'vitest';
import {
  UnitError,
  asUnitError,
  errorCodeOf,
  errorToHttpStatus,
  hasCode,
  isAlreadyExists,
  isInvalidInput,
  isNotFound,
  isRateLimited,
  isTimeout,
  sameCode,
  toErrorInfo,
  wrapError,
  wrapWithCode,
} from './errors.js';

const ruleNotFound = new UnitError('alert_rule_not_found', 'rule not found', { domain: 'alert' });

describe('UnitError', () => {
  it('carries code, domain and details', () => {
    const error = new UnitError('invalid_input', 'bad', { domain: 'device', details: { field: 'x' } });
    expect(error.code).toBe('invalid_input');
    expect(error.domain).toBe('device');
    expect(error.details).toEqual({ field: 'x' });
    expect(error.message).toBe('bad');
    expect(error.name).toBe('UnitError');
  });

  it('compares by code', () => {
    const other = new UnitError('alert_rule_not_found', 'different text');
    expect(ruleNotFound.is(other)).toBe(true);
    expect(ruleNotFound.is(new UnitError('alert_not_found', 'rule not found'))).toBe(false);
  });

  it('merges details into a copy', () => {
    const copy = ruleNotFound.withDetails({ ruleId: 'r1' });
    expect(copy.details).toEqual({ ruleId: 'r1' });
    expect(ruleNotFound.details).toBeUndefined();
  });
});

describe('wrapError', () => {
  it('prefixes the message and keeps the code', () => {
    const wrapped = wrapError('create rule', ruleNotFound);
    expect(wrapped.message).toBe('create rule: rule not found');
    expect(wrapped.code).toBe('alert_rule_not_found');
    expect(wrapped.domain).toBe('alert');
    expect(wrapped.cause).toBe(ruleNotFound);
  });

  it('keeps the code through several layers', () => {
    const wrapped = wrapError('outer', wrapError('inner', ruleNotFound));
    expect(wrapped.message).toBe('outer: inner: rule not found');
    expect(hasCode(wrapped, 'alert_rule_not_found')).toBe(true);
    expect(sameCode(wrapped, ruleNotFound)).toBe(true);
  });

  it('turns plain errors into internal errors', () => {
    const wrapped = wrapError('save', new Error('disk full'));
    expect(wrapped.code).toBe('internal_error');
    expect(wrapped.message).toBe('save: disk full');
  });
});

describe('wrapWithCode', () => {
  it('re-tags while the original stays reachable', () => {
    const cause = new UnitError('device_unreachable', 'no route');
    const wrapped = wrapWithCode('service_start_failed', 'start service svc-1', cause, 'service');
    expect(wrapped.code).toBe('service_start_failed');
    expect(wrapped.domain).toBe('service');
    expect(wrapped.message).toBe('start service svc-1: no route');
    expect(hasCode(wrapped, 'device_unreachable')).toBe(true);
  });
});

describe('asUnitError', () => {
  it('finds a UnitError behind plain errors', () => {
    const outer = new Error('outer', { cause: ruleNotFound });
    expect(asUnitError(outer)).toBe(ruleNotFound);
    expect(errorCodeOf(outer)).toBe('alert_rule_not_found');
  });

  it('returns undefined for non-errors', () => {
    expect(asUnitError('boom')).toBeUndefined();
    expect(errorCodeOf('boom')).toBe('internal_error');
  });
});

describe('predicates', () => {
  it('classifies error codes', () => {
    expect(isNotFound(ruleNotFound)).toBe(true);
    expect(isNotFound(new UnitError('not_found', 'x'))).toBe(true);
    expect(isNotFound(new UnitError('internal_error', 'x'))).toBe(false);
    expect(isAlreadyExists(new UnitError('already_exists', 'x'))).toBe(true);
    expect(isInvalidInput(new UnitError('invalid_input', 'x'))).toBe(true);
    expect(isTimeout(new UnitError('inference_timeout', 'x'))).toBe(true);
    expect(isRateLimited(new UnitError('inference_rate_limited', 'x'))).toBe(true);
    expect(isRateLimited(new Error('x'))).toBe(false);
  });
});

describe('errorToHttpStatus', () => {
  it('maps codes to response statuses', () => {
    expect(errorToHttpStatus('invalid_input')).toBe(400);
    expect(errorToHttpStatus('device_not_found')).toBe(404);
    expect(errorToHttpStatus('not_found')).toBe(404);
    expect(errorToHttpStatus('already_exists')).toBe(409);
    expect(errorToHttpStatus('inference_timeout')).toBe(408);
    expect(errorToHttpStatus('inference_rate_limited')).toBe(429);
    expect(errorToHttpStatus('device_unreachable')).toBe(503);
    expect(errorToHttpStatus('service_scale_failed')).toBe(500);
    expect(errorToHttpStatus('internal_error')).toBe(500);
  });
});

describe('toErrorInfo', () => {
  it('renders unit errors', () => {
    expect(toErrorInfo(wrapError('get rule', ruleNotFound))).toEqual({
      code: 'alert_rule_not_found',
      message: 'get rule: rule not found',
      domain: 'alert',
    });
  });

  it('renders foreign errors as internal', () => {
    expect(toErrorInfo(new TypeError('oops'))).toEqual({ code: 'internal_error', message: 'oops' });
  });
});
