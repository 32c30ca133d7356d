// Domain error constructors
//
// Every error a unit raises is a UnitError; these helpers fix the code and
// domain tag for each failure so callers can dispatch on the code.

import { UnitError } from '@asms/protocol';

export const ALERT_DOMAIN = 'alert';
export const DEVICE_DOMAIN = 'device';
export const INFERENCE_DOMAIN = 'inference';
export const SERVICE_DOMAIN = 'service';

/**
 * No backend provider was configured for a domain that needs one.
 */
export function providerNotSet(domain: string): UnitError {
  return new UnitError('internal_error', `${domain} provider not set`, {
    domain,
    details: { reason: 'provider_not_set' },
  });
}

// --- Device ---

export function deviceNotFound(deviceId?: string): UnitError {
  const message = deviceId ? `device not found: ${deviceId}` : 'device not found';
  return new UnitError('device_not_found', message, {
    domain: DEVICE_DOMAIN,
    details: deviceId ? { deviceId } : undefined,
  });
}

export function invalidDeviceId(): UnitError {
  return new UnitError('invalid_input', 'invalid device id', {
    domain: DEVICE_DOMAIN,
    details: { field: 'device_id' },
  });
}

export function invalidPowerLimit(): UnitError {
  return new UnitError('invalid_input', 'invalid power limit: limit_watts must be a positive number', {
    domain: DEVICE_DOMAIN,
    details: { field: 'limit_watts' },
  });
}

// --- Alert ---

export function invalidSeverity(value: unknown): UnitError {
  return new UnitError('invalid_input', `invalid severity: ${String(value)}`, {
    domain: ALERT_DOMAIN,
    details: { field: 'severity' },
  });
}

export function invalidAlertStatus(value: unknown): UnitError {
  return new UnitError('invalid_input', `invalid status: ${String(value)}`, {
    domain: ALERT_DOMAIN,
    details: { field: 'status' },
  });
}

// --- Inference ---

export function modelNotSpecified(): UnitError {
  return new UnitError('invalid_input', 'model not specified', {
    domain: INFERENCE_DOMAIN,
    details: { field: 'model' },
  });
}

export function missingField(domain: string, field: string, message?: string): UnitError {
  return new UnitError('invalid_input', message ?? `${field} is required`, {
    domain,
    details: { field },
  });
}

export function modelNotLoaded(model: string): UnitError {
  return new UnitError('inference_model_not_loaded', `model not loaded: ${model}`, {
    domain: INFERENCE_DOMAIN,
    details: { model },
  });
}

// --- Service ---

export function invalidServiceId(serviceId: string): UnitError {
  return new UnitError('invalid_input', `invalid service id: ${serviceId}`, {
    domain: SERVICE_DOMAIN,
    details: { serviceId },
  });
}

export function serviceAlreadyRunning(serviceId: string): UnitError {
  return new UnitError('service_already_running', `service already running: ${serviceId}`, {
    domain: SERVICE_DOMAIN,
    details: { serviceId },
  });
}

export function invalidReplicas(): UnitError {
  return new UnitError('invalid_input', 'replicas must be a non-negative integer', {
    domain: SERVICE_DOMAIN,
    details: { field: 'replicas' },
  });
}

export function invalidResourceClass(value: unknown): UnitError {
  return new UnitError('invalid_input', `invalid resource class: ${String(value)}`, {
    domain: SERVICE_DOMAIN,
    details: { field: 'resource_class' },
  });
}

export function invalidServiceStatus(value: unknown): UnitError {
  return new UnitError('invalid_input', `invalid service status: ${String(value)}`, {
    domain: SERVICE_DOMAIN,
    details: { field: 'status' },
  });
}
