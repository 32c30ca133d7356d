// Store errors

import { UnitError } from '@asms/protocol';

export function ruleNotFound(id: string): UnitError {
  return new UnitError('alert_rule_not_found', `alert rule not found: ${id}`, {
    domain: 'alert',
    details: { ruleId: id },
  });
}

export function ruleAlreadyExists(id: string): UnitError {
  return new UnitError('already_exists', `alert rule already exists: ${id}`, {
    domain: 'alert',
    details: { ruleId: id },
  });
}

export function alertNotFound(id: string): UnitError {
  return new UnitError('alert_not_found', `alert not found: ${id}`, {
    domain: 'alert',
    details: { alertId: id },
  });
}

export function serviceNotFound(id: string): UnitError {
  return new UnitError('service_not_found', `service not found: ${id}`, {
    domain: 'service',
    details: { serviceId: id },
  });
}

export function serviceAlreadyExists(id: string): UnitError {
  return new UnitError('already_exists', `service already exists: ${id}`, {
    domain: 'service',
    details: { serviceId: id },
  });
}
