// Wire projections of alert records

import type { Alert, AlertRule, AlertSeverity, AlertStatus, DynamicMap } from '@asms/protocol';
import {
  ALERT_SEVERITIES,
  ALERT_STATUSES,
  arraySchema,
  booleanSchema,
  formatTimestamp,
  numberSchema,
  objectSchema,
  stringSchema,
} from '@asms/protocol';
import { invalidAlertStatus, invalidSeverity } from '../errors.js';

export function isSeverity(value: unknown): value is AlertSeverity {
  return ALERT_SEVERITIES.some((severity) => severity === value);
}

export function isAlertStatus(value: unknown): value is AlertStatus {
  return ALERT_STATUSES.some((status) => status === value);
}

export function parseSeverity(value: unknown): AlertSeverity {
  if (!isSeverity(value)) throw invalidSeverity(value);
  return value;
}

export function parseAlertStatus(value: unknown): AlertStatus {
  if (!isAlertStatus(value)) throw invalidAlertStatus(value);
  return value;
}

export function ruleToMap(rule: AlertRule): DynamicMap {
  return {
    id: rule.id,
    name: rule.name,
    condition: rule.condition,
    severity: rule.severity,
    channels: [...rule.channels],
    cooldown: rule.cooldown,
    enabled: rule.enabled,
  };
}

export function alertToMap(alert: Alert): DynamicMap {
  return {
    id: alert.id,
    rule_id: alert.ruleId,
    rule_name: alert.ruleName,
    severity: alert.severity,
    status: alert.status,
    message: alert.message,
    triggered_at: formatTimestamp(alert.triggeredAt),
  };
}

export const ruleSchema = objectSchema({
  id: stringSchema(),
  name: stringSchema(),
  condition: stringSchema(),
  severity: stringSchema({ enum: ALERT_SEVERITIES }),
  channels: arraySchema(stringSchema()),
  cooldown: numberSchema(),
  enabled: booleanSchema(),
});

export const alertSchema = objectSchema({
  id: stringSchema(),
  rule_id: stringSchema(),
  rule_name: stringSchema(),
  severity: stringSchema({ enum: ALERT_SEVERITIES }),
  status: stringSchema({ enum: ALERT_STATUSES }),
  message: stringSchema(),
  triggered_at: stringSchema({ description: 'RFC 3339 timestamp' }),
});

export const successSchema = objectSchema({ success: booleanSchema() });
