// Alert domain types

import type { Id } from './common.js';

export type AlertSeverity = 'info' | 'warning' | 'critical';

export type AlertStatus = 'firing' | 'acknowledged' | 'resolved';

export const ALERT_SEVERITIES: readonly AlertSeverity[] = ['info', 'warning', 'critical'];

export const ALERT_STATUSES: readonly AlertStatus[] = ['firing', 'acknowledged', 'resolved'];

/**
 * A condition that raises alerts when it holds.
 */
export type AlertRule = {
  id: Id;
  name: string;
  /** Expression such as `cpu.utilization > 80` */
  condition: string;
  severity: AlertSeverity;
  /** Notification channel names */
  channels: string[];
  /** Seconds to wait before the rule may fire again */
  cooldown: number;
  enabled: boolean;
  createdAt: Date;
  updatedAt: Date;
};

/**
 * A raised alert.
 *
 * Lifecycle: enters as `firing`; acknowledge moves it to `acknowledged`;
 * resolve moves any state to `resolved`.
 */
export type Alert = {
  id: Id;
  ruleId: Id;
  ruleName: string;
  severity: AlertSeverity;
  status: AlertStatus;
  message: string;
  metrics?: Record<string, unknown>;
  triggeredAt: Date;
  acknowledgedAt?: Date;
  resolvedAt?: Date;
};

export type RuleFilter = {
  enabledOnly?: boolean;
};

export type AlertFilter = {
  ruleId?: Id;
  status?: AlertStatus;
  severity?: AlertSeverity;
  /** 0 or absent means no limit */
  limit?: number;
  offset?: number;
};

export type AlertEventType = 'alert.triggered' | 'alert.acknowledged' | 'alert.resolved';

export function isActiveAlert(alert: Pick<Alert, 'status'>): boolean {
  return alert.status === 'firing' || alert.status === 'acknowledged';
}
