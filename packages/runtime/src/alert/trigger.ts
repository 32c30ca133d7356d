// Raising alerts from rules

import type { Alert, AlertRule, Clock, EventPublisher } from '@asms/protocol';
import { errorMessage, systemClock, wrapError } from '@asms/protocol';
import type { AlertRepository } from '@asms/repositories';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { safePublish } from '../events/publishers.js';
import type { PollingResource } from '../resources/poller.js';
import { createAlertEvent } from './events.js';

export type AlertTriggerDeps = {
  alerts: AlertRepository;
  events?: EventPublisher;
  clock?: Clock;
  logger?: Logger;
  /** Watchers of this resource are told about each new alert immediately */
  active?: PollingResource;
};

// Pending trigger per rule, per store. A trigger waits for the previous one on
// the same rule so the cooldown check and the insert are never interleaved.
const pendingTriggers = new WeakMap<AlertRepository, Map<string, Promise<void>>>();

function serializeByRule<T>(alerts: AlertRepository, ruleId: string, run: () => Promise<T>): Promise<T> {
  const chains = pendingTriggers.get(alerts) ?? new Map<string, Promise<void>>();
  pendingTriggers.set(alerts, chains);
  const previous = chains.get(ruleId) ?? Promise.resolve();
  const result = previous.then(run);
  const release = (): void => {
    if (chains.get(ruleId) === tail) chains.delete(ruleId);
  };
  const tail: Promise<void> = result.then(release, release);
  chains.set(ruleId, tail);
  return result;
}

async function recordAlert(
  deps: AlertTriggerDeps,
  rule: AlertRule,
  message: string,
  metrics: Record<string, unknown> | undefined,
  clock: Clock,
  logger: Logger
): Promise<Alert | undefined> {
  const now = clock.now();
  try {
    if (rule.cooldown > 0) {
      const latest = await deps.alerts.listAlerts({ ruleId: rule.id, limit: 1 });
      const [last] = latest.items;
      if (last && now.getTime() - last.triggeredAt.getTime() < rule.cooldown * 1000) {
        logger.debug('Alert suppressed by cooldown', { ruleId: rule.id });
        return undefined;
      }
    }

    const alert = await deps.alerts.createAlert({
      ruleId: rule.id,
      ruleName: rule.name,
      severity: rule.severity,
      status: 'firing',
      message,
      metrics,
      triggeredAt: now,
    });

    safePublish(deps.events, createAlertEvent('alert.triggered', alert, clock), (error) =>
      logger.warn('Failed to publish alert event', { alertId: alert.id, error: errorMessage(error) })
    );
    return alert;
  } catch (error) {
    throw wrapError('trigger alert', error);
  }
}

/**
 * Record a firing alert for a rule and publish `alert.triggered`.
 *
 * Disabled rules never fire. A rule that fired less than `cooldown` seconds
 * ago is suppressed. Both cases resolve `undefined`. Concurrent triggers of
 * one rule are applied in call order.
 */
export async function triggerAlert(
  deps: AlertTriggerDeps,
  rule: AlertRule,
  message: string,
  metrics?: Record<string, unknown>
): Promise<Alert | undefined> {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? silentLogger;
  if (!rule.enabled) {
    return undefined;
  }

  const alert = await serializeByRule(deps.alerts, rule.id, () =>
    recordAlert(deps, rule, message, metrics, clock, logger)
  );
  if (alert && deps.active) {
    try {
      deps.active.broadcast('update', await deps.active.get());
    } catch (error) {
      logger.warn('Failed to broadcast active alerts', { alertId: alert.id, error: errorMessage(error) });
    }
  }
  return alert;
}
