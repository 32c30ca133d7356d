// Alert resources: the rule list and the active alert list

import type { ResourceFactory } from '@asms/protocol';
import { arraySchema, objectSchema } from '@asms/protocol';
import { ALERT_DOMAIN } from '../errors.js';
import { PollingResource } from '../resources/poller.js';
import type { AlertUnitDeps } from './commands.js';
import { alertSchema, alertToMap, ruleSchema, ruleToMap } from './projections.js';

export const RULES_URI = 'asms://alerts/rules';
export const ACTIVE_URI = 'asms://alerts/active';
export const ALERTS_PATTERN = 'asms://alerts/*';

export const RULES_POLL_INTERVAL_MS = 30_000;
export const ACTIVE_POLL_INTERVAL_MS = 5_000;

export function createRulesResource(deps: AlertUnitDeps): PollingResource {
  return new PollingResource({
    uri: RULES_URI,
    domain: ALERT_DOMAIN,
    schema: objectSchema({ rules: arraySchema(ruleSchema) }),
    intervalMs: RULES_POLL_INTERVAL_MS,
    operation: 'refresh',
    clock: deps.clock,
    logger: deps.logger,
    async fetch() {
      const rules = await deps.alerts.listRules();
      return { rules: rules.map(ruleToMap) };
    },
  });
}

export function createActiveAlertsResource(deps: AlertUnitDeps): PollingResource {
  return new PollingResource({
    uri: ACTIVE_URI,
    domain: ALERT_DOMAIN,
    schema: objectSchema({ alerts: arraySchema(alertSchema) }),
    intervalMs: ACTIVE_POLL_INTERVAL_MS,
    operation: 'update',
    clock: deps.clock,
    logger: deps.logger,
    async fetch() {
      const alerts = await deps.alerts.listActiveAlerts();
      return { alerts: alerts.map(alertToMap) };
    },
  });
}

/**
 * Resolves `asms://alerts/rules` and `asms://alerts/active` to the given
 * resource instances.
 */
export function createAlertResourceFactory(resources: {
  rules: PollingResource;
  active: PollingResource;
}): ResourceFactory {
  const byUri = new Map([
    [resources.rules.uri, resources.rules],
    [resources.active.uri, resources.active],
  ]);
  return {
    pattern: ALERTS_PATTERN,
    canCreate: (uri) => byUri.has(uri),
    create(uri) {
      const resource = byUri.get(uri);
      if (!resource) {
        throw new Error(`unsupported alert resource: ${uri}`);
      }
      return resource;
    },
  };
}
