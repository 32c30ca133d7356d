// Alert domain

import type { Alert, AlertRule, Command, Query, ResourceFactory } from '@asms/protocol';
import type { PollingResource } from '../resources/poller.js';
import type { UnitRegistry } from '../units/registry.js';
import type { AlertUnitDeps } from './commands.js';
import {
  acknowledgeCommand,
  createRuleCommand,
  deleteRuleCommand,
  resolveCommand,
  updateRuleCommand,
} from './commands.js';
import { activeQuery, historyQuery, listRulesQuery } from './queries.js';
import {
  createActiveAlertsResource,
  createAlertResourceFactory,
  createRulesResource,
} from './resources.js';
import { triggerAlert } from './trigger.js';

export type AlertModule = {
  commands: Command[];
  queries: Query[];
  resources: { rules: PollingResource; active: PollingResource };
  factory: ResourceFactory;
  triggerAlert(rule: AlertRule, message: string, metrics?: Record<string, unknown>): Promise<Alert | undefined>;
};

export function createAlertModule(deps: AlertUnitDeps): AlertModule {
  const resources = {
    rules: createRulesResource(deps),
    active: createActiveAlertsResource(deps),
  };
  return {
    commands: [
      createRuleCommand(deps),
      updateRuleCommand(deps),
      deleteRuleCommand(deps),
      acknowledgeCommand(deps),
      resolveCommand(deps),
    ],
    queries: [listRulesQuery(deps), historyQuery(deps), activeQuery(deps)],
    resources,
    factory: createAlertResourceFactory(resources),
    triggerAlert: (rule, message, metrics) =>
      triggerAlert({ ...deps, active: resources.active }, rule, message, metrics),
  };
}

export function registerAlertUnits(registry: UnitRegistry, deps: AlertUnitDeps): AlertModule {
  const alertModule = createAlertModule(deps);
  alertModule.commands.forEach((command) => registry.registerCommand(command));
  alertModule.queries.forEach((query) => registry.registerQuery(query));
  registry.registerResource(alertModule.resources.rules);
  registry.registerResource(alertModule.resources.active);
  registry.registerResourceFactory(alertModule.factory);
  return alertModule;
}

export { type AlertUnitDeps } from './commands.js';
export { triggerAlert, type AlertTriggerDeps } from './trigger.js';
export { alertToMap, ruleToMap, parseSeverity, parseAlertStatus } from './projections.js';
export { RULES_URI, ACTIVE_URI, ALERTS_PATTERN } from './resources.js';
