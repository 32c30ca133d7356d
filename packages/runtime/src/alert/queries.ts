// Alert queries

import type { AlertFilter, Query } from '@asms/protocol';
import {
  ALERT_SEVERITIES,
  ALERT_STATUSES,
  arraySchema,
  booleanSchema,
  numberSchema,
  objectSchema,
  readBoolean,
  readString,
  stringSchema,
  toInt,
  wrapError,
} from '@asms/protocol';
import { ALERT_DOMAIN } from '../errors.js';
import { defineQuery } from '../units/define.js';
import type { AlertUnitDeps } from './commands.js';
import {
  alertSchema,
  alertToMap,
  parseAlertStatus,
  parseSeverity,
  ruleSchema,
  ruleToMap,
} from './projections.js';

export const DEFAULT_HISTORY_LIMIT = 100;
export const MAX_HISTORY_LIMIT = 1000;

export function listRulesQuery(deps: AlertUnitDeps): Query {
  return defineQuery(
    {
      name: 'alert.list_rules',
      domain: ALERT_DOMAIN,
      description: 'List alert rules',
      inputSchema: objectSchema({
        enabled_only: booleanSchema({ description: 'Only return enabled rules' }),
      }),
      outputSchema: objectSchema({ rules: arraySchema(ruleSchema) }),
      examples: [
        {
          input: { enabled_only: true },
          output: { rules: [] },
          description: 'List enabled rules',
        },
      ],
      async run(input) {
        try {
          const rules = await deps.alerts.listRules({
            enabledOnly: readBoolean(input, 'enabled_only') ?? false,
          });
          return { rules: rules.map(ruleToMap) };
        } catch (error) {
          throw wrapError('list rules', error);
        }
      },
    },
    deps
  );
}

export function historyQuery(deps: AlertUnitDeps): Query {
  return defineQuery(
    {
      name: 'alert.history',
      domain: ALERT_DOMAIN,
      description: 'Query alert history with filters and pagination',
      inputSchema: objectSchema({
        rule_id: stringSchema({ description: 'Filter by rule' }),
        status: stringSchema({ description: 'Filter by status', enum: ALERT_STATUSES }),
        severity: stringSchema({ description: 'Filter by severity', enum: ALERT_SEVERITIES }),
        limit: numberSchema({ description: 'Page size', min: 1, max: MAX_HISTORY_LIMIT }),
        offset: numberSchema({ description: 'Page offset', min: 0 }),
      }),
      outputSchema: objectSchema({
        alerts: arraySchema(alertSchema),
        total: numberSchema(),
        offset: numberSchema(),
      }),
      examples: [
        {
          input: { status: 'firing', limit: 10 },
          output: { alerts: [], total: 0, offset: 0 },
          description: 'First ten firing alerts',
        },
      ],
      async run(input) {
        const limit = toInt(input.limit) ?? DEFAULT_HISTORY_LIMIT;
        const offset = toInt(input.offset) ?? 0;
        const filter: AlertFilter = {
          limit: Math.min(Math.max(limit, 1), MAX_HISTORY_LIMIT),
          offset: Math.max(offset, 0),
        };
        const ruleId = readString(input, 'rule_id');
        if (ruleId) filter.ruleId = ruleId;
        const status = readString(input, 'status');
        if (status) filter.status = parseAlertStatus(status);
        const severity = readString(input, 'severity');
        if (severity) filter.severity = parseSeverity(severity);

        try {
          const page = await deps.alerts.listAlerts(filter);
          return {
            alerts: page.items.map(alertToMap),
            total: page.total,
            offset: filter.offset,
          };
        } catch (error) {
          throw wrapError('list alerts', error);
        }
      },
    },
    deps
  );
}

export function activeQuery(deps: AlertUnitDeps): Query {
  return defineQuery(
    {
      name: 'alert.active',
      domain: ALERT_DOMAIN,
      description: 'List alerts that are firing or acknowledged',
      inputSchema: objectSchema({}),
      outputSchema: objectSchema({ alerts: arraySchema(alertSchema) }),
      examples: [{ input: {}, output: { alerts: [] }, description: 'Active alerts' }],
      async run() {
        try {
          const alerts = await deps.alerts.listActiveAlerts();
          return { alerts: alerts.map(alertToMap) };
        } catch (error) {
          throw wrapError('list active alerts', error);
        }
      },
    },
    deps
  );
}
