// Alert commands: rule management and the alert lifecycle

import type { AlertRule, Command, Schema } from '@asms/protocol';
import {
  ALERT_SEVERITIES,
  objectSchema,
  readBoolean,
  readString,
  stringSchema,
  numberSchema,
  booleanSchema,
  systemClock,
  toInt,
  toStringList,
  wrapError,
  errorMessage,
} from '@asms/protocol';
import type { AlertRepository } from '@asms/repositories';
import { ALERT_DOMAIN, missingField } from '../errors.js';
import { safePublish } from '../events/publishers.js';
import { silentLogger } from '../logger.js';
import type { UnitDeps } from '../units/define.js';
import { defineCommand } from '../units/define.js';
import { createAlertEvent } from './events.js';
import { parseSeverity, successSchema } from './projections.js';

export type AlertUnitDeps = UnitDeps & {
  alerts: AlertRepository;
};

const channelsSchema: Schema = {
  type: 'array',
  description: 'Notification channels; non-text entries are converted to text',
};

export function createRuleCommand(deps: AlertUnitDeps): Command {
  return defineCommand(
    {
      name: 'alert.create_rule',
      domain: ALERT_DOMAIN,
      description: 'Create a new alert rule',
      inputSchema: objectSchema(
        {
          name: stringSchema({ description: 'Rule name' }),
          condition: stringSchema({ description: 'Alert condition expression' }),
          severity: stringSchema({ description: 'Alert severity level', enum: ALERT_SEVERITIES }),
          channels: channelsSchema,
          cooldown: numberSchema({ description: 'Cooldown period in seconds', min: 0 }),
        },
        ['name', 'condition', 'severity']
      ),
      outputSchema: objectSchema({ rule_id: stringSchema() }),
      examples: [
        {
          input: {
            name: 'High CPU Usage',
            condition: 'cpu.utilization > 80',
            severity: 'warning',
            channels: ['email', 'slack'],
            cooldown: 300,
          },
          output: { rule_id: 'rule-123' },
          description: 'Create a CPU alert rule',
        },
      ],
      async run(input) {
        const name = readString(input, 'name');
        if (!name) throw missingField(ALERT_DOMAIN, 'name');
        const condition = readString(input, 'condition');
        if (!condition) throw missingField(ALERT_DOMAIN, 'condition');
        const severity = parseSeverity(input.severity);

        let rule: AlertRule;
        try {
          rule = await deps.alerts.createRule({
            name,
            condition,
            severity,
            channels: toStringList(input.channels) ?? [],
            cooldown: toInt(input.cooldown) ?? 0,
            enabled: true,
          });
        } catch (error) {
          throw wrapError('create rule', error);
        }
        return { rule_id: rule.id };
      },
    },
    deps
  );
}

export function updateRuleCommand(deps: AlertUnitDeps): Command {
  return defineCommand(
    {
      name: 'alert.update_rule',
      domain: ALERT_DOMAIN,
      description: 'Update an existing alert rule',
      inputSchema: objectSchema(
        {
          rule_id: stringSchema({ description: 'Rule ID' }),
          name: stringSchema({ description: 'New rule name' }),
          condition: stringSchema({ description: 'New condition expression' }),
          severity: stringSchema({ description: 'New severity', enum: ALERT_SEVERITIES }),
          channels: channelsSchema,
          cooldown: numberSchema({ description: 'New cooldown in seconds', min: 0 }),
          enabled: booleanSchema({ description: 'Enable or disable the rule' }),
        },
        ['rule_id']
      ),
      outputSchema: successSchema,
      examples: [
        {
          input: { rule_id: 'rule-123', enabled: false },
          output: { success: true },
          description: 'Disable a rule',
        },
      ],
      async run(input) {
        const ruleId = readString(input, 'rule_id');
        if (!ruleId) throw missingField(ALERT_DOMAIN, 'rule_id');

        let rule: AlertRule;
        try {
          rule = await deps.alerts.getRule(ruleId);
        } catch (error) {
          throw wrapError('get rule', error);
        }

        // Empty text leaves a field untouched
        const name = readString(input, 'name');
        if (name) rule.name = name;
        const condition = readString(input, 'condition');
        if (condition) rule.condition = condition;
        const severity = readString(input, 'severity');
        if (severity) rule.severity = parseSeverity(severity);
        const channels = toStringList(input.channels);
        if (channels) rule.channels = channels;
        const cooldown = toInt(input.cooldown);
        if (cooldown !== undefined) rule.cooldown = cooldown;
        const enabled = readBoolean(input, 'enabled');
        if (enabled !== undefined) rule.enabled = enabled;

        try {
          await deps.alerts.updateRule(rule);
        } catch (error) {
          throw wrapError('update rule', error);
        }
        return { success: true };
      },
    },
    deps
  );
}

export function deleteRuleCommand(deps: AlertUnitDeps): Command {
  return defineCommand(
    {
      name: 'alert.delete_rule',
      domain: ALERT_DOMAIN,
      description: 'Delete an alert rule',
      inputSchema: objectSchema({ rule_id: stringSchema({ description: 'Rule ID' }) }, ['rule_id']),
      outputSchema: successSchema,
      examples: [
        { input: { rule_id: 'rule-123' }, output: { success: true }, description: 'Delete a rule' },
      ],
      async run(input) {
        const ruleId = readString(input, 'rule_id');
        if (!ruleId) throw missingField(ALERT_DOMAIN, 'rule_id');
        try {
          await deps.alerts.deleteRule(ruleId);
        } catch (error) {
          throw wrapError('delete rule', error);
        }
        return { success: true };
      },
    },
    deps
  );
}

export function acknowledgeCommand(deps: AlertUnitDeps): Command {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? silentLogger;
  return defineCommand(
    {
      name: 'alert.acknowledge',
      domain: ALERT_DOMAIN,
      description: 'Acknowledge a firing alert',
      inputSchema: objectSchema({ alert_id: stringSchema({ description: 'Alert ID' }) }, ['alert_id']),
      outputSchema: successSchema,
      examples: [
        { input: { alert_id: 'alert-123' }, output: { success: true }, description: 'Acknowledge an alert' },
      ],
      async run(input) {
        const alertId = readString(input, 'alert_id');
        if (!alertId) throw missingField(ALERT_DOMAIN, 'alert_id');
        try {
          const alert = await deps.alerts.getAlert(alertId);
          alert.status = 'acknowledged';
          alert.acknowledgedAt = clock.now();
          const updated = await deps.alerts.updateAlert(alert);
          safePublish(deps.events, createAlertEvent('alert.acknowledged', updated, clock), (error) =>
            logger.warn('Failed to publish alert event', { alertId, error: errorMessage(error) })
          );
        } catch (error) {
          throw wrapError('acknowledge alert', error);
        }
        return { success: true };
      },
    },
    deps
  );
}

/**
 * Resolve moves an alert from any state to `resolved`. Resolving twice is
 * allowed and restamps `resolvedAt`.
 */
export function resolveCommand(deps: AlertUnitDeps): Command {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? silentLogger;
  return defineCommand(
    {
      name: 'alert.resolve',
      domain: ALERT_DOMAIN,
      description: 'Resolve an alert',
      inputSchema: objectSchema({ alert_id: stringSchema({ description: 'Alert ID' }) }, ['alert_id']),
      outputSchema: successSchema,
      examples: [
        { input: { alert_id: 'alert-123' }, output: { success: true }, description: 'Resolve an alert' },
      ],
      async run(input) {
        const alertId = readString(input, 'alert_id');
        if (!alertId) throw missingField(ALERT_DOMAIN, 'alert_id');
        try {
          const alert = await deps.alerts.getAlert(alertId);
          alert.status = 'resolved';
          alert.resolvedAt = clock.now();
          const updated = await deps.alerts.updateAlert(alert);
          safePublish(deps.events, createAlertEvent('alert.resolved', updated, clock), (error) =>
            logger.warn('Failed to publish alert event', { alertId, error: errorMessage(error) })
          );
        } catch (error) {
          throw wrapError('resolve alert', error);
        }
        return { success: true };
      },
    },
    deps
  );
}
