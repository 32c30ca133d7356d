import type { Alert, AlertFilter, AlertRule, Id, RuleFilter } from '@asms/protocol';

/**
 * Input for creating a rule. `id` is assigned when absent; timestamps are
 * always stamped by the store.
 */
export type CreateRuleInput = Omit<AlertRule, 'id' | 'createdAt' | 'updatedAt'> & {
  id?: Id;
};

/**
 * Input for recording an alert. `id` is assigned when absent.
 */
export type CreateAlertInput = Omit<Alert, 'id'> & {
  id?: Id;
};

/**
 * A page of results plus the match count before pagination.
 */
export type Page<T> = {
  items: T[];
  total: number;
};

/**
 * Repository for alert rules and raised alerts.
 *
 * Rules fail on id collision; alerts do not (a second create with the same
 * id replaces the first).
 */
export interface AlertRepository {
  /**
   * Create a rule. Fails `already_exists` on id collision.
   */
  createRule(input: CreateRuleInput): Promise<AlertRule>;

  /**
   * Get a rule. Fails `alert_rule_not_found` when absent.
   */
  getRule(id: Id): Promise<AlertRule>;

  /**
   * Replace a rule and refresh `updatedAt`. Fails `alert_rule_not_found` when absent.
   */
  updateRule(rule: AlertRule): Promise<AlertRule>;

  /**
   * Delete a rule. Fails `alert_rule_not_found` when absent.
   */
  deleteRule(id: Id): Promise<void>;

  /**
   * List rules in creation order.
   */
  listRules(filter?: RuleFilter): Promise<AlertRule[]>;

  createAlert(input: CreateAlertInput): Promise<Alert>;

  /**
   * Get an alert. Fails `alert_not_found` when absent.
   */
  getAlert(id: Id): Promise<Alert>;

  /**
   * Replace an alert. Fails `alert_not_found` when absent.
   */
  updateAlert(alert: Alert): Promise<Alert>;

  /**
   * List alerts newest first. Filters are AND-composed; `total` counts matches
   * before `offset`/`limit` apply.
   */
  listAlerts(filter?: AlertFilter): Promise<Page<Alert>>;

  /**
   * Alerts whose status is firing or acknowledged.
   */
  listActiveAlerts(): Promise<Alert[]>;
}
