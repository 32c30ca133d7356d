// In-memory repository implementations for development and testing
//
// Each store keeps its records in Maps behind a readers-writer lock:
// create/update/delete take the write lock, get/list take the read lock.
// Records are copied on the way in and out so callers never share state
// with the store.
//
// Data does not persist between restarts.

import { randomUUID } from 'node:crypto';
import type {
  Alert,
  AlertFilter,
  AlertRule,
  Clock,
  ModelService,
  RuleFilter,
  ServiceFilter,
} from '@asms/protocol';
import { isActiveAlert, systemClock } from '@asms/protocol';
import type {
  AlertRepository,
  CreateAlertInput,
  CreateRuleInput,
  Page,
  RepositoryContext,
  ServiceRepository,
} from '../interfaces/index.js';
import {
  alertNotFound,
  ruleAlreadyExists,
  ruleNotFound,
  serviceAlreadyExists,
  serviceNotFound,
} from '../errors.js';
import { ReadWriteLock } from './lock.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  rules: Map<string, AlertRule>;
  alerts: Map<string, Alert>;
  services: Map<string, ModelService>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends RepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

export type InMemoryRepositoryOptions = {
  /** Time source for createdAt/updatedAt stamps (defaults to the system clock) */
  clock?: Clock;
  /** Id generator for records created without one */
  generateId?: () => string;
};

/**
 * Apply `offset` (clamped to the list) then `limit` (0 means no limit).
 */
export function paginate<T>(items: T[], limit = 0, offset = 0): Page<T> {
  const total = items.length;
  const start = Math.min(Math.max(offset, 0), total);
  const end = limit > 0 ? Math.min(start + limit, total) : total;
  return { items: items.slice(start, end), total };
}

function copy<T>(value: T): T {
  return structuredClone(value);
}

/**
 * Create an in-memory alert repository.
 */
export function createInMemoryAlertRepository(
  options: InMemoryRepositoryOptions = {},
  data: Pick<InMemoryDataStore, 'rules' | 'alerts'> = { rules: new Map(), alerts: new Map() }
): AlertRepository {
  const clock = options.clock ?? systemClock;
  const generateId = options.generateId ?? randomUUID;
  const lock = new ReadWriteLock();
  const { rules, alerts } = data;

  return {
    createRule(input: CreateRuleInput) {
      return lock.write(() => {
        const id = input.id !== undefined && input.id !== '' ? input.id : generateId();
        if (rules.has(id)) {
          throw ruleAlreadyExists(id);
        }
        const now = clock.now();
        const rule: AlertRule = {
          id,
          name: input.name,
          condition: input.condition,
          severity: input.severity,
          channels: [...input.channels],
          cooldown: input.cooldown,
          enabled: input.enabled,
          createdAt: now,
          updatedAt: new Date(now.getTime()),
        };
        rules.set(id, rule);
        return copy(rule);
      });
    },

    getRule(id: string) {
      return lock.read(() => {
        const rule = rules.get(id);
        if (!rule) throw ruleNotFound(id);
        return copy(rule);
      });
    },

    updateRule(rule: AlertRule) {
      return lock.write(() => {
        if (!rules.has(rule.id)) throw ruleNotFound(rule.id);
        const updated: AlertRule = { ...copy(rule), updatedAt: clock.now() };
        rules.set(rule.id, updated);
        return copy(updated);
      });
    },

    deleteRule(id: string) {
      return lock.write(() => {
        if (!rules.delete(id)) throw ruleNotFound(id);
      });
    },

    listRules(filter: RuleFilter = {}) {
      return lock.read(() => {
        let result = Array.from(rules.values());
        if (filter.enabledOnly) {
          result = result.filter((r) => r.enabled);
        }
        return result.map(copy);
      });
    },

    createAlert(input: CreateAlertInput) {
      return lock.write(() => {
        const id = input.id !== undefined && input.id !== '' ? input.id : generateId();
        // An existing alert with the same id is replaced
        const alert: Alert = { ...copy(input), id };
        alerts.set(id, alert);
        return copy(alert);
      });
    },

    getAlert(id: string) {
      return lock.read(() => {
        const alert = alerts.get(id);
        if (!alert) throw alertNotFound(id);
        return copy(alert);
      });
    },

    updateAlert(alert: Alert) {
      return lock.write(() => {
        if (!alerts.has(alert.id)) throw alertNotFound(alert.id);
        alerts.set(alert.id, copy(alert));
        return copy(alert);
      });
    },

    listAlerts(filter: AlertFilter = {}) {
      return lock.read(() => {
        const matched = Array.from(alerts.values())
          .filter((a) => !filter.ruleId || a.ruleId === filter.ruleId)
          .filter((a) => !filter.status || a.status === filter.status)
          .filter((a) => !filter.severity || a.severity === filter.severity)
          .sort((a, b) => b.triggeredAt.getTime() - a.triggeredAt.getTime());
        const page = paginate(matched, filter.limit, filter.offset);
        return { items: page.items.map(copy), total: page.total };
      });
    },

    listActiveAlerts() {
      return lock.read(() =>
        Array.from(alerts.values())
          .filter(isActiveAlert)
          .sort((a, b) => b.triggeredAt.getTime() - a.triggeredAt.getTime())
          .map(copy)
      );
    },
  };
}

/**
 * Create an in-memory service repository.
 */
export function createInMemoryServiceRepository(
  services: Map<string, ModelService> = new Map()
): ServiceRepository {
  const lock = new ReadWriteLock();

  return {
    create(service: ModelService) {
      return lock.write(() => {
        if (services.has(service.id)) throw serviceAlreadyExists(service.id);
        services.set(service.id, copy(service));
        return copy(service);
      });
    },

    get(id: string) {
      return lock.read(() => {
        const service = services.get(id);
        if (!service) throw serviceNotFound(id);
        return copy(service);
      });
    },

    getByName(name: string) {
      return lock.read(() => {
        for (const service of services.values()) {
          if (service.name === name) return copy(service);
        }
        return null;
      });
    },

    list(filter: ServiceFilter = {}) {
      return lock.read(() => {
        const matched = Array.from(services.values())
          .filter((s) => !filter.status || s.status === filter.status)
          .filter((s) => !filter.modelId || s.modelId === filter.modelId);
        const page = paginate(matched, filter.limit, filter.offset);
        return { items: page.items.map(copy), total: page.total };
      });
    },

    delete(id: string) {
      return lock.write(() => {
        if (!services.delete(id)) throw serviceNotFound(id);
      });
    },

    update(service: ModelService) {
      return lock.write(() => {
        if (!services.has(service.id)) throw serviceNotFound(service.id);
        services.set(service.id, copy(service));
        return copy(service);
      });
    },
  };
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * const rule = await repos.alerts.createRule({ ... });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.rules.size);
 *
 * // Clear all data
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(
  options: InMemoryRepositoryOptions = {}
): InMemoryRepositoryContext {
  const data: InMemoryDataStore = {
    rules: new Map(),
    alerts: new Map(),
    services: new Map(),
  };

  return {
    alerts: createInMemoryAlertRepository(options, data),
    services: createInMemoryServiceRepository(data.services),
    _data: data,
    clear() {
      data.rules.clear();
      data.alerts.clear();
      data.services.clear();
    },
  };
}
