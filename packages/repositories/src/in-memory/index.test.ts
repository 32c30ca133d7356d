// Tests for the in-memory repositories

import { describe, it, expect, beforeEach } from 'vitest';
import type { Alert, ModelService } from '@asms/protocol';
import { createFixedClock, hasCode } from '@asms/protocol';
import type { CreateRuleInput } from '../interfaces/index.js';
import { createInMemoryRepositoryContext, paginate } from './index.js';
import type { InMemoryRepositoryContext } from './index.js';

// --- Test Fixtures ---

function createMockRuleInput(overrides: Partial<CreateRuleInput> = {}): CreateRuleInput {
  return {
    name: 'High CPU',
    condition: 'cpu.utilization > 80',
    severity: 'warning',
    channels: ['email', 'slack'],
    cooldown: 300,
    enabled: true,
    ...overrides,
  };
}

function createMockAlert(id: string, overrides: Partial<Alert> = {}): Alert {
  return {
    id,
    ruleId: 'rule-1',
    ruleName: 'High CPU',
    severity: 'warning',
    status: 'firing',
    message: 'cpu above threshold',
    triggeredAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

function createMockService(id: string, overrides: Partial<ModelService> = {}): ModelService {
  return {
    id,
    name: `service-${id}`,
    modelId: 'llama3',
    status: 'pending',
    replicas: 1,
    activeReplicas: 0,
    resourceClass: 'medium',
    endpoints: [],
    config: {},
    createdAt: new Date('2024-01-01T00:00:00Z'),
    updatedAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

describe('paginate', () => {
  const items = [1, 2, 3, 4, 5];

  it('returns everything when limit is 0', () => {
    expect(paginate(items)).toEqual({ items, total: 5 });
  });

  it('windows from offset', () => {
    expect(paginate(items, 2, 1)).toEqual({ items: [2, 3], total: 5 });
  });

  it('clamps offset to the list length', () => {
    expect(paginate(items, 2, 10)).toEqual({ items: [], total: 5 });
    expect(paginate(items, 0, -3)).toEqual({ items, total: 5 });
  });
});

describe('InMemoryAlertRepository', () => {
  const clock = createFixedClock('2024-03-01T12:00:00Z');
  let repos: InMemoryRepositoryContext;
  let counter: number;

  beforeEach(() => {
    clock.set('2024-03-01T12:00:00Z');
    counter = 0;
    repos = createInMemoryRepositoryContext({
      clock,
      generateId: () => `id-${++counter}`,
    });
  });

  describe('rules', () => {
    it('assigns an id and stamps timestamps', async () => {
      const rule = await repos.alerts.createRule(createMockRuleInput());

      expect(rule.id).toBe('id-1');
      expect(rule.createdAt).toEqual(new Date('2024-03-01T12:00:00Z'));
      expect(rule.updatedAt).toEqual(rule.createdAt);
    });

    it('round-trips a rule', async () => {
      const created = await repos.alerts.createRule(createMockRuleInput({ id: 'r1' }));
      const fetched = await repos.alerts.getRule('r1');

      expect(fetched).toEqual(created);
      expect(fetched.createdAt.getTime()).toBeLessThanOrEqual(fetched.updatedAt.getTime());
    });

    it('fails on id collision', async () => {
      await repos.alerts.createRule(createMockRuleInput({ id: 'r1' }));

      await expect(repos.alerts.createRule(createMockRuleInput({ id: 'r1' }))).rejects.toMatchObject({
        code: 'already_exists',
      });
    });

    it('fails alert_rule_not_found for unknown rules', async () => {
      await expect(repos.alerts.getRule('missing')).rejects.toMatchObject({ code: 'alert_rule_not_found' });
      await expect(repos.alerts.deleteRule('missing')).rejects.toMatchObject({ code: 'alert_rule_not_found' });
      const rule = await repos.alerts.createRule(createMockRuleInput());
      await expect(repos.alerts.updateRule({ ...rule, id: 'missing' })).rejects.toMatchObject({
        code: 'alert_rule_not_found',
      });
    });

    it('refreshes updatedAt on update', async () => {
      const rule = await repos.alerts.createRule(createMockRuleInput());
      clock.advance(60_000);

      const updated = await repos.alerts.updateRule({ ...rule, name: 'Renamed' });

      expect(updated.name).toBe('Renamed');
      expect(updated.createdAt).toEqual(new Date('2024-03-01T12:00:00Z'));
      expect(updated.updatedAt).toEqual(new Date('2024-03-01T12:01:00Z'));
    });

    it('filters enabled rules', async () => {
      await repos.alerts.createRule(createMockRuleInput({ id: 'on' }));
      await repos.alerts.createRule(createMockRuleInput({ id: 'off', enabled: false }));

      const all = await repos.alerts.listRules();
      const enabled = await repos.alerts.listRules({ enabledOnly: true });

      expect(all.map((r) => r.id)).toEqual(['on', 'off']);
      expect(enabled.map((r) => r.id)).toEqual(['on']);
    });

    it('hands out copies', async () => {
      const rule = await repos.alerts.createRule(createMockRuleInput({ id: 'r1' }));
      rule.channels.push('pager');

      const fetched = await repos.alerts.getRule('r1');
      expect(fetched.channels).toEqual(['email', 'slack']);
    });

    it('deletes rules', async () => {
      await repos.alerts.createRule(createMockRuleInput({ id: 'r1' }));
      await repos.alerts.deleteRule('r1');

      expect(repos._data.rules.size).toBe(0);
    });
  });

  describe('alerts', () => {
    async function seed(): Promise<void> {
      await repos.alerts.createAlert(createMockAlert('a1', { triggeredAt: new Date('2024-01-01T00:00:01Z') }));
      await repos.alerts.createAlert(
        createMockAlert('a2', { status: 'acknowledged', triggeredAt: new Date('2024-01-01T00:00:02Z') })
      );
      await repos.alerts.createAlert(
        createMockAlert('a3', { severity: 'critical', triggeredAt: new Date('2024-01-01T00:00:03Z') })
      );
      await repos.alerts.createAlert(
        createMockAlert('a4', { status: 'resolved', ruleId: 'rule-2', triggeredAt: new Date('2024-01-01T00:00:04Z') })
      );
      await repos.alerts.createAlert(createMockAlert('a5', { triggeredAt: new Date('2024-01-01T00:00:05Z') }));
    }

    it('replaces an alert created twice with the same id', async () => {
      await repos.alerts.createAlert(createMockAlert('a1', { message: 'first' }));
      await repos.alerts.createAlert(createMockAlert('a1', { message: 'second' }));

      const alert = await repos.alerts.getAlert('a1');
      expect(alert.message).toBe('second');
      expect(repos._data.alerts.size).toBe(1);
    });

    it('assigns an id when absent', async () => {
      const { id: _unused, ...rest } = createMockAlert('ignored');
      const alert = await repos.alerts.createAlert(rest);
      expect(alert.id).toBe('id-1');
    });

    it('lists newest first with AND-composed filters', async () => {
      await seed();

      const firingWarnings = await repos.alerts.listAlerts({ status: 'firing', severity: 'warning' });

      expect(firingWarnings.items.map((a) => a.id)).toEqual(['a5', 'a1']);
      expect(firingWarnings.total).toBe(2);
    });

    it('keeps total independent of pagination', async () => {
      await seed();

      const page = await repos.alerts.listAlerts({ status: 'firing', limit: 2 });
      expect(page.items.map((a) => a.id)).toEqual(['a5', 'a3']);
      expect(page.total).toBe(3);

      const tail = await repos.alerts.listAlerts({ status: 'firing', limit: 2, offset: 2 });
      expect(tail.items.map((a) => a.id)).toEqual(['a1']);
      expect(tail.total).toBe(3);
    });

    it('filters by rule', async () => {
      await seed();

      const page = await repos.alerts.listAlerts({ ruleId: 'rule-2' });
      expect(page.items.map((a) => a.id)).toEqual(['a4']);
    });

    it('lists exactly the firing and acknowledged alerts as active', async () => {
      await seed();

      const active = await repos.alerts.listActiveAlerts();
      expect(active.map((a) => a.id)).toEqual(['a5', 'a3', 'a2', 'a1']);
    });

    it('fails alert_not_found when updating an unknown alert', async () => {
      const error = await repos.alerts.updateAlert(createMockAlert('nope')).catch((e: unknown) => e);
      expect(hasCode(error, 'alert_not_found')).toBe(true);
    });
  });
});

describe('InMemoryServiceRepository', () => {
  let repos: InMemoryRepositoryContext;

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
  });

  it('creates and fetches services', async () => {
    await repos.services.create(createMockService('svc-1'));

    const service = await repos.services.get('svc-1');
    expect(service.name).toBe('service-svc-1');
    expect(await repos.services.getByName('service-svc-1')).toEqual(service);
    expect(await repos.services.getByName('nope')).toBeNull();
  });

  it('rejects duplicate ids', async () => {
    await repos.services.create(createMockService('svc-1'));

    await expect(repos.services.create(createMockService('svc-1'))).rejects.toMatchObject({
      code: 'already_exists',
    });
  });

  it('fails service_not_found for unknown services', async () => {
    await expect(repos.services.get('svc-x')).rejects.toMatchObject({ code: 'service_not_found' });
    await expect(repos.services.delete('svc-x')).rejects.toMatchObject({ code: 'service_not_found' });
    await expect(repos.services.update(createMockService('svc-x'))).rejects.toMatchObject({
      code: 'service_not_found',
    });
  });

  it('filters and paginates', async () => {
    await repos.services.create(createMockService('svc-1', { status: 'running' }));
    await repos.services.create(createMockService('svc-2', { status: 'running', modelId: 'mistral' }));
    await repos.services.create(createMockService('svc-3', { status: 'stopped' }));

    const running = await repos.services.list({ status: 'running', limit: 1 });
    expect(running.items.map((s) => s.id)).toEqual(['svc-1']);
    expect(running.total).toBe(2);

    const mistral = await repos.services.list({ modelId: 'mistral' });
    expect(mistral.items.map((s) => s.id)).toEqual(['svc-2']);
  });

  it('updates and deletes', async () => {
    await repos.services.create(createMockService('svc-1'));
    const service = await repos.services.get('svc-1');

    await repos.services.update({ ...service, status: 'running' });
    expect((await repos.services.get('svc-1')).status).toBe('running');

    await repos.services.delete('svc-1');
    expect(repos._data.services.size).toBe(0);
  });

  it('clears all data', async () => {
    await repos.services.create(createMockService('svc-1'));
    repos.clear();
    expect(repos._data.services.size).toBe(0);
  });
});
