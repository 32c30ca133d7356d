// Tests for device units, events and resources

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { ResourceUpdate } from '@asms/protocol';
import { createCapturingPublisher } from '../events/publishers.js';
import { executeUnit } from '../units/dispatch.js';
import { UnitRegistry } from '../units/registry.js';
import { checkMetricThresholds } from './events.js';
import { registerDeviceUnits } from './index.js';
import { MockDeviceProvider, createMockDevice } from './provider.js';
import { deviceResourceURI, parseDeviceResourceURI } from './resources.js';
import { healthQuery } from './units.js';

describe('device units', () => {
  let provider: MockDeviceProvider;
  let registry: UnitRegistry;
  let events: ReturnType<typeof createCapturingPublisher>;

  beforeEach(() => {
    provider = new MockDeviceProvider();
    registry = new UnitRegistry();
    events = createCapturingPublisher();
    registerDeviceUnits(registry, { provider, events });
  });

  describe('device.detect', () => {
    it('lists devices and publishes device.detected for each', async () => {
      provider.devices = [createMockDevice(), createMockDevice({ id: 'gpu-1', architecture: undefined })];

      const output = await executeUnit(registry, 'device.detect', {});

      expect(output.devices).toEqual([
        {
          id: 'gpu-0',
          name: 'Mock GPU',
          vendor: 'MockVendor',
          type: 'gpu',
          architecture: 'mock-arch',
          memory: 24564,
          capabilities: ['cuda', 'tensor'],
        },
        {
          id: 'gpu-1',
          name: 'Mock GPU',
          vendor: 'MockVendor',
          type: 'gpu',
          architecture: '',
          memory: 24564,
          capabilities: ['cuda', 'tensor'],
        },
      ]);
      expect(events.ofType('device.detected').map((event) => event.payload)).toMatchObject([
        { device: { id: 'gpu-0' } },
        { device: { id: 'gpu-1' } },
      ]);
    });

    it('wraps a provider failure', async () => {
      provider.error = new Error('driver missing');
      await expect(executeUnit(registry, 'device.detect', {})).rejects.toMatchObject({
        code: 'internal_error',
        message: 'detect devices: driver missing',
      });
    });
  });

  describe('device.metrics', () => {
    it('falls back to the first detected device', async () => {
      const output = await executeUnit(registry, 'device.metrics', {});
      expect(output).toEqual({
        utilization: 50,
        temperature: 60,
        power: 200,
        memory_used: 8_192_000_000,
        memory_total: 24_564_000_000,
      });
    });

    it('fails device_not_found when nothing is detected', async () => {
      provider.devices = [];
      await expect(executeUnit(registry, 'device.metrics', {})).rejects.toMatchObject({
        code: 'device_not_found',
      });
    });
  });

  describe('device.info', () => {
    it('returns one device when an id is given', async () => {
      const output = await executeUnit(registry, 'device.info', { device_id: 'gpu-0' });
      expect(output).toMatchObject({ id: 'gpu-0', name: 'Mock GPU' });
    });

    it('keeps device_not_found through the wrap', async () => {
      await expect(executeUnit(registry, 'device.info', { device_id: 'gpu-9' })).rejects.toMatchObject({
        code: 'device_not_found',
        message: 'get device gpu-9: device not found: gpu-9',
      });
    });
  });

  describe('device.health', () => {
    it('reports every device and marks failing ones unknown', async () => {
      provider.devices = [createMockDevice(), createMockDevice({ id: 'gpu-1' })];
      provider.failures.set('gpu-1', new Error('unreachable'));

      const output = await executeUnit(registry, 'device.health', {});

      expect(output).toEqual({
        devices: [
          { device_id: 'gpu-0', status: 'healthy', issues: [] },
          { device_id: 'gpu-1', status: 'unknown', issues: ['unreachable'] },
        ],
      });
    });

    it('fails with the abort reason when cancelled mid-report', async () => {
      provider.devices = [createMockDevice(), createMockDevice({ id: 'gpu-1' })];
      const controller = new AbortController();
      const reason = new Error('request cancelled');
      const getHealth = vi.spyOn(provider, 'getHealth').mockImplementation(async () => {
        controller.abort(reason);
        throw new Error('interrupted');
      });

      await expect(healthQuery({ provider }).execute({ signal: controller.signal }, {})).rejects.toBe(reason);
      expect(getHealth).toHaveBeenCalledTimes(1);
    });
  });

  describe('device.set_power_limit', () => {
    it('passes the limit to the provider', async () => {
      await expect(
        executeUnit(registry, 'device.set_power_limit', { device_id: 'gpu-0', limit_watts: 250 })
      ).resolves.toEqual({ success: true });
      expect(provider.powerSetId).toBe('gpu-0');
      expect(provider.powerLimit).toBe(250);
    });

    it('rejects a non-positive limit', async () => {
      const command = registry.getCommand('device.set_power_limit');
      await expect(
        command?.execute({ signal: new AbortController().signal }, { device_id: 'gpu-0', limit_watts: 0 })
      ).rejects.toMatchObject({ code: 'invalid_input' });
    });
  });

  it('fails provider_not_set without a provider', async () => {
    const bare = new UnitRegistry();
    registerDeviceUnits(bare, {});
    await expect(executeUnit(bare, 'device.detect', {})).rejects.toMatchObject({
      code: 'internal_error',
      message: 'device provider not set',
      details: { reason: 'provider_not_set' },
    });
  });
});

describe('checkMetricThresholds', () => {
  it('publishes an alert for each metric strictly above its threshold', () => {
    const events = createCapturingPublisher();
    const crossed = checkMetricThresholds(
      { events },
      'gpu-0',
      { utilization: 95, temperature: 80, power: 200, memoryUsed: 1, memoryTotal: 2 },
      { utilization: 90, temperature: 80 }
    );

    expect(crossed).toEqual(['utilization']);
    expect(events.ofType('device.metrics_alert').map((event) => event.payload)).toEqual([
      { device_id: 'gpu-0', metric: 'utilization', value: 95, threshold: 90 },
    ]);
  });
});

describe('parseDeviceResourceURI', () => {
  it('round-trips every resource type', () => {
    for (const resourceType of ['info', 'metrics', 'health'] as const) {
      expect(parseDeviceResourceURI(deviceResourceURI('gpu-0', resourceType))).toEqual({
        ok: true,
        resourceType,
        deviceId: 'gpu-0',
      });
    }
  });

  it('rejects malformed URIs', () => {
    for (const uri of [
      'asms://device/gpu-0',
      'asms://device//info',
      'asms://device/gpu-0/power',
      'asms://device/gpu-0/info/extra',
      'asms://services',
    ]) {
      expect(parseDeviceResourceURI(uri)).toEqual({ ok: false });
    }
  });
});

describe('device resources', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('emits health_changed and publishes the transition', async () => {
    const provider = new MockDeviceProvider();
    const events = createCapturingPublisher();
    const registry = new UnitRegistry();
    registerDeviceUnits(registry, { provider, events });

    const resource = registry.getResource('asms://device/gpu-0/health');
    expect(resource?.uri).toBe('asms://device/gpu-0/health');
    const subscription = resource?.watch();
    await vi.advanceTimersByTimeAsync(10_000);
    provider.health = { status: 'warning', issues: ['High temperature detected'] };
    await vi.advanceTimersByTimeAsync(10_000);
    subscription?.unsubscribe();

    const updates: ResourceUpdate[] = [];
    for await (const update of subscription?.updates ?? []) {
      updates.push(update);
    }
    expect(updates.map((update) => update.operation)).toEqual(['refresh', 'health_changed']);
    expect(events.ofType('device.health_changed').map((event) => event.payload)).toEqual([
      { device_id: 'gpu-0', old_status: 'healthy', new_status: 'warning' },
    ]);
  });

  it('publishes one health_changed event however many watchers see it', async () => {
    const provider = new MockDeviceProvider();
    const events = createCapturingPublisher();
    const registry = new UnitRegistry();
    registerDeviceUnits(registry, { provider, events });

    const uri = 'asms://device/gpu-0/health';
    const resource = registry.getResource(uri);
    expect(registry.getResource(uri)).toBe(resource);
    const first = resource?.watch();
    const second = registry.getResource(uri)?.watch();
    await vi.advanceTimersByTimeAsync(10_000);
    provider.health = { status: 'warning', issues: ['High temperature detected'] };
    await vi.advanceTimersByTimeAsync(10_000);
    first?.unsubscribe();
    second?.unsubscribe();

    for (const subscription of [first, second]) {
      const operations: string[] = [];
      for await (const update of subscription?.updates ?? []) {
        operations.push(update.operation);
      }
      expect(operations).toEqual(['refresh', 'health_changed']);
    }
    expect(events.ofType('device.health_changed').map((event) => event.payload)).toEqual([
      { device_id: 'gpu-0', old_status: 'healthy', new_status: 'warning' },
    ]);
  });

  it('resolves nothing for an unknown device URI shape', () => {
    const registry = new UnitRegistry();
    registerDeviceUnits(registry, { provider: new MockDeviceProvider() });
    expect(registry.getResource('asms://device/gpu-0/power')).toBeUndefined();
  });
});
