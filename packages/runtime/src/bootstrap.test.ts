// Tests for runtime assembly

import { describe, it, expect } from 'vitest';
import { createInMemoryRepositoryContext } from '@asms/repositories';
import { createUnitRuntime } from './bootstrap.js';
import { MockDeviceProvider } from './device/provider.js';
import { MockInferenceProvider } from './inference/provider.js';
import { createCapturingLogger } from './logger.js';
import { MockServiceProvider } from './service/provider.js';
import { executeUnit } from './units/dispatch.js';

describe('createUnitRuntime', () => {
  it('registers every domain and logs the totals', () => {
    const logger = createCapturingLogger();
    const runtime = createUnitRuntime({ repos: createInMemoryRepositoryContext(), logger });

    const counts = { commands: 21, queries: 13, resources: 4, factories: 3 };
    expect(runtime.registry.counts()).toEqual(counts);
    expect(logger.entries).toEqual([
      expect.objectContaining({ level: 'info', message: 'Unit runtime ready', data: counts }),
    ]);
  });

  it('resolves resources of every domain', () => {
    const runtime = createUnitRuntime({ repos: createInMemoryRepositoryContext() });
    for (const uri of [
      'asms://alerts/rules',
      'asms://alerts/active',
      'asms://device/gpu-0/metrics',
      'asms://inference/models',
      'asms://services',
      'asms://service/svc-1',
    ]) {
      expect(runtime.registry.getResource(uri)?.uri).toBe(uri);
    }
  });

  it('runs units against the given providers', async () => {
    const runtime = createUnitRuntime({
      repos: createInMemoryRepositoryContext(),
      providers: {
        device: new MockDeviceProvider(),
        inference: new MockInferenceProvider(),
        service: new MockServiceProvider(),
      },
    });

    const metrics = await executeUnit(runtime.registry, 'device.metrics', {});
    const created = await executeUnit(runtime.registry, 'service.create', { model_id: 'llama3' });
    const listed = await executeUnit(runtime.registry, 'service.list', {});

    expect(metrics.utilization).toBe(50);
    expect(listed.services).toMatchObject([{ id: created.service_id, status: 'pending' }]);
  });

  it('keeps domains without a provider registered', async () => {
    const runtime = createUnitRuntime({ repos: createInMemoryRepositoryContext() });
    await expect(executeUnit(runtime.registry, 'inference.models', {})).rejects.toMatchObject({
      message: 'inference provider not set',
      details: { reason: 'provider_not_set' },
    });
  });
});
