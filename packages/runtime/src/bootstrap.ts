// Runtime assembly: one registry holding every reference domain

import type { Clock, EventPublisher } from '@asms/protocol';
import type { RepositoryContext } from '@asms/repositories';
import type { AlertModule } from './alert/index.js';
import { registerAlertUnits } from './alert/index.js';
import type { DeviceModule } from './device/index.js';
import { registerDeviceUnits } from './device/index.js';
import type { DeviceProvider } from './device/provider.js';
import type { InferenceModule } from './inference/index.js';
import { registerInferenceUnits } from './inference/index.js';
import type { InferenceProvider } from './inference/provider.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { ServiceModule } from './service/index.js';
import { registerServiceUnits } from './service/index.js';
import type { ServiceProvider } from './service/provider.js';
import { UnitRegistry } from './units/registry.js';

export type RuntimeProviders = {
  device?: DeviceProvider;
  inference?: InferenceProvider;
  service?: ServiceProvider;
};

export type UnitRuntimeOptions = {
  repos: RepositoryContext;
  providers?: RuntimeProviders;
  events?: EventPublisher;
  logger?: Logger;
  clock?: Clock;
  /** Capacity of the channel between a streaming provider and its forwarder */
  streamCapacity?: number;
};

export type UnitRuntime = {
  registry: UnitRegistry;
  alert: AlertModule;
  device: DeviceModule;
  inference: InferenceModule;
  service: ServiceModule;
};

/**
 * Register the alert, device, inference and service domains on a fresh
 * registry. A missing provider leaves its domain registered; its units then
 * fail with provider_not_set.
 */
export function createUnitRuntime(options: UnitRuntimeOptions): UnitRuntime {
  const logger = options.logger ?? silentLogger;
  const shared = { events: options.events, logger, clock: options.clock };
  const providers = options.providers ?? {};
  const registry = new UnitRegistry();

  const runtime: UnitRuntime = {
    registry,
    alert: registerAlertUnits(registry, { ...shared, alerts: options.repos.alerts }),
    device: registerDeviceUnits(registry, { ...shared, provider: providers.device }),
    inference: registerInferenceUnits(registry, {
      ...shared,
      provider: providers.inference,
      streamCapacity: options.streamCapacity,
    }),
    service: registerServiceUnits(registry, {
      ...shared,
      services: options.repos.services,
      provider: providers.service,
    }),
  };

  logger.info('Unit runtime ready', registry.counts());
  return runtime;
}
