// Device domain

import type { Command, Query, ResourceFactory } from '@asms/protocol';
import type { UnitRegistry } from '../units/registry.js';
import { createDeviceResourceFactory } from './resources.js';
import type { DeviceUnitDeps } from './units.js';
import { detectCommand, healthQuery, infoQuery, metricsQuery, setPowerLimitCommand } from './units.js';

export type DeviceModule = {
  commands: Command[];
  queries: Query[];
  factory: ResourceFactory;
};

export function createDeviceModule(deps: DeviceUnitDeps): DeviceModule {
  return {
    commands: [detectCommand(deps), setPowerLimitCommand(deps)],
    queries: [infoQuery(deps), metricsQuery(deps), healthQuery(deps)],
    factory: createDeviceResourceFactory(deps),
  };
}

export function registerDeviceUnits(registry: UnitRegistry, deps: DeviceUnitDeps): DeviceModule {
  const deviceModule = createDeviceModule(deps);
  deviceModule.commands.forEach((command) => registry.registerCommand(command));
  deviceModule.queries.forEach((query) => registry.registerQuery(query));
  registry.registerResourceFactory(deviceModule.factory);
  return deviceModule;
}

export type { DeviceUnitDeps } from './units.js';
export { MockDeviceProvider, createMockDevice, type DeviceProvider } from './provider.js';
export {
  parseDeviceResourceURI,
  deviceResourceURI,
  createDeviceResource,
  DEVICE_PATTERN,
  DEVICE_POLL_INTERVALS_MS,
  type ParsedDeviceURI,
} from './resources.js';
export { checkMetricThresholds, type MetricThresholds } from './events.js';
export { deviceToMap, metricsToMap, healthToMap } from './projections.js';
