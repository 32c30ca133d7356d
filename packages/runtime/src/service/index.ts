// Service domain

import type { Command, Query, ResourceFactory } from '@asms/protocol';
import type { PollingResource } from '../resources/poller.js';
import type { UnitRegistry } from '../units/registry.js';
import type { ServiceUnitDeps } from './commands.js';
import { createCommand, deleteCommand, scaleCommand, startCommand, stopCommand } from './commands.js';
import { getQuery, listQuery, logsQuery, recommendQuery, statusQuery } from './queries.js';
import { createServiceResourceFactory, createServicesResource } from './resources.js';

export type ServiceModule = {
  commands: Command[];
  queries: Query[];
  resources: { services: PollingResource };
  factory: ResourceFactory;
};

export function createServiceModule(deps: ServiceUnitDeps): ServiceModule {
  return {
    commands: [
      createCommand(deps),
      startCommand(deps),
      stopCommand(deps),
      scaleCommand(deps),
      deleteCommand(deps),
    ],
    queries: [getQuery(deps), listQuery(deps), statusQuery(deps), recommendQuery(deps), logsQuery(deps)],
    resources: { services: createServicesResource(deps) },
    factory: createServiceResourceFactory(deps),
  };
}

export function registerServiceUnits(registry: UnitRegistry, deps: ServiceUnitDeps): ServiceModule {
  const serviceModule = createServiceModule(deps);
  serviceModule.commands.forEach((command) => registry.registerCommand(command));
  serviceModule.queries.forEach((query) => registry.registerQuery(query));
  registry.registerResource(serviceModule.resources.services);
  registry.registerResourceFactory(serviceModule.factory);
  return serviceModule;
}

export { MAX_REPLICAS, type ServiceUnitDeps } from './commands.js';
export { DEFAULT_LIST_LIMIT, DEFAULT_LOG_TAIL } from './queries.js';
export {
  MockServiceProvider,
  type ProvisionedService,
  type ServiceOperation,
  type ServiceProvider,
} from './provider.js';
export { parseServiceId, formatServiceId, SERVICE_ID_PREFIX, type ServiceId } from './service-id.js';
export {
  parseServiceResourceURI,
  serviceResourceURI,
  createServiceResource,
  SERVICES_URI,
  SERVICE_PATTERN,
  SERVICE_POLL_INTERVAL_MS,
  SERVICES_POLL_INTERVAL_MS,
} from './resources.js';
export { serviceToMap, serviceSummaryToMap, recommendationToMap } from './projections.js';
