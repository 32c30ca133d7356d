// Service resources: asms://service/<id> and asms://services

import type { ResourceFactory } from '@asms/protocol';
import { RESOURCE_SCHEME, arraySchema, numberSchema, objectSchema } from '@asms/protocol';
import { SERVICE_DOMAIN } from '../errors.js';
import { PollingResource, diffField } from '../resources/poller.js';
import type { ServiceUnitDeps } from './commands.js';
import { serviceSchema, serviceSummarySchema, serviceSummaryToMap, serviceToMap } from './projections.js';

const SERVICE_PREFIX = `${RESOURCE_SCHEME}service/`;

export const SERVICES_URI = `${RESOURCE_SCHEME}services`;
export const SERVICE_PATTERN = `${SERVICE_PREFIX}*`;

export const SERVICE_POLL_INTERVAL_MS = 30_000;
export const SERVICES_POLL_INTERVAL_MS = 60_000;

/**
 * Extract the id from `asms://service/<id>`. Undefined for any other shape.
 */
export function parseServiceResourceURI(uri: string): string | undefined {
  if (!uri.startsWith(SERVICE_PREFIX)) return undefined;
  const id = uri.slice(SERVICE_PREFIX.length);
  if (id === '' || id.includes('/')) return undefined;
  return id;
}

export function serviceResourceURI(serviceId: string): string {
  return `${SERVICE_PREFIX}${serviceId}`;
}

/**
 * One service. Emits `status_changed` on the first tick whose status differs
 * from the previous tick seen by the same watcher.
 */
export function createServiceResource(deps: ServiceUnitDeps, serviceId: string): PollingResource<unknown> {
  return new PollingResource<unknown>({
    uri: serviceResourceURI(serviceId),
    domain: SERVICE_DOMAIN,
    schema: serviceSchema,
    intervalMs: SERVICE_POLL_INTERVAL_MS,
    clock: deps.clock,
    logger: deps.logger,
    fetch: async () => serviceToMap(await deps.services.get(serviceId)),
    classify: diffField('status', 'status_changed'),
  });
}

export function createServicesResource(deps: ServiceUnitDeps): PollingResource {
  return new PollingResource({
    uri: SERVICES_URI,
    domain: SERVICE_DOMAIN,
    schema: objectSchema({ services: arraySchema(serviceSummarySchema), total: numberSchema() }),
    intervalMs: SERVICES_POLL_INTERVAL_MS,
    operation: 'refresh',
    clock: deps.clock,
    logger: deps.logger,
    async fetch() {
      const page = await deps.services.list();
      return { services: page.items.map(serviceSummaryToMap), total: page.total };
    },
  });
}

export function createServiceResourceFactory(deps: ServiceUnitDeps): ResourceFactory {
  return {
    pattern: SERVICE_PATTERN,
    canCreate: (uri) => parseServiceResourceURI(uri) !== undefined,
    create(uri) {
      const serviceId = parseServiceResourceURI(uri);
      if (serviceId === undefined) {
        throw new Error(`invalid service resource URI: ${uri}`);
      }
      return createServiceResource(deps, serviceId);
    },
  };
}
