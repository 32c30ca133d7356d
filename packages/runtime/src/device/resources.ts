// Per-device resources: asms://device/<id>/{info|metrics|health}

import type { DeviceResourceType, ResourceFactory } from '@asms/protocol';
import { DEVICE_RESOURCE_TYPES, RESOURCE_SCHEME, errorMessage } from '@asms/protocol';
import { DEVICE_DOMAIN, providerNotSet } from '../errors.js';
import { safePublish } from '../events/publishers.js';
import { silentLogger } from '../logger.js';
import { PollingResource } from '../resources/poller.js';
import { healthChangedEvent } from './events.js';
import {
  deviceSchema,
  deviceToMap,
  healthSchema,
  healthToMap,
  metricsSchema,
  metricsToMap,
} from './projections.js';
import type { DeviceUnitDeps } from './units.js';

const DEVICE_PREFIX = `${RESOURCE_SCHEME}device/`;

export const DEVICE_PATTERN = `${DEVICE_PREFIX}*`;

export const DEVICE_POLL_INTERVALS_MS: Readonly<Record<DeviceResourceType, number>> = {
  info: 30_000,
  metrics: 5_000,
  health: 10_000,
};

export type ParsedDeviceURI =
  | { ok: true; resourceType: DeviceResourceType; deviceId: string }
  | { ok: false };

function isDeviceResourceType(value: string): value is DeviceResourceType {
  return DEVICE_RESOURCE_TYPES.some((type) => type === value);
}

/**
 * Split `asms://device/<id>/<type>`. Anything else, including an empty id or
 * extra path segments, is rejected.
 */
export function parseDeviceResourceURI(uri: string): ParsedDeviceURI {
  if (!uri.startsWith(DEVICE_PREFIX)) return { ok: false };
  const parts = uri.slice(DEVICE_PREFIX.length).split('/');
  if (parts.length !== 2) return { ok: false };
  const [deviceId, resourceType] = parts;
  if (deviceId === '' || !isDeviceResourceType(resourceType)) return { ok: false };
  return { ok: true, resourceType, deviceId };
}

export function deviceResourceURI(deviceId: string, resourceType: DeviceResourceType): string {
  return `${DEVICE_PREFIX}${deviceId}/${resourceType}`;
}

export function createDeviceResource(
  deps: DeviceUnitDeps,
  deviceId: string,
  resourceType: DeviceResourceType
): PollingResource<unknown> {
  const logger = deps.logger ?? silentLogger;
  const common = {
    uri: deviceResourceURI(deviceId, resourceType),
    domain: DEVICE_DOMAIN,
    intervalMs: DEVICE_POLL_INTERVALS_MS[resourceType],
    clock: deps.clock,
    logger: deps.logger,
  };
  const provider = () => {
    if (!deps.provider) throw providerNotSet(DEVICE_DOMAIN);
    return deps.provider;
  };

  switch (resourceType) {
    case 'info':
      return new PollingResource<unknown>({
        ...common,
        schema: deviceSchema,
        fetch: async (signal) => deviceToMap(await provider().getDevice(deviceId, signal)),
      });
    case 'metrics':
      return new PollingResource<unknown>({
        ...common,
        schema: metricsSchema,
        fetch: async (signal) => metricsToMap(await provider().getMetrics(deviceId, signal)),
      });
    case 'health': {
      // Last status seen by any watcher; the event goes out once per transition
      let lastStatus: unknown;
      return new PollingResource<unknown>({
        ...common,
        schema: healthSchema,
        fetch: async (signal) => healthToMap(await provider().getHealth(deviceId, signal)),
        classify(data, previous) {
          const status = data.status;
          if (lastStatus !== undefined && lastStatus !== status) {
            safePublish(
              deps.events,
              healthChangedEvent(deviceId, String(lastStatus), String(status), deps.clock),
              (error) => logger.warn('Failed to publish device event', { deviceId, error: errorMessage(error) })
            );
          }
          lastStatus = status;
          if (previous === undefined || previous === status) {
            return { operation: 'refresh', state: status };
          }
          return { operation: 'health_changed', state: status };
        },
      });
    }
  }
}

/**
 * Resources are created once per URI, so every watcher of a device shares
 * one health history.
 */
export function createDeviceResourceFactory(deps: DeviceUnitDeps): ResourceFactory {
  const created = new Map<string, PollingResource<unknown>>();
  return {
    pattern: DEVICE_PATTERN,
    canCreate: (uri) => parseDeviceResourceURI(uri).ok,
    create(uri) {
      const existing = created.get(uri);
      if (existing) return existing;
      const parsed = parseDeviceResourceURI(uri);
      if (!parsed.ok) {
        throw new Error(`invalid device resource URI: ${uri}`);
      }
      const resource = createDeviceResource(deps, parsed.deviceId, parsed.resourceType);
      created.set(uri, resource);
      return resource;
    },
  };
}
