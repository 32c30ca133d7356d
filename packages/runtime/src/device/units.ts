// Device commands and queries

import type { Command, DeviceInfo, DynamicMap, Query } from '@asms/protocol';
import {
  arraySchema,
  booleanSchema,
  errorMessage,
  numberSchema,
  objectSchema,
  readString,
  stringSchema,
  systemClock,
  toNumber,
  wrapError,
} from '@asms/protocol';
import {
  DEVICE_DOMAIN,
  deviceNotFound,
  invalidDeviceId,
  invalidPowerLimit,
  providerNotSet,
} from '../errors.js';
import { safePublish } from '../events/publishers.js';
import { silentLogger } from '../logger.js';
import type { UnitDeps } from '../units/define.js';
import { defineCommand, defineQuery } from '../units/define.js';
import { deviceDetectedEvent } from './events.js';
import type { DeviceProvider } from './provider.js';
import {
  deviceSchema,
  deviceToMap,
  healthSchema,
  healthToMap,
  metricsSchema,
  metricsToMap,
} from './projections.js';

export type DeviceUnitDeps = UnitDeps & {
  /** Absent means every unit fails with provider_not_set */
  provider?: DeviceProvider;
};

function requireProvider(deps: DeviceUnitDeps): DeviceProvider {
  if (!deps.provider) throw providerNotSet(DEVICE_DOMAIN);
  return deps.provider;
}

const deviceIdInput = objectSchema({
  device_id: stringSchema({ description: 'Device ID; all devices when omitted' }),
});

export function detectCommand(deps: DeviceUnitDeps): Command {
  const logger = deps.logger ?? silentLogger;
  return defineCommand(
    {
      name: 'device.detect',
      domain: DEVICE_DOMAIN,
      description: 'Detect available hardware devices',
      inputSchema: objectSchema({}),
      outputSchema: objectSchema({ devices: arraySchema(deviceSchema) }),
      examples: [
        {
          input: {},
          output: { devices: [{ id: 'gpu-0', name: 'Mock GPU', vendor: 'MockVendor', type: 'gpu' }] },
          description: 'Detect all devices',
        },
      ],
      async run(_input, ctx) {
        const provider = requireProvider(deps);
        let devices: DeviceInfo[];
        try {
          devices = await provider.detect(ctx.signal);
        } catch (error) {
          throw wrapError('detect devices', error);
        }
        for (const device of devices) {
          safePublish(deps.events, deviceDetectedEvent(device, deps.clock ?? systemClock), (error) =>
            logger.warn('Failed to publish device event', { deviceId: device.id, error: errorMessage(error) })
          );
        }
        return { devices: devices.map(deviceToMap) };
      },
    },
    deps
  );
}

export function setPowerLimitCommand(deps: DeviceUnitDeps): Command {
  return defineCommand(
    {
      name: 'device.set_power_limit',
      domain: DEVICE_DOMAIN,
      description: 'Set the power limit of a device',
      inputSchema: objectSchema(
        {
          device_id: stringSchema({ description: 'Device ID' }),
          limit_watts: numberSchema({ description: 'Power limit in watts' }),
        },
        ['device_id', 'limit_watts']
      ),
      outputSchema: objectSchema({ success: booleanSchema() }),
      examples: [
        {
          input: { device_id: 'gpu-0', limit_watts: 250 },
          output: { success: true },
          description: 'Cap a GPU at 250W',
        },
      ],
      async run(input, ctx) {
        const provider = requireProvider(deps);
        const deviceId = readString(input, 'device_id');
        if (!deviceId) throw invalidDeviceId();
        const limitWatts = toNumber(input.limit_watts);
        if (limitWatts === undefined || limitWatts <= 0) throw invalidPowerLimit();

        try {
          await provider.setPowerLimit(deviceId, limitWatts, ctx.signal);
        } catch (error) {
          throw wrapError(`set power limit for device ${deviceId}`, error);
        }
        return { success: true };
      },
    },
    deps
  );
}

export function infoQuery(deps: DeviceUnitDeps): Query {
  return defineQuery(
    {
      name: 'device.info',
      domain: DEVICE_DOMAIN,
      description: 'Get device information',
      inputSchema: deviceIdInput,
      outputSchema: {
        ...deviceSchema,
        description: 'A single device, or {devices: [...]} when no device_id is given',
      },
      examples: [
        {
          input: { device_id: 'gpu-0' },
          output: { id: 'gpu-0', name: 'Mock GPU', vendor: 'MockVendor', memory: 24564 },
          description: 'One device',
        },
        { input: {}, output: { devices: [{ id: 'gpu-0', name: 'Mock GPU' }] }, description: 'All devices' },
      ],
      async run(input, ctx) {
        const provider = requireProvider(deps);
        const deviceId = readString(input, 'device_id');
        if (deviceId) {
          try {
            return deviceToMap(await provider.getDevice(deviceId, ctx.signal));
          } catch (error) {
            throw wrapError(`get device ${deviceId}`, error);
          }
        }
        try {
          const devices = await provider.detect(ctx.signal);
          return { devices: devices.map(deviceToMap) };
        } catch (error) {
          throw wrapError('detect devices', error);
        }
      },
    },
    deps
  );
}

export function metricsQuery(deps: DeviceUnitDeps): Query {
  return defineQuery(
    {
      name: 'device.metrics',
      domain: DEVICE_DOMAIN,
      description: 'Get real-time device metrics',
      inputSchema: objectSchema({
        device_id: stringSchema({ description: 'Device ID; first detected device when omitted' }),
      }),
      outputSchema: metricsSchema,
      examples: [
        {
          input: { device_id: 'gpu-0' },
          output: {
            utilization: 75.5,
            temperature: 65,
            power: 200,
            memory_used: 16_384_000_000,
            memory_total: 24_564_000_000,
          },
          description: 'Metrics for one device',
        },
      ],
      async run(input, ctx) {
        const provider = requireProvider(deps);
        let deviceId = readString(input, 'device_id');
        if (!deviceId) {
          let devices: DeviceInfo[];
          try {
            devices = await provider.detect(ctx.signal);
          } catch (error) {
            throw wrapError('detect devices', error);
          }
          const [first] = devices;
          if (!first) throw deviceNotFound();
          deviceId = first.id;
        }
        try {
          return metricsToMap(await provider.getMetrics(deviceId, ctx.signal));
        } catch (error) {
          throw wrapError(`get metrics for device ${deviceId}`, error);
        }
      },
    },
    deps
  );
}

export function healthQuery(deps: DeviceUnitDeps): Query {
  return defineQuery(
    {
      name: 'device.health',
      domain: DEVICE_DOMAIN,
      description: 'Check device health',
      inputSchema: deviceIdInput,
      outputSchema: {
        ...healthSchema,
        description: 'One device, or {devices: [{device_id, status, issues}]} when no device_id is given',
      },
      examples: [
        { input: { device_id: 'gpu-0' }, output: { status: 'healthy', issues: [] }, description: 'Healthy device' },
        {
          input: { device_id: 'gpu-1' },
          output: { status: 'warning', issues: ['High temperature detected'] },
          description: 'Device with issues',
        },
      ],
      async run(input, ctx) {
        const provider = requireProvider(deps);
        const deviceId = readString(input, 'device_id');
        if (deviceId) {
          try {
            return healthToMap(await provider.getHealth(deviceId, ctx.signal));
          } catch (error) {
            throw wrapError(`get health for device ${deviceId}`, error);
          }
        }

        let devices: DeviceInfo[];
        try {
          devices = await provider.detect(ctx.signal);
        } catch (error) {
          throw wrapError('detect devices', error);
        }
        const results: DynamicMap[] = [];
        for (const device of devices) {
          try {
            const health = await provider.getHealth(device.id, ctx.signal);
            results.push({ device_id: device.id, ...healthToMap(health) });
          } catch (error) {
            if (ctx.signal.aborted) throw ctx.signal.reason;
            // One failing device does not fail the whole report
            results.push({ device_id: device.id, status: 'unknown', issues: [errorMessage(error)] });
          }
        }
        return { devices: results };
      },
    },
    deps
  );
}
