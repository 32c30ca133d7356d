// Wire projections of device records

import type { DeviceHealth, DeviceInfo, DeviceMetrics, DynamicMap } from '@asms/protocol';
import { arraySchema, numberSchema, objectSchema, stringSchema } from '@asms/protocol';

export function deviceToMap(device: DeviceInfo): DynamicMap {
  return {
    id: device.id,
    name: device.name,
    vendor: device.vendor,
    type: device.type,
    architecture: device.architecture ?? '',
    memory: device.memory ?? 0,
    capabilities: [...device.capabilities],
  };
}

export function metricsToMap(metrics: DeviceMetrics): DynamicMap {
  return {
    utilization: metrics.utilization,
    temperature: metrics.temperature,
    power: metrics.power,
    memory_used: metrics.memoryUsed,
    memory_total: metrics.memoryTotal,
  };
}

export function healthToMap(health: DeviceHealth): DynamicMap {
  return { status: health.status, issues: [...health.issues] };
}

export const deviceSchema = objectSchema({
  id: stringSchema(),
  name: stringSchema(),
  vendor: stringSchema(),
  type: stringSchema(),
  architecture: stringSchema(),
  memory: numberSchema({ description: 'Memory in MiB' }),
  capabilities: arraySchema(stringSchema()),
});

export const metricsSchema = objectSchema({
  utilization: numberSchema({ description: 'Utilization percent' }),
  temperature: numberSchema({ description: 'Degrees Celsius' }),
  power: numberSchema({ description: 'Power draw in watts' }),
  memory_used: numberSchema({ description: 'Bytes' }),
  memory_total: numberSchema({ description: 'Bytes' }),
});

export const healthSchema = objectSchema({
  status: stringSchema({ enum: ['healthy', 'warning', 'critical', 'unknown'] }),
  issues: arraySchema(stringSchema()),
});
