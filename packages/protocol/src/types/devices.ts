// Device domain types

import type { Id } from './common.js';

export type DeviceHealthStatus = 'healthy' | 'warning' | 'critical' | 'unknown';

export type DeviceInfo = {
  id: Id;
  name: string;
  vendor: string;
  /** e.g. `gpu`, `npu`, `cpu` */
  type: string;
  architecture?: string;
  /** Memory in MiB */
  memory?: number;
  capabilities: string[];
};

export type DeviceMetrics = {
  /** Percent, 0..100 */
  utilization: number;
  /** Degrees Celsius */
  temperature: number;
  /** Watts */
  power: number;
  /** Bytes */
  memoryUsed: number;
  /** Bytes */
  memoryTotal: number;
};

export type DeviceHealth = {
  status: DeviceHealthStatus;
  issues: string[];
};

export type DeviceResourceType = 'info' | 'metrics' | 'health';

export const DEVICE_RESOURCE_TYPES: readonly DeviceResourceType[] = ['info', 'metrics', 'health'];

export type DeviceEventType = 'device.detected' | 'device.health_changed' | 'device.metrics_alert';
