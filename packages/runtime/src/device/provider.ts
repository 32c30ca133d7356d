// Device backends

import type { DeviceHealth, DeviceInfo, DeviceMetrics } from '@asms/protocol';
import { deviceNotFound } from '../errors.js';

/**
 * Backend that discovers accelerators and reports on them.
 */
export interface DeviceProvider {
  detect(signal?: AbortSignal): Promise<DeviceInfo[]>;
  getDevice(deviceId: string, signal?: AbortSignal): Promise<DeviceInfo>;
  getMetrics(deviceId: string, signal?: AbortSignal): Promise<DeviceMetrics>;
  getHealth(deviceId: string, signal?: AbortSignal): Promise<DeviceHealth>;
  setPowerLimit(deviceId: string, limitWatts: number, signal?: AbortSignal): Promise<void>;
}

export function createMockDevice(overrides: Partial<DeviceInfo> = {}): DeviceInfo {
  return {
    id: 'gpu-0',
    name: 'Mock GPU',
    vendor: 'MockVendor',
    type: 'gpu',
    architecture: 'mock-arch',
    memory: 24564,
    capabilities: ['cuda', 'tensor'],
    ...overrides,
  };
}

/**
 * In-process provider with a fixed inventory.
 *
 * Every field is public so tests can reshape the inventory, fail every call
 * with `error`, or fail a single device's health and metrics with `failures`.
 */
export class MockDeviceProvider implements DeviceProvider {
  devices: DeviceInfo[];
  health: DeviceHealth = { status: 'healthy', issues: [] };
  metrics: DeviceMetrics = {
    utilization: 50,
    temperature: 60,
    power: 200,
    memoryUsed: 8_192_000_000,
    memoryTotal: 24_564_000_000,
  };
  error?: Error;
  failures = new Map<string, Error>();
  powerLimit?: number;
  powerSetId?: string;

  constructor(devices: DeviceInfo[] = [createMockDevice()]) {
    this.devices = devices;
  }

  async detect(): Promise<DeviceInfo[]> {
    this.throwIfFailing();
    return this.devices.map((device) => ({ ...device, capabilities: [...device.capabilities] }));
  }

  async getDevice(deviceId: string): Promise<DeviceInfo> {
    this.throwIfFailing();
    const device = this.devices.find((candidate) => candidate.id === deviceId);
    if (!device) {
      throw deviceNotFound(deviceId);
    }
    return { ...device, capabilities: [...device.capabilities] };
  }

  async getMetrics(deviceId: string): Promise<DeviceMetrics> {
    this.throwIfFailing(deviceId);
    return { ...this.metrics };
  }

  async getHealth(deviceId: string): Promise<DeviceHealth> {
    this.throwIfFailing(deviceId);
    return { status: this.health.status, issues: [...this.health.issues] };
  }

  async setPowerLimit(deviceId: string, limitWatts: number): Promise<void> {
    this.throwIfFailing(deviceId);
    this.powerSetId = deviceId;
    this.powerLimit = limitWatts;
  }

  private throwIfFailing(deviceId?: string): void {
    if (this.error) throw this.error;
    const failure = deviceId === undefined ? undefined : this.failures.get(deviceId);
    if (failure) throw failure;
  }
}
