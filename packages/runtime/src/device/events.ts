// Device domain events

import type {
  Clock,
  DeviceInfo,
  DeviceMetrics,
  Event,
  EventPublisher,
} from '@asms/protocol';
import { errorMessage } from '@asms/protocol';
import { createEvent, safePublish } from '../events/publishers.js';
import { DEVICE_DOMAIN } from '../errors.js';
import type { Logger } from '../logger.js';
import { deviceToMap } from './projections.js';

export function deviceDetectedEvent(device: DeviceInfo, clock?: Clock): Event {
  return createEvent('device.detected', DEVICE_DOMAIN, { device: deviceToMap(device) }, clock);
}

export function healthChangedEvent(
  deviceId: string,
  oldStatus: string,
  newStatus: string,
  clock?: Clock
): Event {
  return createEvent(
    'device.health_changed',
    DEVICE_DOMAIN,
    { device_id: deviceId, old_status: oldStatus, new_status: newStatus },
    clock
  );
}

export function metricsAlertEvent(
  deviceId: string,
  metric: string,
  value: number,
  threshold: number,
  clock?: Clock
): Event {
  return createEvent(
    'device.metrics_alert',
    DEVICE_DOMAIN,
    { device_id: deviceId, metric, value, threshold },
    clock
  );
}

/**
 * Upper bounds per metric. Absent metrics are not checked.
 */
export type MetricThresholds = Partial<Record<keyof DeviceMetrics, number>>;

/**
 * Publish `device.metrics_alert` for every metric above its threshold.
 *
 * @returns Names of the metrics that crossed their threshold
 */
export function checkMetricThresholds(
  deps: { events?: EventPublisher; clock?: Clock; logger?: Logger },
  deviceId: string,
  metrics: DeviceMetrics,
  thresholds: MetricThresholds
): string[] {
  const crossed: string[] = [];
  for (const [metric, threshold] of Object.entries(thresholds)) {
    const value = readMetric(metrics, metric);
    if (threshold === undefined || value === undefined || value <= threshold) continue;
    crossed.push(metric);
    safePublish(deps.events, metricsAlertEvent(deviceId, metric, value, threshold, deps.clock), (error) =>
      deps.logger?.warn('Failed to publish device event', { deviceId, metric, error: errorMessage(error) })
    );
  }
  return crossed;
}

function readMetric(metrics: DeviceMetrics, name: string): number | undefined {
  switch (name) {
    case 'utilization':
      return metrics.utilization;
    case 'temperature':
      return metrics.temperature;
    case 'power':
      return metrics.power;
    case 'memoryUsed':
      return metrics.memoryUsed;
    case 'memoryTotal':
      return metrics.memoryTotal;
    default:
      return undefined;
  }
}
