// Wire projections of service records

import type {
  DynamicMap,
  ModelService,
  Recommendation,
  ResourceClass,
  ServiceMetrics,
  ServiceStatus,
} from '@asms/protocol';
import {
  RESOURCE_CLASSES,
  SERVICE_STATUSES,
  arraySchema,
  numberSchema,
  objectSchema,
  stringSchema,
} from '@asms/protocol';
import { invalidResourceClass, invalidServiceStatus } from '../errors.js';

export function isResourceClass(value: unknown): value is ResourceClass {
  return RESOURCE_CLASSES.some((resourceClass) => resourceClass === value);
}

export function isServiceStatus(value: unknown): value is ServiceStatus {
  return SERVICE_STATUSES.some((status) => status === value);
}

export function parseResourceClass(value: unknown): ResourceClass {
  if (!isResourceClass(value)) throw invalidResourceClass(value);
  return value;
}

export function parseServiceStatus(value: unknown): ServiceStatus {
  if (!isServiceStatus(value)) throw invalidServiceStatus(value);
  return value;
}

/** Full record as returned by `service.get` and the per-service resource */
export function serviceToMap(service: ModelService): DynamicMap {
  return {
    id: service.id,
    name: service.name,
    model_id: service.modelId,
    status: service.status,
    replicas: service.replicas,
    endpoints: [...service.endpoints],
    resource_class: service.resourceClass,
    active_replicas: service.activeReplicas,
  };
}

export function serviceSummaryToMap(service: ModelService): DynamicMap {
  return {
    id: service.id,
    model_id: service.modelId,
    status: service.status,
    replicas: service.replicas,
    endpoints: [...service.endpoints],
  };
}

export function serviceMetricsToMap(metrics: ServiceMetrics): DynamicMap {
  return {
    requests_per_second: metrics.requestsPerSecond,
    latency_p50: metrics.latencyP50,
    latency_p99: metrics.latencyP99,
    total_requests: metrics.totalRequests,
    error_rate: metrics.errorRate,
  };
}

export function recommendationToMap(recommendation: Recommendation): DynamicMap {
  return {
    resource_class: recommendation.resourceClass,
    replicas: recommendation.replicas,
    expected_throughput: recommendation.expectedThroughput,
    engine_type: recommendation.engineType,
    device_type: recommendation.deviceType,
    reason: recommendation.reason,
  };
}

export const serviceMetricsSchema = objectSchema({
  requests_per_second: numberSchema(),
  latency_p50: numberSchema({ description: 'Median latency in ms' }),
  latency_p99: numberSchema({ description: '99th percentile latency in ms' }),
  total_requests: numberSchema(),
  error_rate: numberSchema(),
});

export const serviceSchema = objectSchema({
  id: stringSchema(),
  name: stringSchema(),
  model_id: stringSchema(),
  status: stringSchema({ enum: SERVICE_STATUSES }),
  replicas: numberSchema(),
  endpoints: arraySchema(stringSchema()),
  resource_class: stringSchema({ enum: RESOURCE_CLASSES }),
  active_replicas: numberSchema(),
  metrics: serviceMetricsSchema,
});

export const serviceSummarySchema = objectSchema({
  id: stringSchema(),
  model_id: stringSchema(),
  status: stringSchema({ enum: SERVICE_STATUSES }),
  replicas: numberSchema(),
  endpoints: arraySchema(stringSchema()),
});

export const recommendationSchema = objectSchema({
  resource_class: stringSchema({ enum: RESOURCE_CLASSES }),
  replicas: numberSchema(),
  expected_throughput: numberSchema({ description: 'Requests per second' }),
  engine_type: stringSchema(),
  device_type: stringSchema(),
  reason: stringSchema(),
});
