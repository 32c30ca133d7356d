// Service domain types

import type { Id } from './common.js';

export type ServiceStatus = 'pending' | 'starting' | 'running' | 'stopping' | 'stopped' | 'failed';

export const SERVICE_STATUSES: readonly ServiceStatus[] = [
  'pending',
  'starting',
  'running',
  'stopping',
  'stopped',
  'failed',
];

export type ResourceClass = 'small' | 'medium' | 'large';

export const RESOURCE_CLASSES: readonly ResourceClass[] = ['small', 'medium', 'large'];

/**
 * An inference service: a model deployed behind one or more replicas.
 */
export type ModelService = {
  id: Id;
  name: string;
  modelId: string;
  status: ServiceStatus;
  replicas: number;
  activeReplicas: number;
  resourceClass: ResourceClass;
  endpoints: string[];
  config: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
};

export type ServiceMetrics = {
  requestsPerSecond: number;
  latencyP50: number;
  latencyP99: number;
  totalRequests: number;
  errorRate: number;
};

export type ServiceFilter = {
  status?: ServiceStatus;
  modelId?: string;
  /** 0 or absent means no limit */
  limit?: number;
  offset?: number;
};

/**
 * Deployment advice for a model.
 */
export type Recommendation = {
  resourceClass: ResourceClass;
  replicas: number;
  expectedThroughput: number;
  /** e.g. vllm, whisper, tts, ollama */
  engineType: string;
  /** gpu or cpu */
  deviceType: string;
  reason: string;
};
