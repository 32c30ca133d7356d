// Service backends

import { randomUUID } from 'node:crypto';
import type { Recommendation, ResourceClass, ServiceMetrics } from '@asms/protocol';

/**
 * What a backend hands back after provisioning a service.
 */
export type ProvisionedService = {
  id: string;
  endpoints: string[];
};

/**
 * Backend that deploys models and manages their lifecycle.
 */
export interface ServiceProvider {
  create(
    modelId: string,
    resourceClass: ResourceClass,
    replicas: number,
    persistent: boolean,
    signal?: AbortSignal
  ): Promise<ProvisionedService>;
  start(serviceId: string, signal?: AbortSignal): Promise<void>;
  stop(serviceId: string, force: boolean, signal?: AbortSignal): Promise<void>;
  scale(serviceId: string, replicas: number, signal?: AbortSignal): Promise<void>;
  getMetrics(serviceId: string, signal?: AbortSignal): Promise<ServiceMetrics>;
  getRecommendation(modelId: string, hint: string, signal?: AbortSignal): Promise<Recommendation>;
  /** Whether the backing process is actually up, independent of stored status */
  isRunning(serviceId: string, signal?: AbortSignal): Promise<boolean>;
  getLogs(serviceId: string, tail: number, signal?: AbortSignal): Promise<string>;
}

export type ServiceOperation = Exclude<keyof ServiceProvider, 'isRunning'>;

/**
 * In-process provider. `errors` fails individual operations; the remaining
 * fields shape what the happy paths return and record what was asked of it.
 */
export class MockServiceProvider implements ServiceProvider {
  errors: Partial<Record<ServiceOperation, Error>> = {};
  metrics: ServiceMetrics = {
    requestsPerSecond: 100,
    latencyP50: 50,
    latencyP99: 200,
    totalRequests: 10000,
    errorRate: 0.01,
  };
  recommendation: Recommendation = {
    resourceClass: 'medium',
    replicas: 2,
    expectedThroughput: 100,
    engineType: 'vllm',
    deviceType: 'gpu',
    reason: 'Default configuration for a mid-sized model',
  };
  running = true;
  readonly started: string[] = [];
  readonly stopped: { serviceId: string; force: boolean }[] = [];
  readonly scaled: { serviceId: string; replicas: number }[] = [];

  async create(): Promise<ProvisionedService> {
    this.throwIfFailing('create');
    return { id: `svc-${randomUUID().slice(0, 8)}`, endpoints: ['http://localhost:8080'] };
  }

  async start(serviceId: string): Promise<void> {
    this.throwIfFailing('start');
    this.started.push(serviceId);
  }

  async stop(serviceId: string, force: boolean): Promise<void> {
    this.throwIfFailing('stop');
    this.stopped.push({ serviceId, force });
  }

  async scale(serviceId: string, replicas: number): Promise<void> {
    this.throwIfFailing('scale');
    this.scaled.push({ serviceId, replicas });
  }

  async getMetrics(): Promise<ServiceMetrics> {
    this.throwIfFailing('getMetrics');
    return { ...this.metrics };
  }

  async getRecommendation(): Promise<Recommendation> {
    this.throwIfFailing('getRecommendation');
    return { ...this.recommendation };
  }

  async isRunning(): Promise<boolean> {
    return this.running;
  }

  async getLogs(serviceId: string, tail: number): Promise<string> {
    this.throwIfFailing('getLogs');
    return `mock logs for service ${serviceId} (last ${tail} lines)`;
  }

  private throwIfFailing(operation: ServiceOperation): void {
    const error = this.errors[operation];
    if (error) throw error;
  }
}
