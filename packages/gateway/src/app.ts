// Application assembly: stores, mock providers, runtime and tRPC context

import type { RepositoryContext } from '@asms/repositories';
import { createInMemoryRepositoryContext } from '@asms/repositories';
import type { Logger, RuntimeProviders, UnitRuntime } from '@asms/runtime';
import {
  EventBus,
  MockDeviceProvider,
  MockInferenceProvider,
  MockServiceProvider,
  consoleLogger,
  createLevelFilter,
  createMockDevice,
  createUnitRuntime,
} from '@asms/runtime';
import type { GatewayConfig } from './config.js';
import type { Context } from './context.js';
import { appRouter } from './routers/index.js';
import { createCallerFactory } from './trpc.js';

export type AppOptions = {
  repos?: RepositoryContext;
  /** Replaces the mock provider of each domain given */
  providers?: RuntimeProviders;
  logger?: Logger;
};

export type App = {
  config: GatewayConfig;
  runtime: UnitRuntime;
  eventBus: EventBus;
  logger: Logger;
  context: Context;
  router: typeof appRouter;
  /** Server-side caller, for tests and in-process use */
  caller: ReturnType<typeof createCaller>;
};

const createCaller = createCallerFactory(appRouter);

/**
 * Wire an in-memory control plane. Every domain gets a mock provider unless
 * one is passed in.
 */
export function createApp(config: GatewayConfig, options: AppOptions = {}): App {
  const logger = createLevelFilter(options.logger ?? consoleLogger, config.logLevel);
  const eventBus = new EventBus(logger);
  const runtime = createUnitRuntime({
    repos: options.repos ?? createInMemoryRepositoryContext(),
    providers: {
      device: new MockDeviceProvider([createMockDevice({ id: config.mockDeviceId })]),
      inference: new MockInferenceProvider(),
      service: new MockServiceProvider(),
      ...options.providers,
    },
    events: eventBus,
    logger,
    streamCapacity: config.streamBuffer,
  });

  const context: Context = { registry: runtime.registry, eventBus, config, logger };
  return {
    config,
    runtime,
    eventBus,
    logger,
    context,
    router: appRouter,
    caller: createCaller(context),
  };
}
