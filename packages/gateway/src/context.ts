// tRPC request context

import type { EventBus, Logger, UnitRegistry } from '@asms/runtime';
import type { GatewayConfig } from './config.js';

/**
 * Context available to all procedures. Built once per app; every request
 * shares the registry and the event bus.
 */
export type Context = {
  registry: UnitRegistry;
  /** Published unit and domain events, for `events.subscribe` */
  eventBus: EventBus;
  config: GatewayConfig;
  logger: Logger;
};
