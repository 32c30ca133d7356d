// @asms/gateway
// tRPC surface over the unit runtime

export { createApp, type App, type AppOptions } from './app.js';
export { loadConfig, ConfigError, type GatewayConfig } from './config.js';
export type { Context } from './context.js';
export { toTRPCCode, toTRPCError } from './errors.js';
export { appRouter, type AppRouter } from './routers/index.js';
export { startServer } from './server.js';
