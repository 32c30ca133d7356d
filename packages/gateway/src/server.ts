// Standalone HTTP server for the tRPC router

import type { Server } from 'node:http';
import { createHTTPServer } from '@trpc/server/adapters/standalone';
import type { App } from './app.js';

/**
 * Listen on the configured host and port. Resolves once the socket is bound.
 */
export function startServer(app: App): Promise<Server> {
  const server = createHTTPServer({
    router: app.router,
    createContext: () => app.context,
    onError({ error, path }) {
      if (error.code === 'INTERNAL_SERVER_ERROR') {
        app.logger.error('Unhandled procedure error', { path, error: error.message });
      }
    },
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(app.config.port, app.config.host, () => {
      server.off('error', reject);
      app.logger.info('Gateway listening', { host: app.config.host, port: app.config.port });
      resolve(server);
    });
  });
}
