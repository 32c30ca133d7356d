// Gateway entrypoint

import { errorMessage } from '@asms/protocol';
import { consoleLogger } from '@asms/runtime';
import { createApp } from './app.js';
import { ConfigError, loadConfig } from './config.js';
import { startServer } from './server.js';

async function main(): Promise<void> {
  const app = createApp(loadConfig());
  const server = await startServer(app);

  const shutdown = (signal: string): void => {
    app.logger.info('Shutting down', { signal });
    server.close((error) => {
      if (error) {
        app.logger.error('Server close failed', { error: error.message });
        process.exitCode = 1;
      }
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    consoleLogger.error('Invalid configuration', { issues: error.issues });
  } else {
    consoleLogger.error('Gateway failed to start', { error: errorMessage(error) });
  }
  process.exitCode = 1;
});
