/**
 * Ferry Application Entry Point
 *
 * Boot sequence: configuration, logger, server, routes, then serve until
 * SIGINT or SIGTERM.
 */

import { Lifecycle, Server, createLogger, loadConfig, setLogger, toError } from './framework/mod.ts';
import { registerRoutes } from './src/routes/mod.ts';

async function main(): Promise<void> {
  // 1. Load configuration (file, environment, -debug flag)
  const config = await loadConfig();

  // 2. Build the process logger
  const logger = createLogger(config);
  setLogger(logger);
  if (config.get('debug')) {
    logger.info('Debug logging enabled.');
  }

  // 3. Create the server and register routes
  const server = new Server({
    port: config.get('port'),
    hostname: config.get('host'),
    logger,
  });
  registerRoutes(server, config, logger);

  // 4. Shut down cleanly on signals
  const lifecycle = new Lifecycle({ handleSignals: true, logger, shutdownTimeout: 10000 });
  lifecycle.onShutdown(() => server.close());

  // 5. Serve until closed
  await lifecycle.emitStart();
  await server.run();
}

main().catch((error: unknown) => {
  const err = toError(error);
  console.error('Failed to start Ferry:', err.message);
  process.exit(1);
});
