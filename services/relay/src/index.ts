import { config } from './config';
import { buildApp } from './server';
import { createStorageBackend } from './storage';

/**
 * Main entrypoint for the relay.
 * Opens storage once, starts Fastify on the configured host/port and closes both on shutdown.
 */
async function main() {
  const storage = await createStorageBackend(config.storage);
  const app = await buildApp({
    storage,
    logger: { level: config.logLevel },
    timeouts: config.timeouts,
  });
  app.log.info({ backend: storage.kind }, 'Storage ready');

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down');
    try {
      await app.close();
      await storage.close();
      process.exit(0);
    } catch (err) {
      app.log.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    await storage.close();
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // storage that cannot be opened lands here; never serve without it
  console.error('Fatal error starting datayoinker:', err);
  process.exit(1);
});
