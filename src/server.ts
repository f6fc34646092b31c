// src/server.ts
// What: HTTP server entrypoint.
// How: Loads config, builds the application context, loads the persisted vector index (a broken file is logged
//      and the server starts with an empty index), then listens. SIGINT/SIGTERM stop the listener, persist the
//      index and end the pool.

import { loadConfig } from './config/env.js';
import { createApp } from './app.js';
import { createAppContext } from './context.js';
import { IndexLoadError } from './errors.js';
import logger from './logging.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const ctx = createAppContext(config, logger);

  try {
    const result = await ctx.service.loadIndex();
    logger.info(result, 'Index ready');
  } catch (err) {
    if (!(err instanceof IndexLoadError)) throw err;
    logger.warn({ err, path: err.path }, 'Could not load persisted index; starting empty');
  }

  const app = createApp(ctx);
  const server = app.listen(config.PORT, () => {
    logger.info({ port: config.PORT }, 'Server listening');
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      ctx
        .close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Server failed to start');
  process.exit(1);
});
