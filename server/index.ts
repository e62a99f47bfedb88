import { loadConfig } from '../src/config.js';
import { logError } from '../src/error-logger.js';
import { createProcessSource } from '../src/proc.js';
import { takeSnapshot } from '../src/snapshot.js';
import { buildServer } from './app.js';

async function start() {
  const config = loadConfig();
  const app = await buildServer({
    logLevel: config.logLevel,
    snapshot: () => takeSnapshot(createProcessSource(), { concurrency: config.concurrency }),
  });

  const shutdown = (signal: string) => {
    app.log.info(`Received ${signal}, shutting down`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await app.listen({ port: config.port, host: config.host });
}

start().catch(async (err: unknown) => {
  console.error('Failed to start server:', err);
  await logError('server:start', err);
  process.exit(1);
});
