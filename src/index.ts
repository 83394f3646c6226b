/**
 * Application Entry Point
 *
 * Starts the Express intake server and the run worker in a single process.
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new HTTP connections
 * 2. Close the worker (finishes the current run, takes no new ones)
 * 3. Close the queue connection
 * 4. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 */

import { appConfig } from './config.js';
import { closeRunWorker, createRunWorker } from './pipeline/run-worker.js';
import { closeRunQueue } from './server/queue.js';
import { createApp } from './server/server.js';

async function main(): Promise<void> {
  console.log('[startup] Tax document sorter starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Kill switch:', appConfig.killSwitch ? 'ACTIVE' : 'inactive');
  console.log('[startup] Output directory:', appConfig.sorter.outputDir);
  console.log('[startup] Rule catalog:', appConfig.sorter.catalogPath ?? 'bundled');
  if (!appConfig.gemini.apiKey) {
    console.warn('[startup] GEMINI_API_KEY is not set; every PDF will halt at text extraction');
  }

  const app = createApp();
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  createRunWorker();

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`[shutdown] Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('[shutdown] HTTP server closed');
    });

    await closeRunWorker();
    console.log('[shutdown] Run worker closed');

    await closeRunQueue();
    console.log('[shutdown] Queue closed');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error('[shutdown] Error during shutdown:', err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
