/**
 * Application Entry Point
 *
 * Startup:
 * 1. Log environment configuration
 * 2. Create stores for the configured driver and prepare them
 *    (connectivity check + official template seeding)
 * 3. Start Express server on configured port
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new HTTP connections
 * 2. Close storage connections
 * 3. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { createApp } from './api/server.js';
import { createStores, prepareStorage } from './bootstrap.js';
import { ChecklistProgressEngine } from './checklist/index.js';
import { TemplateService } from './templates/index.js';
import { appConfig } from './config.js';

async function main() {
  console.log('[startup] Rookie Guide API starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Storage driver:', appConfig.storageDriver);

  const stores = createStores(appConfig.storageDriver);
  await prepareStorage(stores.templates, { seedTemplates: appConfig.templates.seedOnStartup });

  const engine = new ChecklistProgressEngine(stores.templates, stores.checklists, {
    maxConflictRetries: appConfig.checklist.maxConflictRetries,
  });
  const templates = new TemplateService(stores.templates);

  const app = createApp({ engine, templates, identityHeader: appConfig.identity.header });
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[shutdown] Received ${signal}, shutting down gracefully...`);

    await new Promise<void>((resolve) => {
      server.close(() => {
        console.log('[shutdown] HTTP server closed');
        resolve();
      });
    });

    await stores.close();
    console.log('[shutdown] Storage closed');

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
