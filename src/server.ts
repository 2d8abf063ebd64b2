/**
 * HTTP Server
 *
 * Entry point: loads configuration, warms the catalog cache and listens.
 */

import { createApp } from './app';
import { getConfig } from './config';
import { createLogger, extractError, getConfiguredLogLevel, setLogLevel } from './utils/logger';

const log = createLogger('SERVER');

// ========================================
// GLOBAL EXCEPTION HANDLERS
// ========================================

process.on('uncaughtException', (error: Error) => {
  log.error('Uncaught exception - process will exit', {
    error: error.message,
    stack: error.stack,
  });
  // Give time for logs to flush
  setTimeout(() => process.exit(1), 1000);
});

process.on('unhandledRejection', (reason: unknown) => {
  log.error('Unhandled promise rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
});

async function main(): Promise<void> {
  const config = getConfig();
  setLogLevel(config.logging.level);

  const { app, i18n } = createApp(config);

  const missing = await i18n.catalogs.preload(i18n.supportedLocales);
  if (missing.length > 0) {
    log.warn('Serving identity translation for locales without a usable catalog', { locales: missing });
  }

  const server = app.listen(config.server.port, () => {
    log.info(`Server started on port ${config.server.port}`, {
      environment: config.server.nodeEnv,
      logLevel: getConfiguredLogLevel(),
    });
  });

  const shutdown = (signal: string): void => {
    log.info(`Received ${signal}, shutting down...`);

    server.close(() => {
      log.info('HTTP server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      log.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  log.error('Failed to start server', extractError(error));
  process.exit(1);
});
