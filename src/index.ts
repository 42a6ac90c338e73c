import 'dotenv/config';
import type { Server } from 'http';
import { createApp } from './app.js';
import { loadConfig } from './config/index.js';
import { buildServices } from './services/container.js';
import { logger } from './utils/logger.js';

// Global process-level safety nets
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'unhandled_rejection');
});
process.on('uncaughtException', (err) => {
  logger.error({ err }, 'uncaught_exception');
  process.exit(1);
});

function start(): Server {
  const config = loadConfig();
  const { client, service, close } = buildServices(config);
  const app = createApp({
    service,
    health: { generationBackend: client.backendName, failurePolicy: config.reflection.failurePolicy },
    rateLimitRpm: config.http.rateLimitRpm,
  });

  const srv = app.listen(config.http.port, () => {
    logger.info({ port: config.http.port, archive: config.archive.store, embeddings: config.archive.embeddings }, 'server_listening');
  });
  srv.on('error', (err) => {
    logger.error({ err, port: config.http.port }, 'server_listen_failed');
    close();
    process.exit(1);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'server_shutdown');
    srv.close(() => {
      close();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  return srv;
}

try {
  start();
} catch (err) {
  logger.error({ err }, 'server_start_failed');
  process.exit(1);
}
