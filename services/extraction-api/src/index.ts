/**
 * Extraction API server
 */

import { config, logger } from '@scanfields/shared';
import { createApp } from './app';

const app = createApp();

// Start server
const server = app.listen(config.port, () => {
  logger.info('Extraction API started', { port: config.port });
});

// Graceful shutdown
function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close(() => {
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
