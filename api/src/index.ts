import { config } from './config';
import { logger } from './logger';
import { createApp } from './app';

const app = createApp();

// Start server
const server = app.listen(config.port, () => {
  logger.info({
    module: 'index',
    port: config.port,
    node_version: process.version,
  }, 'API server started');
});

// Graceful shutdown
const shutdown = () => {
  logger.info({ module: 'index' }, 'Shutting down...');
  server.close(() => process.exit(0));
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
