import app from './app';
import Config from '@/config';
import { logger } from '@/utils/logger';

function startServer() {
  try {
    const server = app.listen(Config.PORT, () => {
      logger.info(`✓ ${Config.SERVICE_NAME} running on port ${Config.PORT} (${Config.NODE_ENV})`);
    });

    // Graceful shutdown
    const shutdown = (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`);
      server.close(() => {
        process.exit(0);
      });
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

startServer();
