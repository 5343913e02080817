import { loadServerConfig } from './config.js';
import { errorContext, logger } from './logger.js';
import { startServer } from './server.js';

async function main() {
  const config = loadServerConfig();
  const running = await startServer(config);

  // Handle graceful shutdown
  const shutdown = (signal: string) => {
    logger.info('Signal received', { signal });
    running.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', errorContext(error));
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start server', errorContext(error));
  process.exit(1);
});
