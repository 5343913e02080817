/**
 * hydra serve - run the ingress server until SIGINT/SIGTERM
 */

import { createLogger, startServer } from '@hydra/server';
import { ConfigManager, resolveServeConfig, type ServeFlags } from '../config.js';

export async function serveCommand(options: ServeFlags): Promise<void> {
  const config = resolveServeConfig(options, new ConfigManager().readOrDefault());
  const log = createLogger('hydra');
  const running = await startServer(config, { logger: log });

  // Handle graceful shutdown
  await new Promise<void>((resolve, reject) => {
    const shutdown = (signal: NodeJS.Signals) => {
      log.info('Signal received', { signal });
      running.close().then(resolve, reject);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}
