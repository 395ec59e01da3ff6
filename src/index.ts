import 'dotenv/config';
import { getConfig } from './config';
import { configureLogger, logger } from './observability/logger';
import { logError } from './observability/error-log';
import { installShutdownHandlers, startServer } from './server';

/**
 * HTTP daemon entry point
 *
 * Reads configuration from the environment, builds the cached lookup path
 * and serves it until SIGINT/SIGTERM.
 */
async function main() {
  const config = getConfig();
  configureLogger(config.log);
  logger.info('config_loaded', { log_level: config.log.level, log_format: config.log.format });

  installShutdownHandlers(await startServer(config));
}

main().catch((err) => {
  logError(err, { context: 'startup_failed' });
  process.exit(1);
});
