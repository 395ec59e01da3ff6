import express, { Express } from 'express';
import { Server } from 'http';
import { AppConfig } from './config';
import { Fetcher } from './types/prefixes';
import { Storage } from './storage/types';
import { createStorage } from './storage/registry';
import { startStorageSweep } from './storage/sweeper';
import { WhoisFetcher } from './whois/fetcher';
import { CachedFetcher } from './cache/cached-fetcher';
import { createRoutes } from './api/routes';
import { createMetricsRouter, metricsMiddleware } from './observability/metrics';
import { logger } from './observability/logger';
import {
  apiRateLimiter,
  requestTimeout,
  requestLogger
} from './api/middleware/production-safety';
import { logError } from './observability/error-log';

export function createWhoisFetcher(config: AppConfig): WhoisFetcher {
  return new WhoisFetcher({
    host: config.whois.host,
    port: config.whois.port,
    connectTimeoutMs: config.whois.connectTimeoutMs,
    readTimeoutMs: config.whois.readTimeoutMs,
    failurePolicy: config.whois.failurePolicy
  });
}

/**
 * Build the cached lookup path. Fails with StorageNotFoundError when the
 * configured backend does not exist.
 */
export async function createCachedFetcher(
  config: AppConfig,
  upstream: Fetcher = createWhoisFetcher(config)
): Promise<{ fetcher: CachedFetcher; storage: Storage }> {
  const storage = await createStorage({
    name: config.storage.name,
    ttlMs: config.storage.ttlMs
  });
  const fetcher = new CachedFetcher(upstream, storage, {
    versionMerge: config.storage.versionMerge
  });
  return { fetcher, storage };
}

export function createApp(fetcher: Fetcher, storage: Storage | null, config: AppConfig): Express {
  const app = express();
  app.disable('x-powered-by');

  // Metrics middleware (must be first to capture all requests)
  app.use(metricsMiddleware());
  app.use(requestLogger);
  app.use(requestTimeout(config.listen.requestTimeoutMs));

  // Metrics endpoint (no rate limiting)
  app.use('/', createMetricsRouter());

  app.use(apiRateLimiter);
  app.use('/', createRoutes(fetcher, storage, {
    baseUrl: config.listen.baseUrl,
    whoisHost: config.whois.host,
    whoisPort: config.whois.port,
    storageName: config.storage.name
  }));

  return app;
}

export interface RunningServer {
  server: Server;
  shutdown(): Promise<void>;
}

export async function startServer(config: AppConfig): Promise<RunningServer> {
  const { fetcher, storage } = await createCachedFetcher(config);

  logger.info('storage_initialized', {
    backend: config.storage.name || 'memory',
    ttl_ms: config.storage.ttlMs,
    version_merge: config.storage.versionMerge
  });

  let sweep: NodeJS.Timeout | null = null;
  if (config.storage.sweepIntervalMs > 0) {
    sweep = startStorageSweep(storage, config.storage.sweepIntervalMs);
    logger.info('storage_sweep_scheduled', { interval_ms: config.storage.sweepIntervalMs });
  }

  const app = createApp(fetcher, storage, config);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.listen.port, config.listen.address, () => {
      listening.off('error', reject);
      resolve(listening);
    });
    listening.once('error', reject);
  });

  logger.info('http_listening', {
    address: config.listen.address,
    port: config.listen.port,
    whois: `${config.whois.host}:${config.whois.port}`
  });

  const shutdown = async () => {
    if (sweep) {
      clearInterval(sweep);
    }
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await storage.close();
  };

  return { server, shutdown };
}

/**
 * Stop the server and release storage on SIGINT/SIGTERM, then exit.
 * Stray rejections are logged instead of taking the daemon down.
 */
export function installShutdownHandlers(running: RunningServer): void {
  const onSignal = (signal: string) => {
    logger.info('shutdown_started', { signal });
    running.shutdown()
      .then(() => {
        logger.info('shutdown_complete');
        process.exit(0);
      })
      .catch((err) => {
        logError(err, { context: 'shutdown_failed' });
        process.exit(1);
      });
  };

  process.once('SIGTERM', () => onSignal('SIGTERM'));
  process.once('SIGINT', () => onSignal('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logError(reason, { context: 'unhandled_rejection' });
  });
}
