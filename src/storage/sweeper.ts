/**
 * STORAGE SWEEP
 *
 * Optional background purge of expired records. Reads already treat expired
 * records as misses; the sweep only keeps memory from holding records nobody
 * asks for again.
 *
 * Usage:
 *   const sweep = startStorageSweep(storage, 10 * 60 * 1000);
 *   ...
 *   clearInterval(sweep);
 */

import { logger } from '../observability/logger';
import { logError } from '../observability/error-log';
import { Storage } from './types';

/**
 * Run one purge pass and log what it removed
 */
export async function sweepStorage(storage: Storage): Promise<number> {
  const start = Date.now();
  const purged = await storage.purgeExpired();
  if (purged > 0) {
    logger.info('storage_sweep', { purged, duration_ms: Date.now() - start });
  }
  return purged;
}

/**
 * Start the sweep on an interval; the timer does not keep the process alive
 */
export function startStorageSweep(storage: Storage, intervalMs: number): NodeJS.Timeout {
  const interval = setInterval(() => {
    sweepStorage(storage).catch((err) => {
      logError(err, { context: 'storage_sweep_failed' });
    });
  }, intervalMs);
  interval.unref();
  return interval;
}
