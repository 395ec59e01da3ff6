/**
 * WHOIS prefix fetcher
 *
 * Resolves a batch of AS numbers over a single registry session. The batch
 * is atomic by default: the first failure aborts it and nothing partial is
 * returned.
 */

import { AsPrefixes, FetchResult, Fetcher, emptyPrefixes } from '../types/prefixes';
import { logger } from '../observability/logger';
import { metrics } from '../observability/metrics';
import { NotFoundError, isAsnLookupError } from './errors';
import { QuerySession, SessionOpener, SessionOptions, openWhoisSession } from './session';

/**
 * What happens to the batch when one AS fails:
 * - fail-fast: abort the whole batch with that error
 * - skip-not-found: drop AS numbers the registry doesn't know and keep
 *   going; protocol and connection errors still abort
 */
export type BatchFailurePolicy = 'fail-fast' | 'skip-not-found';

export const BATCH_FAILURE_POLICIES: readonly BatchFailurePolicy[] = ['fail-fast', 'skip-not-found'];

export interface WhoisFetcherOptions extends SessionOptions {
  failurePolicy?: BatchFailurePolicy;
  /** Opens the registry session; replaced in tests */
  openSession?: SessionOpener;
}

function recordFailure(err: unknown): void {
  metrics.incrementError(isAsnLookupError(err) ? err.kind : 'internal_error');
}

export class WhoisFetcher implements Fetcher {
  private readonly sessionOptions: SessionOptions;
  private readonly failurePolicy: BatchFailurePolicy;
  private readonly openSession: SessionOpener;

  constructor(options: WhoisFetcherOptions) {
    this.sessionOptions = {
      host: options.host,
      port: options.port,
      connectTimeoutMs: options.connectTimeoutMs,
      readTimeoutMs: options.readTimeoutMs
    };
    this.failurePolicy = options.failurePolicy ?? 'fail-fast';
    this.openSession = options.openSession ?? openWhoisSession;
  }

  async fetch(ipv4: boolean, ipv6: boolean, asNumbers: readonly string[]): Promise<FetchResult> {
    const result: FetchResult = new Map();
    if (asNumbers.length === 0) {
      return result;
    }

    metrics.incrementWhoisFetch(asNumbers.length);
    let session: QuerySession;
    try {
      session = await this.openSession(this.sessionOptions);
    } catch (err) {
      recordFailure(err);
      throw err;
    }

    try {
      for (const asn of asNumbers) {
        try {
          result.set(asn, await this.fetchOne(session, asn, ipv4, ipv6));
        } catch (err) {
          if (this.failurePolicy === 'skip-not-found' && err instanceof NotFoundError) {
            logger.info('whois_as_skipped', { asn, reason: err.message });
            continue;
          }
          throw err;
        }
      }
    } catch (err) {
      recordFailure(err);
      throw err;
    } finally {
      await session.close();
    }

    return result;
  }

  private async fetchOne(session: QuerySession, asn: string, ipv4: boolean, ipv6: boolean): Promise<AsPrefixes> {
    const prefixes = emptyPrefixes();
    if (ipv4) {
      prefixes.ipv4 = await session.query(asn, 'ipv4');
    }
    if (ipv6) {
      prefixes.ipv6 = await session.query(asn, 'ipv6');
    }
    return prefixes;
  }
}
