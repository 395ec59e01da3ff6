/**
 * Read-through cache in front of a Fetcher
 *
 * Serves AS numbers whose cached record is fresh and covers every requested
 * IP version; everything else goes to the wrapped fetcher in one batch and is
 * written back to storage.
 */

import { AsPrefixes, FetchResult, Fetcher, emptyPrefixes } from '../types/prefixes';
import { logger } from '../observability/logger';
import { metrics } from '../observability/metrics';
import { NotCachedError } from '../whois/errors';
import { AsRecord, AsRecordInput, Storage } from '../storage/types';

/**
 * How a refresh treats the version that was not requested this time:
 * - overwrite: the new record only covers this call's versions; blocks and
 *   flags from earlier calls are dropped
 * - merge: flags are OR-ed with the previous record and its blocks for the
 *   other version are kept
 */
export type VersionMergePolicy = 'overwrite' | 'merge';

export const VERSION_MERGE_POLICIES: readonly VersionMergePolicy[] = ['overwrite', 'merge'];

export interface CachedFetcherOptions {
  versionMerge?: VersionMergePolicy;
}

type CacheLookup =
  | { status: 'hit'; record: AsRecord }
  | { status: 'miss' }
  | { status: 'incomplete'; record: AsRecord };

function selectPrefixes(record: AsRecord, ipv4: boolean, ipv6: boolean): AsPrefixes {
  const prefixes = emptyPrefixes();
  if (ipv4) {
    prefixes.ipv4 = [...record.ipv4];
  }
  if (ipv6) {
    prefixes.ipv6 = [...record.ipv6];
  }
  return prefixes;
}

function inRequestOrder(result: FetchResult, asNumbers: readonly string[]): FetchResult {
  const ordered: FetchResult = new Map();
  for (const asn of asNumbers) {
    const prefixes = result.get(asn);
    if (prefixes) {
      ordered.set(asn, prefixes);
    }
  }
  return ordered;
}

export class CachedFetcher implements Fetcher {
  private readonly versionMerge: VersionMergePolicy;

  constructor(
    private readonly fetcher: Fetcher,
    private readonly storage: Storage,
    options: CachedFetcherOptions = {}
  ) {
    this.versionMerge = options.versionMerge ?? 'overwrite';
  }

  async fetch(ipv4: boolean, ipv6: boolean, asNumbers: readonly string[]): Promise<FetchResult> {
    const result: FetchResult = new Map();
    const uncached: string[] = [];
    const previous = new Map<string, AsRecord>();

    for (const asn of asNumbers) {
      const lookup = await this.lookup(asn, ipv4, ipv6);
      if (lookup.status === 'hit') {
        metrics.incrementCacheHit();
        result.set(asn, selectPrefixes(lookup.record, ipv4, ipv6));
        continue;
      }

      metrics.incrementCacheMiss();
      if (lookup.status === 'incomplete') {
        logger.debug('cache_incomplete', {
          asn,
          fetched_ipv4: lookup.record.fetchedIPv4,
          fetched_ipv6: lookup.record.fetchedIPv6
        });
        previous.set(asn, lookup.record);
      }
      uncached.push(asn);
    }

    if (uncached.length === 0) {
      return result;
    }

    const fetched = await this.fetcher.fetch(ipv4, ipv6, uncached);

    for (const [asn, prefixes] of fetched) {
      try {
        await this.storage.set(this.buildRecord(asn, prefixes, ipv4, ipv6, previous.get(asn)));
      } catch (err) {
        throw new Error(`failed to put ${asn} on cache`, { cause: err });
      }
      result.set(asn, prefixes);
    }

    return inRequestOrder(result, asNumbers);
  }

  private async lookup(asn: string, ipv4: boolean, ipv6: boolean): Promise<CacheLookup> {
    let record: AsRecord;
    try {
      record = await this.storage.get(asn);
    } catch (err) {
      if (err instanceof NotCachedError) {
        return { status: 'miss' };
      }
      throw new Error(`failed to fetch asn ${asn} from cache`, { cause: err });
    }

    if ((ipv4 && !record.fetchedIPv4) || (ipv6 && !record.fetchedIPv6)) {
      return { status: 'incomplete', record };
    }
    return { status: 'hit', record };
  }

  private buildRecord(
    asn: string,
    prefixes: AsPrefixes,
    ipv4: boolean,
    ipv6: boolean,
    previous: AsRecord | undefined
  ): AsRecordInput {
    if (this.versionMerge === 'merge' && previous) {
      return {
        asn,
        ipv4: ipv4 ? prefixes.ipv4 : previous.ipv4,
        ipv6: ipv6 ? prefixes.ipv6 : previous.ipv6,
        fetchedIPv4: ipv4 || previous.fetchedIPv4,
        fetchedIPv6: ipv6 || previous.fetchedIPv6
      };
    }

    return {
      asn,
      ipv4: prefixes.ipv4,
      ipv6: prefixes.ipv6,
      fetchedIPv4: ipv4,
      fetchedIPv6: ipv6
    };
  }
}
