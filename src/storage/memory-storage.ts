/**
 * In-memory cache store
 *
 * Records live for the process lifetime. Expiry is evaluated when a record is
 * read (or by purgeExpired); an expired record is deleted on that read so it
 * stays a miss afterwards.
 */

import { logger } from '../observability/logger';
import { metrics } from '../observability/metrics';
import { Mutex } from '../util/mutex';
import { NotCachedError } from '../whois/errors';
import { AsRecord, AsRecordInput, Storage, StorageOptions } from './types';

function copyRecord(record: AsRecord): AsRecord {
  return { ...record, ipv4: [...record.ipv4], ipv6: [...record.ipv6] };
}

export class MemoryStorage implements Storage {
  private readonly records = new Map<string, AsRecord>();
  private readonly lock = new Mutex();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: Pick<StorageOptions, 'ttlMs' | 'now'>) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get(asn: string): Promise<AsRecord> {
    return this.lock.runExclusive(() => {
      logger.debug('cache_lookup', { asn });
      const record = this.records.get(asn);
      if (!record) {
        logger.debug('cache_miss', { asn });
        throw new NotCachedError(asn);
      }

      if (this.isExpired(record)) {
        logger.info('cache_ttl_expired', { asn, inserted_at: new Date(record.insertedAt).toISOString() });
        this.records.delete(asn);
        metrics.incrementCacheExpired();
        throw new NotCachedError(asn);
      }

      return copyRecord(record);
    });
  }

  set(input: AsRecordInput): Promise<void> {
    return this.lock.runExclusive(() => {
      this.records.set(input.asn, copyRecord({ ...input, insertedAt: this.now() }));
    });
  }

  delete(asn: string): Promise<boolean> {
    return this.lock.runExclusive(() => this.records.delete(asn));
  }

  size(): Promise<number> {
    return this.lock.runExclusive(() => this.records.size);
  }

  purgeExpired(): Promise<number> {
    return this.lock.runExclusive(() => {
      let purged = 0;
      for (const [asn, record] of this.records) {
        if (this.isExpired(record)) {
          this.records.delete(asn);
          purged++;
        }
      }
      return purged;
    });
  }

  close(): Promise<void> {
    return this.lock.runExclusive(() => {
      this.records.clear();
    });
  }

  private isExpired(record: AsRecord): boolean {
    return this.now() - record.insertedAt > this.ttlMs;
  }
}
