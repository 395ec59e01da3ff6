/**
 * Cache store contract
 */

/**
 * Cached snapshot of one AS. fetchedIPv4/fetchedIPv6 record which versions
 * were requested when the snapshot was taken, not whether blocks were found.
 */
export interface AsRecord {
  asn: string;
  ipv4: string[];
  ipv6: string[];
  fetchedIPv4: boolean;
  fetchedIPv6: boolean;
  /** Epoch milliseconds of the last set() */
  insertedAt: number;
}

export type AsRecordInput = Omit<AsRecord, 'insertedAt'>;

export interface Storage {
  /**
   * Resolve the fresh record for asn; rejects with NotCachedError when it is
   * absent or older than the ttl
   */
  get(asn: string): Promise<AsRecord>;

  /**
   * Insert or replace the record, stamping insertedAt with the current time
   */
  set(record: AsRecordInput): Promise<void>;

  delete(asn: string): Promise<boolean>;

  /** Number of stored records, expired ones included until they are read */
  size(): Promise<number>;

  /** Drop every expired record, returning how many were removed */
  purgeExpired(): Promise<number>;

  close(): Promise<void>;
}

export interface StorageOptions {
  /** Backend name; '', 'default' and 'memory' select the in-memory store */
  name: string;
  ttlMs: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export type StorageFactory = (options: StorageOptions) => Storage | Promise<Storage>;
