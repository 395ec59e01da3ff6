/**
 * Typed failures for AS lookups
 *
 * Every failure the core can raise maps to one of these kinds:
 * - connection_error: dial/read/write failure or deadline expiry
 * - protocol_error: server reply could not be parsed
 * - not_found: registry answered "D" for an AS number
 * - not_cached: storage has no fresh record (internal, never surfaced)
 * - storage_not_found: unknown storage backend name
 */

export type AsnLookupErrorKind =
  | 'connection_error'
  | 'protocol_error'
  | 'not_found'
  | 'not_cached'
  | 'storage_not_found';

export abstract class AsnLookupError extends Error {
  abstract readonly kind: AsnLookupErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConnectionError extends AsnLookupError {
  readonly kind = 'connection_error';
}

/**
 * Raised when a dial, read or write exceeds its deadline
 */
export class TimeoutError extends ConnectionError {
  constructor(
    message: string,
    readonly timeoutMs: number
  ) {
    super(message);
  }
}

export class ProtocolError extends AsnLookupError {
  readonly kind = 'protocol_error';

  constructor(
    message: string,
    readonly asn: string,
    readonly token?: string
  ) {
    super(message);
  }
}

export class NotFoundError extends AsnLookupError {
  readonly kind = 'not_found';

  constructor(readonly asn: string) {
    super(`as ${asn} not found`);
  }
}

export class NotCachedError extends AsnLookupError {
  readonly kind = 'not_cached';

  constructor(readonly asn: string) {
    super(`as ${asn} not in cache`);
  }
}

export class StorageNotFoundError extends AsnLookupError {
  readonly kind = 'storage_not_found';

  constructor(readonly storageName: string) {
    super(`storage type "${storageName}" not found`);
  }
}

export function isAsnLookupError(err: unknown): err is AsnLookupError {
  return err instanceof AsnLookupError;
}
