/**
 * Lookup failure classification for the HTTP layer
 *
 * Core errors carry a kind; anything without one is an internal error.
 */

import { AsnLookupErrorKind, isAsnLookupError } from '../whois/errors';

export type LookupErrorType = AsnLookupErrorKind | 'routing_error' | 'internal_error';

export function classifyError(err: unknown): LookupErrorType {
  return isAsnLookupError(err) ? err.kind : 'internal_error';
}

/**
 * Get HTTP status code for error type
 */
export function getStatusCode(errorType: LookupErrorType): number {
  switch (errorType) {
    case 'routing_error':
      return 400;
    case 'not_found':
      return 404;
    case 'connection_error':
    case 'protocol_error':
      return 502; // registry unreachable or answered garbage
    default:
      return 500;
  }
}
