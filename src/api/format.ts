/**
 * Request parsing and response rendering for prefix lookups
 */

import { FetchResult } from '../types/prefixes';

const AS_NUMBER_PATTERN = /^(?:[Aa][Ss])?(\d+)$/;

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

/**
 * Strict boolean parsing for query parameters; null when unrecognised
 */
export function parseBoolean(value: string): boolean | null {
  if (TRUE_VALUES.has(value)) {
    return true;
  }
  if (FALSE_VALUES.has(value)) {
    return false;
  }
  return null;
}

/**
 * "AS13335" / "as13335" / "13335" -> "13335"; null for anything else
 */
export function normalizeAsNumber(value: string): string | null {
  const match = AS_NUMBER_PATTERN.exec(value.trim());
  return match ? match[1] : null;
}

/**
 * Split "13335:AS15169" into normalized AS numbers. Returns the first
 * invalid token instead when there is one.
 */
export function parseAsList(value: string): { asNumbers: string[] } | { invalid: string } {
  const asNumbers: string[] = [];
  for (const token of value.split(':')) {
    const asn = normalizeAsNumber(token);
    if (asn === null) {
      return { invalid: token };
    }
    asNumbers.push(asn);
  }
  return { asNumbers };
}

export type PrefixDocument = Record<string, { ipv4: string[]; ipv6: string[] }>;

export function toJsonDocument(result: FetchResult): PrefixDocument {
  const document: PrefixDocument = {};
  for (const [asn, prefixes] of result) {
    document[asn] = { ipv4: [...prefixes.ipv4], ipv6: [...prefixes.ipv6] };
  }
  return document;
}

/**
 * Every IPv4 block of every AS, then every IPv6 block, joined by separator
 */
export function toPlainText(result: FetchResult, separator: string): string {
  const ipv4: string[] = [];
  const ipv6: string[] = [];
  for (const prefixes of result.values()) {
    ipv4.push(...prefixes.ipv4);
    ipv6.push(...prefixes.ipv6);
  }
  return [...ipv4, ...ipv6].join(separator);
}

export function wantsJson(accept: string | undefined): boolean {
  return (accept ?? '').toLowerCase() === 'application/json';
}
