/**
 * Shared shapes for AS prefix lookups
 */

export type IpVersion = 'ipv4' | 'ipv6';

export const IP_VERSIONS: readonly IpVersion[] = ['ipv4', 'ipv6'];

/**
 * Network blocks announced by one AS, in registry response order.
 * A version that was not requested is an empty array.
 */
export interface AsPrefixes {
  ipv4: string[];
  ipv6: string[];
}

/**
 * AS number -> announced blocks, in request order
 */
export type FetchResult = Map<string, AsPrefixes>;

/**
 * Anything that can resolve a batch of AS numbers to their network blocks
 */
export interface Fetcher {
  fetch(ipv4: boolean, ipv6: boolean, asNumbers: readonly string[]): Promise<FetchResult>;
}

export function emptyPrefixes(): AsPrefixes {
  return { ipv4: [], ipv6: [] };
}
