/**
 * WHOIS ROUTE REGISTRY CODEC
 *
 * Frames outgoing prefix queries and parses the registry's line-oriented
 * replies. One ResponseParser handles exactly one AS/version query:
 *
 *   start --"A..."--> collecting --"C"--> done
 *     |                  |
 *     +------"D" / bad line / bad token--> failed
 *
 * A "C" seen in start completes with no blocks.
 */

import * as ipaddr from 'ipaddr.js';
import { IpVersion } from '../types/prefixes';
import { NotFoundError, ProtocolError } from './errors';

export const ENABLE_MULTI_COMMAND = '!!\n';
export const EXIT_COMMAND = 'exit\n';

const NOT_FOUND_MARKER = 'D';
const COMPLETE_MARKER = 'C';
const HEADER_PREFIX = 'A';

/**
 * Build the query line for one AS number and IP version
 */
export function buildQueryCommand(asn: string, version: IpVersion): string {
  switch (version) {
    case 'ipv4':
      return `!gAS${asn}\n`;
    case 'ipv6':
      return `!6AS${asn}\n`;
    default: {
      const unknown: never = version;
      throw new Error(`unknown ip protocol version ${String(unknown)}`);
    }
  }
}

/**
 * Parse a CIDR token for the given family and return its canonical form
 * (network address + prefix length). Returns null when the token is not a
 * valid prefix of that family.
 */
export function parseNetworkBlock(token: string, version: IpVersion): string | null {
  const slash = token.indexOf('/');
  if (slash <= 0) {
    return null;
  }

  try {
    if (version === 'ipv4') {
      if (!ipaddr.IPv4.isValidFourPartDecimal(token.slice(0, slash))) {
        return null;
      }
      const [, prefixLength] = ipaddr.IPv4.parseCIDR(token);
      const network = ipaddr.IPv4.networkAddressFromCIDR(token);
      return `${network.toString()}/${prefixLength}`;
    }

    const [, prefixLength] = ipaddr.IPv6.parseCIDR(token);
    const network = ipaddr.IPv6.networkAddressFromCIDR(token);
    return `${network.toRFC5952String()}/${prefixLength}`;
  } catch {
    return null;
  }
}

export type ParserState = 'start' | 'collecting' | 'done' | 'failed';

/**
 * Incremental parser for the reply to a single !g / !6 query.
 *
 * feed() returns true once the reply is complete; it throws NotFoundError or
 * ProtocolError when the reply fails, after which the parser is terminal.
 */
export class ResponseParser {
  private currentState: ParserState = 'start';
  private readonly blocks: string[] = [];

  constructor(
    readonly asn: string,
    readonly version: IpVersion
  ) {}

  get state(): ParserState {
    return this.currentState;
  }

  feed(line: string): boolean {
    if (this.currentState === 'done' || this.currentState === 'failed') {
      throw new Error(`response for as ${this.asn} already ${this.currentState}`);
    }

    if (line === NOT_FOUND_MARKER) {
      this.currentState = 'failed';
      throw new NotFoundError(this.asn);
    }
    if (line === COMPLETE_MARKER) {
      this.currentState = 'done';
      return true;
    }

    if (this.currentState === 'start') {
      if (line.length === 0) {
        this.currentState = 'failed';
        throw new ProtocolError(`empty response for as ${this.asn}`, this.asn);
      }
      if (!line.startsWith(HEADER_PREFIX)) {
        this.currentState = 'failed';
        throw new ProtocolError(`received invalid response for as ${this.asn}`, this.asn);
      }
      this.currentState = 'collecting';
      return false;
    }

    for (const token of line.split(' ')) {
      const block = parseNetworkBlock(token, this.version);
      if (block === null) {
        this.currentState = 'failed';
        throw new ProtocolError(`failed to parse network ${token} for as ${this.asn}`, this.asn, token);
      }
      this.blocks.push(block);
    }
    return false;
  }

  /**
   * Blocks collected so far, in server order
   */
  result(): string[] {
    return [...this.blocks];
  }
}
