import { describe, it, expect } from 'vitest';
import {
  buildQueryCommand,
  parseNetworkBlock,
  ResponseParser,
  ENABLE_MULTI_COMMAND,
  EXIT_COMMAND
} from '../../src/whois/codec';
import { NotFoundError, ProtocolError } from '../../src/whois/errors';

describe('buildQueryCommand', () => {
  it('should frame ipv4 queries with !g', () => {
    expect(buildQueryCommand('1234', 'ipv4')).toBe('!gAS1234\n');
  });

  it('should frame ipv6 queries with !6', () => {
    expect(buildQueryCommand('1234', 'ipv6')).toBe('!6AS1234\n');
  });

  it('should pass the AS number through untouched', () => {
    expect(buildQueryCommand('AS65000', 'ipv4')).toBe('!gASAS65000\n');
  });

  it('should reject unknown versions immediately', () => {
    expect(() => Reflect.apply(buildQueryCommand, undefined, ['1234', 'ipv5'])).toThrow(
      'unknown ip protocol version ipv5'
    );
  });

  it('should expose the session control commands', () => {
    expect(ENABLE_MULTI_COMMAND).toBe('!!\n');
    expect(EXIT_COMMAND).toBe('exit\n');
  });
});

describe('parseNetworkBlock', () => {
  it('should accept a plain ipv4 prefix', () => {
    expect(parseNetworkBlock('1.2.3.0/24', 'ipv4')).toBe('1.2.3.0/24');
  });

  it('should mask host bits off ipv4 prefixes', () => {
    expect(parseNetworkBlock('1.2.3.4/24', 'ipv4')).toBe('1.2.3.0/24');
  });

  it('should compress and lowercase ipv6 prefixes', () => {
    expect(parseNetworkBlock('2001:DB8:0::/32', 'ipv6')).toBe('2001:db8::/32');
  });

  it('should mask host bits off ipv6 prefixes', () => {
    expect(parseNetworkBlock('2001:db8:1:2::1/48', 'ipv6')).toBe('2001:db8:1::/48');
  });

  it('should reject prefixes of the other family', () => {
    expect(parseNetworkBlock('2001:db8::/32', 'ipv4')).toBeNull();
    expect(parseNetworkBlock('10.0.0.0/8', 'ipv6')).toBeNull();
  });

  it('should reject tokens that are not prefixes', () => {
    expect(parseNetworkBlock('not-a-cidr', 'ipv4')).toBeNull();
    expect(parseNetworkBlock('10.0.0.0', 'ipv4')).toBeNull();
    expect(parseNetworkBlock('/24', 'ipv4')).toBeNull();
    expect(parseNetworkBlock('', 'ipv4')).toBeNull();
  });

  it('should reject out-of-range prefix lengths', () => {
    expect(parseNetworkBlock('10.0.0.0/33', 'ipv4')).toBeNull();
    expect(parseNetworkBlock('2001:db8::/129', 'ipv6')).toBeNull();
  });

  it('should require four-part dotted decimal for ipv4', () => {
    expect(parseNetworkBlock('10.1/16', 'ipv4')).toBeNull();
    expect(parseNetworkBlock('010.1.1.0/24', 'ipv4')).toBeNull();
  });
});

describe('ResponseParser', () => {
  function feedAll(parser: ResponseParser, lines: string[]): boolean {
    let done = false;
    for (const line of lines) {
      done = parser.feed(line);
    }
    return done;
  }

  it('should collect blocks until C', () => {
    const parser = new ResponseParser('1234', 'ipv4');

    expect(parser.feed('A24')).toBe(false);
    expect(parser.state).toBe('collecting');
    expect(parser.feed('1.2.3.0/24 5.6.0.0/16')).toBe(false);
    expect(parser.feed('9.9.9.0/24')).toBe(false);
    expect(parser.feed('C')).toBe(true);

    expect(parser.state).toBe('done');
    expect(parser.result()).toEqual(['1.2.3.0/24', '5.6.0.0/16', '9.9.9.0/24']);
  });

  it('should complete empty when C arrives before a header', () => {
    const parser = new ResponseParser('1234', 'ipv6');
    expect(parser.feed('C')).toBe(true);
    expect(parser.result()).toEqual([]);
  });

  it('should fail with NotFoundError on D', () => {
    const parser = new ResponseParser('9999', 'ipv4');
    expect(() => parser.feed('D')).toThrow(NotFoundError);
    expect(parser.state).toBe('failed');
  });

  it('should fail with NotFoundError on D after data', () => {
    const parser = new ResponseParser('9999', 'ipv4');
    feedAll(parser, ['A10', '1.2.3.0/24']);
    expect(() => parser.feed('D')).toThrow('as 9999 not found');
  });

  it('should reject an empty first line', () => {
    const parser = new ResponseParser('1234', 'ipv4');
    expect(() => parser.feed('')).toThrow(new ProtocolError('empty response for as 1234', '1234'));
    expect(parser.state).toBe('failed');
  });

  it('should reject a header that does not start with A', () => {
    const parser = new ResponseParser('1234', 'ipv4');
    expect(() => parser.feed('%  No entries found')).toThrow('received invalid response for as 1234');
  });

  it('should name the offending token and AS on a parse failure', () => {
    const parser = new ResponseParser('4242', 'ipv4');
    parser.feed('A11');

    let caught: unknown;
    try {
      parser.feed('1.2.3.0/24 not-a-cidr');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ProtocolError);
    expect(caught).toMatchObject({
      message: 'failed to parse network not-a-cidr for as 4242',
      asn: '4242',
      token: 'not-a-cidr',
      kind: 'protocol_error'
    });
    expect(parser.state).toBe('failed');
  });

  it('should reject an empty data line', () => {
    const parser = new ResponseParser('1234', 'ipv4');
    parser.feed('A1');
    expect(() => parser.feed('')).toThrow('failed to parse network  for as 1234');
  });

  it('should refuse input once finished', () => {
    const parser = new ResponseParser('1234', 'ipv4');
    feedAll(parser, ['A1', 'C']);
    expect(() => parser.feed('1.2.3.0/24')).toThrow('response for as 1234 already done');
  });

  it('should hand out copies of the collected blocks', () => {
    const parser = new ResponseParser('1234', 'ipv4');
    feedAll(parser, ['A1', '1.2.3.0/24', 'C']);

    const first = parser.result();
    first.push('10.0.0.0/8');
    expect(parser.result()).toEqual(['1.2.3.0/24']);
  });
});
