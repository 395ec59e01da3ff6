import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { createServer } from 'http';
import { AppConfig } from '../../src/config';
import { CommandIO, FETCH_FAILED_EXIT_CODE, createProgram, formatFetchResult } from '../../src/cli/commands';
import { configureLogger } from '../../src/observability/logger';
import { FakeWhoisServer, findClosedPort, startFakeWhoisServer } from '../helpers/fake-whois-server';

interface RecordingIO extends CommandIO {
  output: string[];
  exitCodes: number[];
  served: AppConfig[];
}

function recordingIO(env: Record<string, string | undefined> = {}): RecordingIO {
  const io: RecordingIO = {
    output: [],
    exitCodes: [],
    served: [],
    env: { LOG_LEVEL: 'error', ...env },
    stdout: (text) => {
      io.output.push(text);
    },
    serve: async (config) => {
      io.served.push(config);
      return { server: createServer(), shutdown: async () => undefined };
    },
    setExitCode: (code) => {
      io.exitCodes.push(code);
    }
  };
  return io;
}

async function run(io: CommandIO, args: string[]): Promise<void> {
  await createProgram(io).parseAsync(args, { from: 'user' });
}

describe('formatFetchResult', () => {
  it('should print each AS with one indented line per version', () => {
    const text = formatFetchResult(new Map([
      ['64500', { ipv4: ['192.0.2.0/24', '198.51.100.0/24'], ipv6: ['2001:db8::/32'] }],
      ['64501', { ipv4: [], ipv6: [] }]
    ]));

    expect(text).toBe('AS64500\n  192.0.2.0/24,198.51.100.0/24\n  2001:db8::/32\nAS64501\n  \n  \n');
  });

  it('should print nothing for an empty result', () => {
    expect(formatFetchResult(new Map())).toBe('');
  });
});

describe('fetch command', () => {
  let registry: FakeWhoisServer;

  beforeEach(async () => {
    registry = await startFakeWhoisServer({
      '!gAS1234': 'A11\n1.2.3.0/24\nC\n',
      '!6AS1234': 'A14\n2001:db8::/32\nC\n'
    });
  });

  afterEach(async () => {
    await registry.close();
    configureLogger({ level: 'error', format: 'plain' });
    vi.restoreAllMocks();
  });

  it('should print the networks of the requested AS numbers', async () => {
    const io = recordingIO({ WHOIS_HOST: registry.host, WHOIS_PORT: String(registry.port) });

    await run(io, ['fetch', 'AS1234']);

    expect(io.output).toEqual(['AS1234\n  1.2.3.0/24\n  2001:db8::/32\n']);
    expect(io.exitCodes).toEqual([]);
  });

  it('should let flags pick the registry and skip a version', async () => {
    const io = recordingIO();

    await run(io, ['--whois-host', registry.host, '--whois-port', String(registry.port), 'get', '--no-ipv6', '1234']);

    expect(io.output).toEqual(['AS1234\n  1.2.3.0/24\n  \n']);
    expect(registry.commands).not.toContain('!6AS1234');
  });

  it('should fall back to the environment for version selection', async () => {
    const io = recordingIO({
      WHOIS_HOST: registry.host,
      WHOIS_PORT: String(registry.port),
      FETCH_IPV4: 'false'
    });

    await run(io, ['fetch', '1234']);

    expect(io.output).toEqual(['AS1234\n  \n  2001:db8::/32\n']);
  });

  it('should set the failure exit code when the lookup fails', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const io = recordingIO({ WHOIS_HOST: registry.host, WHOIS_PORT: String(registry.port) });

    await run(io, ['fetch', '1234', '9999']);

    expect(io.output).toEqual([]);
    expect(io.exitCodes).toEqual([FETCH_FAILED_EXIT_CODE]);
    expect(errors).toHaveBeenCalledWith('[error] fetch_failed ipv4=true ipv6=true error="as 9999 not found"');
  });

  it('should set the failure exit code when the registry is unreachable', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const io = recordingIO({ WHOIS_HOST: '127.0.0.1', WHOIS_PORT: String(await findClosedPort()) });

    await run(io, ['fetch', '1234']);

    expect(io.exitCodes).toEqual([10]);
  });

  it('should reject a malformed AS number before connecting', async () => {
    const io = recordingIO({ WHOIS_HOST: registry.host, WHOIS_PORT: String(registry.port) });

    await expect(run(io, ['fetch', '1234', 'AS-EXAMPLE'])).rejects.toThrow('invalid AS number AS-EXAMPLE');
    expect(registry.connections).toBe(0);
  });
});

describe('serve command', () => {
  afterEach(() => {
    configureLogger({ level: 'error', format: 'plain' });
  });

  it('should layer flags over the environment', async () => {
    const io = recordingIO({ LISTEN_PORT: '9000', STORAGE_TTL: '1h', WHOIS_HOST: 'whois.example.test' });

    await run(io, ['serve', '--listen', '127.0.0.1', '--port', '8181', '--storage-ttl', '30m']);

    expect(io.served).toHaveLength(1);
    expect(io.served[0].listen).toMatchObject({ address: '127.0.0.1', port: 8181 });
    expect(io.served[0].storage).toMatchObject({ name: '', ttlMs: 1_800_000 });
    expect(io.served[0].whois.host).toBe('whois.example.test');
  });

  it.each(['run', 'daemon'])('should accept the %s alias', async (alias) => {
    const io = recordingIO();

    await run(io, [alias]);

    expect(io.served[0].listen).toMatchObject({ address: '0.0.0.0', port: 8080 });
  });

  it('should switch on debug logging', async () => {
    const io = recordingIO();

    await run(io, ['--debug', 'serve']);

    expect(io.served[0].log.level).toBe('debug');
  });

  it('should reject a bad port', async () => {
    const io = recordingIO();

    await expect(run(io, ['serve', '--port', 'http'])).rejects.toThrow('--port must be a port number (got "http")');
    expect(io.served).toHaveLength(0);
  });

  it('should pass the storage backend name through', async () => {
    const io = recordingIO();

    await run(io, ['serve', '--storage-name', 'memcache']);

    expect(io.served[0].storage.name).toBe('memcache');
  });
});
