import { Readable } from 'stream';
import { parseArgs, parseNumberFlag } from '../lib/cli/args';
import { main, CliIO } from '../lib/cli/main';
import { ConfigError, SourceError } from '../lib/errors';
import { CONFIG } from '../lib/config';
import { emitting, failing, FakeSource, registryOf } from './helpers/fakeSources';
import type { SourceRegistry } from '../lib/types';

const argv = (...args: string[]) => ['node', 'subsift', ...args];

describe('parseNumberFlag', () => {
  test('parses positive integers', () => {
    expect(parseNumberFlag('50', '--concurrency', { min: 1, integer: true })).toBe(50);
  });

  test('rejects non-numbers', () => {
    expect(() => parseNumberFlag('abc', '--concurrency', { min: 1 })).toThrow('Invalid --concurrency: abc');
  });

  test('rejects out-of-range values', () => {
    expect(() => parseNumberFlag('0', '--concurrency', { min: 1, integer: true })).toThrow(ConfigError);
  });

  test('honours an upper bound', () => {
    expect(parseNumberFlag('10', '--timeout', { min: 1, max: 10 })).toBe(10);
    expect(() => parseNumberFlag('11', '--timeout', { min: 1, max: 10 })).toThrow('Invalid --timeout: 11');
  });
});

describe('parseArgs', () => {
  test('defaults', () => {
    const parsed = parseArgs(argv());
    expect(parsed).toEqual({
      command: 'run',
      inputKind: 'stdin',
      input: undefined,
      all: false,
      exclude: [],
      subsOnly: false,
      flush: false,
      concurrency: CONFIG.CONCURRENCY_DEFAULT,
      timeoutSeconds: CONFIG.TIMEOUT_SECONDS_DEFAULT,
      verbosity: undefined,
      metrics: false,
    });
  });

  test('single domain', () => {
    expect(parseArgs(argv('-d', 'example.com'))).toMatchObject({ inputKind: 'domain', input: 'example.com' });
    expect(parseArgs(argv('example.com'))).toMatchObject({ inputKind: 'domain', input: 'example.com' });
  });

  test('file input, with domain taking precedence', () => {
    expect(parseArgs(argv('-f', 'roots.txt'))).toMatchObject({ inputKind: 'file', input: 'roots.txt' });
    expect(parseArgs(argv('-f', '-d', 'example.com'))).toMatchObject({ inputKind: 'domain', input: 'example.com' });
  });

  test('rejects a timeout longer than a timer can hold', () => {
    expect(parseArgs(argv('-t', '2147483'))).toMatchObject({ timeoutSeconds: 2147483 });
    expect(() => parseArgs(argv('-t', '3000000'))).toThrow('Invalid --timeout: 3000000');
  });

  test('--exclude takes one value per flag', () => {
    expect(parseArgs(argv('-e', 'wayback', '-e', 'crtsh'))).toMatchObject({ exclude: ['wayback', 'crtsh'] });
    expect(() => parseArgs(argv('-e', 'wayback', 'crtsh', 'example.com'))).toThrow(
      'Expected at most one input, got: crtsh example.com',
    );
  });

  test('value flags in both forms', () => {
    const parsed = parseArgs(argv('-c', '10', '--timeout=2.5', '-e', 'wayback', '--exclude=crtsh,c99', '-v', 'debug'));
    expect(parsed).toMatchObject({
      concurrency: 10,
      timeoutSeconds: 2.5,
      exclude: ['wayback', 'crtsh', 'c99'],
      verbosity: 'debug',
    });
  });

  test('boolean flags', () => {
    expect(parseArgs(argv('-a', '--subs-only', '--flush', '--metrics', 'example.com'))).toMatchObject({
      all: true,
      subsOnly: true,
      flush: true,
      metrics: true,
    });
  });

  test('commands', () => {
    expect(parseArgs(argv('-h')).command).toBe('help');
    expect(parseArgs(argv('--version')).command).toBe('version');
    expect(parseArgs(argv('-l')).command).toBe('list-sources');
  });

  test('configuration errors', () => {
    expect(() => parseArgs(argv('--bogus'))).toThrow('Unknown flag: --bogus');
    expect(() => parseArgs(argv('-c'))).toThrow('Missing value for --concurrency');
    expect(() => parseArgs(argv('-c', 'many'))).toThrow('Invalid --concurrency: many');
    expect(() => parseArgs(argv('-t', '0'))).toThrow('Invalid --timeout: 0');
    expect(() => parseArgs(argv('-v', 'loud'))).toThrow(ConfigError);
    expect(() => parseArgs(argv('-f'))).toThrow('--file needs an input');
    expect(() => parseArgs(argv('a.com', 'b.com'))).toThrow('Expected at most one input');
    expect(() => parseArgs(argv('--flush=yes'))).toThrow('--flush does not take a value');
  });
});

describe('main', () => {
  function harness(registry: SourceRegistry, stdinText = '') {
    const out: string[] = [];
    const err: string[] = [];
    const io: CliIO = {
      stdout: (line) => out.push(line),
      stderr: (text) => err.push(text),
      stdin: Readable.from([stdinText]),
      registry,
    };
    return { io, out, err };
  }

  const names = () => ['www.example.com', 'example.com', 'other.org', 'www.example.com'];

  test('writes filtered, deduplicated names for a single domain', async () => {
    const h = harness(registryOf([emitting('a', names), emitting('b', names)]));
    expect(await main(argv('-d', 'example.com'), h.io)).toBe(0);
    expect(h.out).toEqual(['www.example.com', 'example.com']);
  });

  test('--subs-only drops the root itself', async () => {
    const h = harness(registryOf([emitting('a', names)]));
    expect(await main(argv('--subs-only', 'example.com'), h.io)).toBe(0);
    expect(h.out).toEqual(['www.example.com']);
  });

  test('--flush keeps duplicates', async () => {
    const h = harness(registryOf([emitting('a', names)]));
    await main(argv('--flush', 'example.com'), h.io);
    expect(h.out).toEqual(['www.example.com', 'example.com', 'www.example.com']);
  });

  test('reads roots from stdin', async () => {
    const source = emitting('a', (host) => [`www.${host}`]);
    const h = harness(registryOf([source]), 'example.com\n\nexample.org\nexample.com\n');
    expect(await main(argv(), h.io)).toBe(0);
    expect(source.calls.sort()).toEqual(['example.com', 'example.org']);
    expect(h.out.sort()).toEqual(['www.example.com', 'www.example.org']);
  });

  test('only uses keyed sources with --all, and honours exclusions', async () => {
    const keyed = emitting('keyed', () => ['k.example.com']);
    const excluded = emitting('skipme', () => ['s.example.com']);
    const h = harness(registryOf([emitting('free', () => ['f.example.com']), excluded], [keyed]));

    await main(argv('-a', '-e', 'skipme', 'example.com'), h.io);

    expect(h.out.sort()).toEqual(['f.example.com', 'k.example.com']);
    expect(excluded.calls).toEqual([]);
  });

  test('exits 0 when every source fails', async () => {
    const h = harness(registryOf([failing('a', new SourceError('a', 'example.com', 'empty result'))]));
    expect(await main(argv('example.com'), h.io)).toBe(0);
    expect(h.out).toEqual([]);
  });

  test('exits 1 on a bad flag value without running anything', async () => {
    const source = new FakeSource('a', async () => []);
    const h = harness(registryOf([source]));
    expect(await main(argv('-c', 'abc', 'example.com'), h.io)).toBe(1);
    expect(h.err).toEqual(['error: Invalid --concurrency: abc\n']);
    expect(source.calls).toEqual([]);
  });

  test('exits 1 when the input file cannot be read', async () => {
    const h = harness(registryOf([]));
    expect(await main(argv('-f', '/nonexistent/roots.txt'), h.io)).toBe(1);
    expect(h.err[0]).toMatch(/^error: tried to read filepath \/nonexistent\/roots\.txt got /);
  });

  test('lists sources', async () => {
    const h = harness(registryOf([emitting('free1', () => [])], [emitting('keyed1', () => [])]));
    expect(await main(argv('--list-sources'), h.io)).toBe(0);
    expect(h.out).toEqual(['free1\tfree', 'keyed1\tkeyed']);
  });

  test('prints the version', async () => {
    const h = harness(registryOf([]));
    expect(await main(argv('-V'), h.io)).toBe(0);
    expect(h.out).toEqual(['0.1.0']);
  });

  test('--metrics dumps run metrics to stderr', async () => {
    const h = harness(registryOf([emitting('metered', () => ['www.example.com'])]));
    await main(argv('--metrics', 'example.com'), h.io);
    expect(h.err.join('')).toContain('subsift_tasks_total{source="metered",outcome="ok"} 1');
  });
});
