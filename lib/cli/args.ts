import { CONFIG } from '../config';
import { ConfigError } from '../errors';
import { isLogLevel, LOG_LEVELS } from '../logger';
import { MAX_TIMEOUT_MS } from '../net/timeout';
import type { LogLevel } from '../logger';

export type CliCommand = 'run' | 'help' | 'version' | 'list-sources';
export type InputKind = 'domain' | 'file' | 'stdin';

export interface ParsedArgs {
  command: CliCommand;
  inputKind: InputKind;
  input?: string;
  all: boolean;
  exclude: string[];
  subsOnly: boolean;
  flush: boolean;
  concurrency: number;
  timeoutSeconds: number;
  verbosity?: LogLevel;
  metrics: boolean;
}

const SHORT_FLAGS: Record<string, string> = {
  '-d': '--domain',
  '-f': '--file',
  '-a': '--all',
  '-e': '--exclude',
  '-c': '--concurrency',
  '-t': '--timeout',
  '-v': '--verbosity',
  '-l': '--list-sources',
  '-h': '--help',
  '-V': '--version',
};

const BOOLEAN_FLAGS = new Set(['--domain', '--file', '--all', '--subs-only', '--flush', '--metrics', '--list-sources', '--help', '--version']);
const VALUE_FLAGS = new Set(['--exclude', '--concurrency', '--timeout', '--verbosity']);

export function parseNumberFlag(value: string, flag: string, opts: { min: number; max?: number; integer?: boolean }): number {
  const n = Number(value);
  const max = opts.max ?? Infinity;
  if (!value.trim() || !Number.isFinite(n) || (opts.integer && !Number.isInteger(n)) || n < opts.min || n > max) {
    throw new ConfigError(`Invalid ${flag}: ${value}`);
  }
  return n;
}

/** Split `--flag=value` and expand short aliases. */
function tokenize(argv: string[]): Array<{ flag?: string; value?: string; positional?: string }> {
  return argv.map((arg) => {
    if (arg === '-' || !arg.startsWith('-')) return { positional: arg };
    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const flag = SHORT_FLAGS[name] ?? name;
    return eq === -1 ? { flag } : { flag, value: arg.slice(eq + 1) };
  });
}

/**
 * Parse `process.argv`. `-f` reads the positional input as a file of roots,
 * otherwise it is a single domain; `-d` wins over `-f`. Without an input,
 * roots come from standard input.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const tokens = tokenize(argv.slice(2));
  const flags = new Set<string>();
  const exclude: string[] = [];
  const positionals: string[] = [];
  let concurrency = CONFIG.CONCURRENCY_DEFAULT;
  let timeoutSeconds = CONFIG.TIMEOUT_SECONDS_DEFAULT;
  let verbosity: LogLevel | undefined;

  for (let i = 0; i < tokens.length; i++) {
    const { flag, positional } = tokens[i];
    if (positional !== undefined) {
      positionals.push(positional);
      continue;
    }
    if (!flag) continue;

    if (BOOLEAN_FLAGS.has(flag)) {
      if (tokens[i].value !== undefined) throw new ConfigError(`${flag} does not take a value`);
      flags.add(flag);
      continue;
    }
    if (!VALUE_FLAGS.has(flag)) {
      throw new ConfigError(`Unknown flag: ${flag}`);
    }

    let value = tokens[i].value;
    if (value === undefined) {
      const next = tokens[i + 1];
      if (next?.positional === undefined) throw new ConfigError(`Missing value for ${flag}`);
      value = next.positional;
      i++;
    }

    switch (flag) {
      case '--exclude':
        exclude.push(...value.split(',').map((s) => s.trim()).filter(Boolean));
        break;
      case '--concurrency':
        concurrency = parseNumberFlag(value, flag, { min: 1, integer: true });
        break;
      case '--timeout':
        timeoutSeconds = parseNumberFlag(value, flag, { min: Number.MIN_VALUE, max: Math.floor(MAX_TIMEOUT_MS / 1000) });
        break;
      case '--verbosity':
        if (!isLogLevel(value)) {
          throw new ConfigError(`Invalid --verbosity: ${value} (expected one of ${LOG_LEVELS.join(', ')})`);
        }
        verbosity = value;
        break;
    }
  }

  if (positionals.length > 1) {
    throw new ConfigError(`Expected at most one input, got: ${positionals.join(' ')}`);
  }
  const input = positionals[0];

  let command: CliCommand = 'run';
  if (flags.has('--help')) command = 'help';
  else if (flags.has('--version')) command = 'version';
  else if (flags.has('--list-sources')) command = 'list-sources';

  let inputKind: InputKind = 'stdin';
  if (flags.has('--domain')) inputKind = 'domain';
  else if (flags.has('--file')) inputKind = 'file';
  else if (input !== undefined) inputKind = 'domain';

  if (command === 'run' && inputKind !== 'stdin' && input === undefined) {
    throw new ConfigError(`--${inputKind} needs an input`);
  }

  return {
    command,
    inputKind,
    input,
    all: flags.has('--all'),
    exclude,
    subsOnly: flags.has('--subs-only'),
    flush: flags.has('--flush'),
    concurrency,
    timeoutSeconds,
    verbosity,
    metrics: flags.has('--metrics'),
  };
}

export function getHelpText(): string {
  return `
subsift - gather subdomains from passive sources

USAGE:
  subsift -d example.com
  subsift -f roots.txt
  cat roots.txt | subsift

OPTIONS:
  -d, --domain              Treat the input as a single domain
  -f, --file                Treat the input as a newline-delimited file of domains
  -a, --all                 Also use sources that need an API key
  -e, --exclude <names>     Skip sources: one name or a comma-separated list
                            per flag; repeat the flag for more
      --subs-only           Only keep names strictly under a root
      --flush               Print names as they arrive, without deduplication
  -c, --concurrency <n>     Tasks in flight at once (default ${CONFIG.CONCURRENCY_DEFAULT})
  -t, --timeout <seconds>   Per-request timeout (default ${CONFIG.TIMEOUT_SECONDS_DEFAULT})
  -v, --verbosity <level>   Log level: ${LOG_LEVELS.join(', ')}
      --metrics             Print run metrics to stderr when done
  -l, --list-sources        List available sources
  -h, --help                Show this help
  -V, --version             Show version

ENVIRONMENT:
  C99_KEY, SECURITYTRAILS_KEY   API keys for the keyed sources (used with --all)
  LOG_LEVEL                     Default log level (warn)
`;
}
