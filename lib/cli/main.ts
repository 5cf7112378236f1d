#!/usr/bin/env node
import { ConfigError } from '../errors';
import logger, { setLogLevel } from '../logger';
import { register } from '../metrics';
import { writeResults } from '../output';
import { PostProcessor } from '../postProcessor';
import { Runner } from '../runner';
import { createRegistry, listSources } from '../sources';
import { toRootSet } from '../subdomain';
import type { SourceRegistry } from '../types';
import { getHelpText, parseArgs } from './args';
import { readInput } from './input';
import pkg from '../../package.json';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (text: string) => void;
  stdin: NodeJS.ReadableStream;
  registry?: SourceRegistry;
}

const defaultIO: CliIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (text) => process.stderr.write(text),
  stdin: process.stdin,
};

/**
 * Run the CLI and resolve the exit code. Only configuration problems fail;
 * a run where every source came back empty still exits 0.
 */
export async function main(argv: string[], io: CliIO = defaultIO): Promise<number> {
  try {
    return await execute(argv, io);
  } catch (err) {
    if (err instanceof ConfigError) {
      io.stderr(`error: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}

async function execute(argv: string[], io: CliIO): Promise<number> {
  const args = parseArgs(argv);
  if (args.verbosity) setLogLevel(args.verbosity);

  switch (args.command) {
    case 'help':
      io.stdout(getHelpText().trim());
      return 0;
    case 'version':
      io.stdout(pkg.version);
      return 0;
    case 'list-sources':
      for (const { name, kind } of listSources(io.registry ?? createRegistry())) {
        io.stdout(`${name}\t${kind}`);
      }
      return 0;
    case 'run':
      break;
  }

  const lines = await readInput(args, io.stdin);
  const roots = toRootSet(lines, (line) => logger.warn({ input: line }, 'skipping invalid root'));

  let runner = new Runner(io.registry)
    .concurrency(args.concurrency)
    .timeout(args.timeoutSeconds)
    .freeSources();
  if (args.all) runner = runner.allSources();
  runner = runner.exclude(args.exclude);

  const processor = new PostProcessor();
  if (args.subsOnly) processor.anySubdomain(roots);
  else processor.anyRoot(roots);

  const stream = runner.run(roots);
  const written = await writeResults(stream, processor, { flush: args.flush, write: io.stdout });
  logger.info({ roots: roots.size, written }, 'run complete');

  if (args.metrics) io.stderr(await register.metrics());
  return 0;
}

if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.fatal({ err }, 'unexpected failure');
      process.exitCode = 2;
    },
  );
}
