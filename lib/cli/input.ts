import { readFile } from 'fs/promises';
import { createInterface } from 'readline';
import { ConfigError } from '../errors';
import type { ParsedArgs } from './args';

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export async function readFileLines(filepath: string): Promise<string[]> {
  try {
    return splitLines(await readFile(filepath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`tried to read filepath ${filepath} got ${err instanceof Error ? err.message : String(err)}`);
  }
}

export async function readStreamLines(input: NodeJS.ReadableStream): Promise<string[]> {
  const lines: string[] = [];
  const rl = createInterface({ input, crlfDelay: Infinity });
  for await (const line of rl) lines.push(line);
  return lines;
}

/** Raw root lines for the run, picked by the input flags. */
export async function readInput(args: ParsedArgs, stdin: NodeJS.ReadableStream): Promise<string[]> {
  switch (args.inputKind) {
    case 'domain':
      return args.input === undefined ? [] : [args.input];
    case 'file':
      return args.input === undefined ? [] : readFileLines(args.input);
    case 'stdin':
      return readStreamLines(stdin);
  }
}
