import type { z } from 'zod';
import type { HttpClient } from '../net/httpClient';
import type { Batch } from '../types';
import { SourceError } from '../errors';
import logger from '../logger';

/** Turns a provider payload (parsed JSON, or the raw body for text sources) into names. */
export type PayloadSchema = z.ZodType<string[], z.ZodTypeDef, unknown>;

export interface FetchSourceOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
  format?: 'json' | 'text';
}

/**
 * Common wrapper for passive source fetches: one request, payload validation
 * and normalisation into a single batch.
 *
 * Network errors, bad statuses, payloads that do not match `schema` and empty
 * results all reject with `SourceError`. An abort is rethrown untouched so the
 * runner can report it as the timeout it is.
 */
export async function fetchSource(
  client: HttpClient,
  url: string,
  schema: PayloadSchema,
  host: string,
  sourceName: string,
  opts?: FetchSourceOptions,
): Promise<Batch> {
  logger.trace({ source: sourceName, host }, 'fetching data');
  let data: unknown;
  try {
    const req = { headers: opts?.headers, signal: opts?.signal };
    data = opts?.format === 'text' ? await client.getText(url, req) : await client.getJson(url, req);
  } catch (err) {
    if (opts?.signal?.aborted) throw err;
    throw new SourceError(sourceName, host, err instanceof Error ? err.message : String(err));
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new SourceError(sourceName, host, 'unexpected payload');
  }
  return toBatch(sourceName, host, parsed.data);
}

/**
 * Trim, lower-case and deduplicate a raw name list. An empty list is the same
 * failure as an unreachable provider.
 */
export function toBatch(sourceName: string, host: string, names: string[]): Batch {
  const subs = new Set<string>();
  for (const name of names) {
    const clean = name.trim().toLowerCase();
    if (clean) subs.add(clean);
  }
  if (subs.size === 0) {
    throw new SourceError(sourceName, host, 'empty result');
  }
  logger.info({ source: sourceName, host, count: subs.size }, 'discovered results');
  return Array.from(subs);
}

export default fetchSource;
