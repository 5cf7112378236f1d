import { z } from 'zod';
import type { HttpClient } from '../net/httpClient';
import type { Batch, DataSource } from '../types';
import { fetchSource } from './fetchSource';

// Non-string entries have been seen in the wild; skip them rather than fail the batch.
const payload = z
  .array(z.unknown())
  .transform((entries) => entries.filter((e): e is string => typeof e === 'string'));

/**
 * AnubisDB (jldc.me) — returns a JSON array of subdomains directly.
 */
export class AnubisDb implements DataSource {
  readonly name = 'anubisdb';

  constructor(private readonly client: HttpClient) {}

  buildUrl(host: string): string {
    return `https://jldc.me/anubis/subdomains/${encodeURIComponent(host)}`;
  }

  fetch(host: string, signal: AbortSignal): Promise<Batch> {
    return fetchSource(this.client, this.buildUrl(host), payload, host, this.name, { signal });
  }
}

export default AnubisDb;
