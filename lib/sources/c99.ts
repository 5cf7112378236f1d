import { z } from 'zod';
import type { HttpClient } from '../net/httpClient';
import type { Batch, CredentialProvider, DataSource } from '../types';
import { MissingCredentialError } from '../errors';
import { fetchSource } from './fetchSource';

export const C99_KEY = 'C99_KEY';

const payload = z
  .object({ subdomains: z.array(z.object({ subdomain: z.string() })).nullish() })
  .transform((r) => (r.subdomains ?? []).map((s) => s.subdomain));

/**
 * C99 subdomain finder. Needs `C99_KEY`, read when the task runs.
 */
export class C99 implements DataSource {
  readonly name = 'c99';

  constructor(
    private readonly client: HttpClient,
    private readonly credentials: CredentialProvider,
  ) {}

  buildUrl(host: string, apiKey: string): string {
    return `https://api.c99.nl/subdomainfinder?key=${encodeURIComponent(apiKey)}&domain=${encodeURIComponent(host)}&json`;
  }

  async fetch(host: string, signal: AbortSignal): Promise<Batch> {
    const apiKey = this.credentials.get(C99_KEY);
    if (!apiKey) throw new MissingCredentialError(this.name, C99_KEY);
    return fetchSource(this.client, this.buildUrl(host, apiKey), payload, host, this.name, { signal });
  }
}

export default C99;
