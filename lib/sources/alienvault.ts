import { z } from 'zod';
import type { HttpClient } from '../net/httpClient';
import type { Batch, DataSource } from '../types';
import { fetchSource } from './fetchSource';

const payload = z
  .object({ passive_dns: z.array(z.object({ hostname: z.string().nullish() })).nullish() })
  .transform((r) => (r.passive_dns ?? []).flatMap((row) => (row.hostname ? [row.hostname] : [])));

export class AlienVault implements DataSource {
  readonly name = 'alienvault';

  constructor(private readonly client: HttpClient) {}

  buildUrl(host: string): string {
    return `https://otx.alienvault.com/api/v1/indicators/domain/${encodeURIComponent(host)}/passive_dns`;
  }

  fetch(host: string, signal: AbortSignal): Promise<Batch> {
    return fetchSource(this.client, this.buildUrl(host), payload, host, this.name, { signal });
  }
}

export default AlienVault;
