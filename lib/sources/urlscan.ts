import { z } from 'zod';
import type { HttpClient } from '../net/httpClient';
import type { Batch, DataSource } from '../types';
import { fetchSource } from './fetchSource';

const optionalHost = z.object({ domain: z.string().nullish() }).nullish();

const payload = z
  .object({ results: z.array(z.object({ page: optionalHost, task: optionalHost })).nullish() })
  .transform((r) => {
    const names: string[] = [];
    for (const result of r.results ?? []) {
      const host = result.page?.domain || result.task?.domain;
      if (host) names.push(host);
    }
    return names;
  });

export class UrlScan implements DataSource {
  readonly name = 'urlscan';

  constructor(private readonly client: HttpClient) {}

  buildUrl(host: string): string {
    return `https://urlscan.io/api/v1/search/?q=domain:${encodeURIComponent(host)}`;
  }

  fetch(host: string, signal: AbortSignal): Promise<Batch> {
    return fetchSource(this.client, this.buildUrl(host), payload, host, this.name, { signal });
  }
}

export default UrlScan;
