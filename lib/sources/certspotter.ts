import { z } from 'zod';
import type { HttpClient } from '../net/httpClient';
import type { Batch, DataSource } from '../types';
import { fetchSource } from './fetchSource';

const payload = z
  .array(z.object({ dns_names: z.array(z.string()).nullish() }))
  .transform((issuances) => issuances.flatMap((i) => i.dns_names ?? []).map((n) => n.replace(/^\*\./, '')));

/**
 * SSLMate CertSpotter — certificate transparency log monitor.
 * Free tier: 100 queries/hour, no API key required.
 */
export class CertSpotter implements DataSource {
  readonly name = 'certspotter';

  constructor(private readonly client: HttpClient) {}

  buildUrl(host: string): string {
    return `https://api.certspotter.com/v1/issuances?domain=${encodeURIComponent(host)}&include_subdomains=true&expand=dns_names`;
  }

  fetch(host: string, signal: AbortSignal): Promise<Batch> {
    return fetchSource(this.client, this.buildUrl(host), payload, host, this.name, { signal });
  }
}

export default CertSpotter;
