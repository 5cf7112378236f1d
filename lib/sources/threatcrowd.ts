import { z } from 'zod';
import type { HttpClient } from '../net/httpClient';
import type { Batch, DataSource } from '../types';
import { fetchSource } from './fetchSource';

const payload = z
  .object({ subdomains: z.array(z.string()).nullish() })
  .transform((r) => r.subdomains ?? []);

/**
 * ThreatCrowd — domain report, `subdomains` is null when nothing is known.
 */
export class ThreatCrowd implements DataSource {
  readonly name = 'threatcrowd';

  constructor(private readonly client: HttpClient) {}

  buildUrl(host: string): string {
    return `https://www.threatcrowd.org/searchApi/v2/domain/report/?domain=${encodeURIComponent(host)}`;
  }

  fetch(host: string, signal: AbortSignal): Promise<Batch> {
    return fetchSource(this.client, this.buildUrl(host), payload, host, this.name, { signal });
  }
}

export default ThreatCrowd;
