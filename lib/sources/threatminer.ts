import { z } from 'zod';
import type { HttpClient } from '../net/httpClient';
import type { Batch, DataSource } from '../types';
import { fetchSource } from './fetchSource';

// The API answers `null` for unknown hosts.
const payload = z
  .object({ results: z.array(z.string()).nullish() })
  .nullable()
  .transform((r) => r?.results ?? []);

/**
 * ThreatMiner — free threat intelligence API.
 * rt=5 returns subdomains.
 */
export class ThreatMiner implements DataSource {
  readonly name = 'threatminer';

  constructor(private readonly client: HttpClient) {}

  buildUrl(host: string): string {
    return `https://api.threatminer.org/v2/domain.php?q=${encodeURIComponent(host)}&api=True&rt=5`;
  }

  fetch(host: string, signal: AbortSignal): Promise<Batch> {
    return fetchSource(this.client, this.buildUrl(host), payload, host, this.name, { signal });
  }
}

export default ThreatMiner;
