import { z } from 'zod';
import type { HttpClient } from '../net/httpClient';
import type { Batch, DataSource } from '../types';
import { fetchSource } from './fetchSource';

const payload = z.string().transform((html) => {
  const names: string[] = [];
  // pattern: <td>subdomain.domain.com</td>
  const tdPattern = /<td>([a-z0-9._-]+\.[a-z]{2,})<\/td>/gi;
  let match: RegExpExecArray | null;
  while ((match = tdPattern.exec(html))) {
    names.push(match[1]);
  }
  return names;
});

/**
 * RapidDNS — subdomain enumeration via HTML page parsing.
 */
export class RapidDns implements DataSource {
  readonly name = 'rapiddns';

  constructor(private readonly client: HttpClient) {}

  buildUrl(host: string): string {
    return `https://rapiddns.io/subdomain/${encodeURIComponent(host)}?full=1`;
  }

  fetch(host: string, signal: AbortSignal): Promise<Batch> {
    return fetchSource(this.client, this.buildUrl(host), payload, host, this.name, {
      signal,
      format: 'text',
      headers: { Accept: 'text/html' },
    });
  }
}

export default RapidDns;
