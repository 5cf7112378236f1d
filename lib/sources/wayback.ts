import { z } from 'zod';
import type { HttpClient } from '../net/httpClient';
import type { Batch, DataSource } from '../types';
import { fetchSource } from './fetchSource';

const payload = z.array(z.unknown()).transform((rows) => {
  const names: string[] = [];
  // First row is the header ["original"]
  for (const row of rows.slice(1)) {
    const urlStr = Array.isArray(row) ? row[0] : row;
    if (typeof urlStr !== 'string') continue;
    try {
      names.push(new URL(urlStr).hostname);
    } catch {
      // archived junk that is not a URL
    }
  }
  return names;
});

/**
 * Wayback Machine CDX API — extracts hostnames from archived URLs.
 * Slow for large hosts; this is the source the timeout usually catches.
 */
export class Wayback implements DataSource {
  readonly name = 'wayback';

  constructor(private readonly client: HttpClient) {}

  buildUrl(host: string): string {
    return `https://web.archive.org/cdx/search/cdx?url=*.${encodeURIComponent(host)}/*&output=json&fl=original&collapse=urlkey&limit=10000`;
  }

  fetch(host: string, signal: AbortSignal): Promise<Batch> {
    return fetchSource(this.client, this.buildUrl(host), payload, host, this.name, { signal });
  }
}

export default Wayback;
