import { z } from 'zod';
import type { HttpClient } from '../net/httpClient';
import type { Batch, DataSource } from '../types';
import { fetchSource } from './fetchSource';

const payload = z
  .array(z.object({ name_value: z.string().nullish(), common_name: z.string().nullish() }))
  .transform((certs) => {
    const names: string[] = [];
    for (const cert of certs) {
      const value = cert.name_value || cert.common_name || '';
      for (const name of value.split(/[\n\r\s]+/)) {
        if (name) names.push(name.replace(/^\*\./, ''));
      }
    }
    return names;
  });

/**
 * crt.sh — Certificate Transparency log search.
 * One certificate can carry several names in `name_value`.
 */
export class CrtSh implements DataSource {
  readonly name = 'crtsh';

  constructor(private readonly client: HttpClient) {}

  buildUrl(host: string): string {
    return `https://crt.sh/?q=%25.${encodeURIComponent(host)}&output=json`;
  }

  fetch(host: string, signal: AbortSignal): Promise<Batch> {
    return fetchSource(this.client, this.buildUrl(host), payload, host, this.name, { signal });
  }
}

export default CrtSh;
