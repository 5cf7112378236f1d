import { z } from 'zod';
import type { HttpClient } from '../net/httpClient';
import type { Batch, DataSource } from '../types';
import { fetchSource } from './fetchSource';

const API_ERROR = 'error check your search parameter';

/**
 * HackerTarget — returns CSV text (`host,ip` per line), not JSON.
 * Error conditions come back as 200 responses with a plain-text message.
 */
const payload = z.string().transform((txt, ctx) => {
  const body = txt.trim();
  if (body === API_ERROR || body.includes('API count exceeded')) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: body });
    return z.NEVER;
  }
  return body.split(/\r?\n/).map((ln) => ln.split(',')[0].trim()).filter(Boolean);
});

export class HackerTarget implements DataSource {
  readonly name = 'hackertarget';

  constructor(private readonly client: HttpClient) {}

  buildUrl(host: string): string {
    return `https://api.hackertarget.com/hostsearch/?q=${encodeURIComponent(host)}`;
  }

  fetch(host: string, signal: AbortSignal): Promise<Batch> {
    return fetchSource(this.client, this.buildUrl(host), payload, host, this.name, { signal, format: 'text' });
  }
}

export default HackerTarget;
