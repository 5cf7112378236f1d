import { z } from 'zod';
import type { HttpClient } from '../net/httpClient';
import type { Batch, CredentialProvider, DataSource } from '../types';
import { MissingCredentialError } from '../errors';
import { fetchSource } from './fetchSource';

export const SECURITYTRAILS_KEY = 'SECURITYTRAILS_KEY';

const SECURITYTRAILS_BASE = 'https://api.securitytrails.com/v1';

// Labels only; the host is appended per request.
const labels = z.object({ subdomains: z.array(z.string()).nullish() }).transform((r) => r.subdomains ?? []);

export class SecurityTrails implements DataSource {
  readonly name = 'securitytrails';

  constructor(
    private readonly client: HttpClient,
    private readonly credentials: CredentialProvider,
  ) {}

  buildUrl(host: string): string {
    return `${SECURITYTRAILS_BASE}/domain/${encodeURIComponent(host)}/subdomains`;
  }

  async fetch(host: string, signal: AbortSignal): Promise<Batch> {
    const apiKey = this.credentials.get(SECURITYTRAILS_KEY);
    if (!apiKey) throw new MissingCredentialError(this.name, SECURITYTRAILS_KEY);
    const payload = labels.transform((subs) => subs.map((s) => `${s}.${host}`));
    return fetchSource(this.client, this.buildUrl(host), payload, host, this.name, {
      signal,
      headers: { APIKEY: apiKey },
    });
  }
}

export default SecurityTrails;
