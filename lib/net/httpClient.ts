import { CONFIG } from '../config';
import logger from '../logger';

export class HttpStatusError extends Error {
  constructor(readonly url: string, readonly status: number) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpStatusError';
  }
}

export interface RequestOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * Thin wrapper over the runtime `fetch`, shared by every source so that
 * connections are pooled across the whole run. It holds no per-request state.
 */
export class HttpClient {
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch | undefined;

  constructor(opts?: { userAgent?: string; fetchImpl?: typeof fetch }) {
    this.headers = { 'User-Agent': opts?.userAgent ?? CONFIG.USER_AGENT };
    this.fetchImpl = opts?.fetchImpl;
  }

  async get(url: string, opts?: RequestOptions): Promise<Response> {
    // Resolve lazily so tests can stub the global after construction.
    const runtimeFetch = this.fetchImpl ?? globalThis.fetch;
    if (typeof runtimeFetch !== 'function') {
      throw new Error('fetch is not available in this runtime, Node 18+ is required');
    }
    const res = await runtimeFetch(url, {
      headers: { ...this.headers, ...(opts?.headers ?? {}) },
      signal: opts?.signal,
    });
    logger.trace({ url, status: res.status }, 'http response');
    if (!res.ok) throw new HttpStatusError(url, res.status);
    return res;
  }

  async getText(url: string, opts?: RequestOptions): Promise<string> {
    const res = await this.get(url, opts);
    return res.text();
  }

  async getJson(url: string, opts?: RequestOptions): Promise<unknown> {
    const res = await this.get(url, opts);
    return res.json();
  }
}

export default HttpClient;
