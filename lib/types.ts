/** One batch of names discovered by one (host, source) task. */
export type Batch = string[];

export type SourceKind = 'free' | 'keyed';

/**
 * A passive data provider. `fetch` performs one request for `host` and
 * resolves the names it found, or rejects when the provider had nothing
 * usable. `signal` aborts the request.
 */
export interface DataSource {
  readonly name: string;
  fetch(host: string, signal: AbortSignal): Promise<Batch>;
}

export interface SourceRegistry {
  free: DataSource[];
  keyed: DataSource[];
}

/** Looks up one named credential when a keyed source runs. */
export interface CredentialProvider {
  get(name: string): string | undefined;
}

export interface Task {
  host: string;
  source: DataSource;
}

export type SourceMode = 'free' | 'all';

export type TaskOutcome = 'ok' | 'failed' | 'timeout';
