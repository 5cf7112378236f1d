/**
 * Error taxonomy.
 *
 * Everything raised inside a scheduled task is recovered by the runner and only
 * logged. `ConfigError` is the one kind that reaches the caller, and it is
 * raised before any task starts.
 */
export class SubsiftError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A provider returned nothing usable: empty result, bad status, bad payload or network failure. */
export class SourceError extends SubsiftError {
  constructor(
    readonly source: string,
    readonly host: string,
    readonly reason: string,
  ) {
    super(`${source}: no usable data for ${host} (${reason})`);
  }
}

export class MissingCredentialError extends SubsiftError {
  constructor(
    readonly source: string,
    readonly variable: string,
  ) {
    super(`${source}: credential ${variable} is not set`);
  }
}

export class TimeoutError extends SubsiftError {
  constructor(readonly ms: number) {
    super(`timed out after ${ms}ms`);
  }
}

export class ConfigError extends SubsiftError {}

/** Errors a task may fail with without anything being wrong with subsift itself. */
export function isRecoverable(err: unknown): err is SourceError | MissingCredentialError | TimeoutError {
  return err instanceof SourceError || err instanceof MissingCredentialError || err instanceof TimeoutError;
}
