import type { CredentialProvider } from './types';

/** Reads credentials from the process environment at lookup time. */
export const envCredentials: CredentialProvider = {
  get(name: string): string | undefined {
    const v = process.env[name];
    return v && v.trim() ? v.trim() : undefined;
  },
};

/** Fixed credentials, for tests and embedding. */
export function staticCredentials(values: Record<string, string>): CredentialProvider {
  return {
    get: (name) => values[name],
  };
}
