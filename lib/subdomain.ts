import { toASCII } from 'punycode';
import { get as registrableDomain } from 'psl';

const HAS_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const BARE_HOST = /^([^/ :]+)(?::\d+)?(?:\/.*)?$/;
const MAX_HOST_LENGTH = 255;

function hostOf(raw: string): string {
  try {
    return new URL(HAS_SCHEME.test(raw) ? raw : `http://${raw}`).hostname;
  } catch {
    const bare = BARE_HOST.exec(raw);
    if (!bare) throw new Error(`Unable to normalize domain: ${raw}`);
    return bare[1];
  }
}

/**
 * Reduce a URL, a `host:port/path` string or a bare name to its lower-case
 * ASCII host, without leading or trailing dots.
 */
export function normalizeDomain(input: string): string {
  const raw = input.trim();
  if (!raw) throw new Error('Invalid input');
  return toASCII(hostOf(raw)).toLowerCase().replace(/^\.+|\.+$/g, '');
}

/** `host` has a registrable domain under the public suffix list. */
export function isValidHost(host: string): boolean {
  const name = host.trim().toLowerCase();
  if (!name || /\s/.test(name)) return false;
  try {
    const ascii = toASCII(name);
    return ascii.length <= MAX_HOST_LENGTH && registrableDomain(ascii) !== null;
  } catch {
    return false;
  }
}

/**
 * Turn raw input lines into the run's root set: normalised, valid, unique.
 * Blank lines are skipped; invalid ones are handed to `onInvalid`.
 */
export function toRootSet(lines: Iterable<string>, onInvalid?: (line: string) => void): Set<string> {
  const roots = new Set<string>();
  for (const line of lines) {
    if (!line.trim()) continue;
    let host: string;
    try {
      host = normalizeDomain(line);
    } catch {
      onInvalid?.(line);
      continue;
    }
    if (isValidHost(host)) {
      roots.add(host);
    } else {
      onInvalid?.(line);
    }
  }
  return roots;
}
