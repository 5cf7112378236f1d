export type FilterPolicy =
  | { kind: 'none' }
  | { kind: 'any-root'; roots: ReadonlySet<string> }
  | { kind: 'any-subdomain'; roots: ReadonlySet<string> };

/** Lower-case, trim and drop a leading wildcard label. */
export function cleanName(name: string): string {
  return name.trim().toLowerCase().replace(/^\*\./, '');
}

/** `name` is `root` itself or lies under it. */
export function isRootOrSubdomain(name: string, root: string): boolean {
  return name === root || name.endsWith(`.${root}`);
}

/** `name` lies strictly under `root`; the root itself does not count. */
export function isStrictSubdomain(name: string, root: string): boolean {
  return name.length > root.length + 1 && name.endsWith(`.${root}`);
}

/**
 * Filters discovered names against the run's roots. The policy is chosen once;
 * `clean` has no memory between batches and does not deduplicate.
 */
export class PostProcessor {
  private policy: FilterPolicy = { kind: 'none' };

  /** Keep the roots themselves and anything under them. */
  anyRoot(roots: Iterable<string>): this {
    this.policy = { kind: 'any-root', roots: new Set(Array.from(roots, cleanName)) };
    return this;
  }

  /** Keep only names strictly under one of the roots. */
  anySubdomain(roots: Iterable<string>): this {
    this.policy = { kind: 'any-subdomain', roots: new Set(Array.from(roots, cleanName)) };
    return this;
  }

  get filterPolicy(): FilterPolicy {
    return this.policy;
  }

  keep(name: string): boolean {
    const { policy } = this;
    switch (policy.kind) {
      case 'none':
        return true;
      case 'any-root':
        return matchesAny(name, policy.roots, isRootOrSubdomain);
      case 'any-subdomain':
        return matchesAny(name, policy.roots, isStrictSubdomain);
    }
  }

  *clean(names: Iterable<string>): Generator<string, void, undefined> {
    for (const raw of names) {
      const name = cleanName(raw);
      if (name && this.keep(name)) yield name;
    }
  }
}

function matchesAny(name: string, roots: ReadonlySet<string>, test: (name: string, root: string) => boolean): boolean {
  for (const root of roots) {
    if (test(name, root)) return true;
  }
  return false;
}

export default PostProcessor;
