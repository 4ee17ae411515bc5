import type { Target } from '../types.js';

/** A place candidate implementations come from. */
export interface DiscoverySource {
  readonly name: string;
  discover(): Promise<Target[]>;
}

/** Fixed list of targets, from configuration or the command line. */
export class StaticTargetSource implements DiscoverySource {
  constructor(
    private readonly targets: Target[],
    readonly name = 'targets'
  ) {}

  async discover(): Promise<Target[]> {
    return this.targets.map((target) => ({ ...target }));
  }
}

/**
 * Source URLs grouped by category. Each target is named
 * `<category>/<last path segment>`.
 */
export class KnownImplementationsSource implements DiscoverySource {
  readonly name = 'known-implementations';

  constructor(private readonly implementations: Record<string, string[]>) {}

  async discover(): Promise<Target[]> {
    const targets: Target[] = [];
    for (const [category, sources] of Object.entries(this.implementations)) {
      for (const source of sources) {
        targets.push({ name: `${category}/${lastSegment(source)}`, source });
      }
    }
    return targets;
  }
}

function lastSegment(source: string): string {
  const segments = source
    .replace(/\.git$/, '')
    .split('/')
    .filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? source;
}

/** `name=source` as given on the command line. */
export function parseTargetSpec(spec: string): Target {
  const separator = spec.indexOf('=');
  if (separator <= 0 || separator === spec.length - 1) {
    throw new Error(`Invalid target '${spec}', expected name=source`);
  }
  return {
    name: spec.slice(0, separator),
    source: spec.slice(separator + 1)
  };
}
