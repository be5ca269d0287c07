import { InvalidVersionError } from '../errors';

export type VersionTuple = bigint[];

const VERSION_RE = /^\d+(?:\.\d+)*$/;

export function isValidVersion(version: string): boolean {
  return VERSION_RE.test(version);
}

/**
 * Split a version into its integer segments.
 * Throws InvalidVersionError for empty segments ("1..2", ".", "2.").
 */
export function parseVersion(version: string): VersionTuple {
  if (!isValidVersion(version)) throw new InvalidVersionError(version);
  return version.split('.').map((s) => BigInt(s));
}

/**
 * Tuple comparison: segments compare numerically left to right and a tuple that
 * is a prefix of another sorts first ("1.0" < "1.0.0"). "2.10" > "2.9".
 */
export function compareVersions(a: string, b: string): number {
  const ta = parseVersion(a);
  const tb = parseVersion(b);
  const n = Math.min(ta.length, tb.length);
  for (let i = 0; i < n; i++) {
    if (ta[i] !== tb[i]) return ta[i] < tb[i] ? -1 : 1;
  }
  if (ta.length === tb.length) return 0;
  return ta.length < tb.length ? -1 : 1;
}

/** Highest version; on ties the first one seen wins. */
export function latestVersion(versions: Iterable<string>): string | undefined {
  let best: string | undefined;
  for (const v of versions) {
    if (best === undefined) {
      parseVersion(v);
      best = v;
    } else if (compareVersions(v, best) > 0) {
      best = v;
    }
  }
  return best;
}
