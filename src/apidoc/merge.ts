import type { ApiIndex } from './apiIndex';
import { compareCodeUnits } from '../util/compare';
import { compareVersions } from './version';

export type MergeResult = {
  merged: ApiIndex;
  /** Pairs present in both with different text. */
  updates: number;
  /** Pairs present only in the current scan. */
  additions: number;
};

export type ApiEntry = {
  key: string;
  version: string;
  comment: string;
};

export function cloneApiIndex(index: ApiIndex): ApiIndex {
  const out: ApiIndex = new Map();
  for (const [key, versions] of index) out.set(key, new Map(versions));
  return out;
}

/**
 * Overlay the current scan on the previous aggregate. Neither input is modified.
 */
export function mergeApiIndexes(current: ApiIndex, existing: ApiIndex): MergeResult {
  const merged = cloneApiIndex(existing);
  let updates = 0;
  let additions = 0;

  for (const [key, versions] of current) {
    const before = existing.get(key);
    let target = merged.get(key);
    if (!target) {
      target = new Map();
      merged.set(key, target);
    }

    for (const [version, comment] of versions) {
      const previous = before?.get(version);
      if (previous === undefined) additions++;
      else if (previous !== comment) updates++;
      target.set(version, comment);
    }
  }

  return { merged, updates, additions };
}

/** Identity key ascending, then version descending by numeric tuple. */
export function orderApiEntries(index: ApiIndex): ApiEntry[] {
  const out: ApiEntry[] = [];
  for (const key of [...index.keys()].sort(compareCodeUnits)) {
    const versions = index.get(key);
    if (!versions) continue;
    const ordered = [...versions.keys()].sort((a, b) => compareVersions(b, a));
    for (const version of ordered) {
      const comment = versions.get(version);
      if (comment !== undefined) out.push({ key, version, comment });
    }
  }
  return out;
}

export function orderApiComments(index: ApiIndex): string[] {
  return orderApiEntries(index).map((e) => e.comment);
}
