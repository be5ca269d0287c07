import fg from 'fast-glob';
import path from 'node:path';
import { compareCodeUnits } from '../util/compare';

export type SourceScanOptions = {
  sourceRoot: string;
  /** Descend into subdirectories; otherwise only files directly under sourceRoot. */
  recursive?: boolean;
  /** File name suffixes to accept (default: C/C++ sources and headers). */
  extensions?: readonly string[];
  /** Additional exclude globs (evaluated relative to sourceRoot). */
  excludeGlobs?: string[];
};

export const SOURCE_EXTENSIONS: readonly string[] = ['.cpp', '.c', '.h', '.hpp'];

const DEFAULT_EXCLUDES = ['**/.git/**', '**/node_modules/**'];

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

/**
 * Deterministically discovers the source files carrying apiDoc comments.
 * Returns a stable, sorted list of relative paths (posix-style) from sourceRoot.
 */
export async function scanSourceFiles(opts: SourceScanOptions): Promise<string[]> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const extensions = opts.extensions ?? SOURCE_EXTENSIONS;
  const prefix = opts.recursive ? '**/' : '';
  const patterns = extensions.map((ext) => `${prefix}*${fg.escapePath(ext)}`);

  const matches = await fg(patterns, {
    cwd: sourceRoot,
    onlyFiles: true,
    unique: true,
    dot: true,
    followSymbolicLinks: false,
    ignore: [...DEFAULT_EXCLUDES, ...(opts.excludeGlobs ?? [])],
  });

  const rel = matches.map((p) => toPosix(p));
  rel.sort(compareCodeUnits);
  return rel;
}
