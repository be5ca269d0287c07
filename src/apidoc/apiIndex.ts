import { InvalidVersionError } from '../errors';
import { addFinding, RunReport } from '../report/runReport';
import { readTextIfExists } from '../util/fsText';
import { extractApiDetails } from './apiDetails';
import { normalizeComment } from './commentExtractor';
import { isValidVersion } from './version';

/** identity key → version → normalized comment block */
export type ApiIndex = Map<string, Map<string, string>>;

export type ApiComment = {
  text: string;
  /** Where the block was read from; used in findings and errors. */
  file?: string;
};

export type IndexOptions = {
  /** Throw InvalidVersionError instead of skipping blocks with a malformed @apiVersion. */
  strictVersions?: boolean;
  report?: RunReport;
};

const DOC_BLOCK_RE = /\/\*\*[\s\S]*?\*\//g;

/**
 * Index comment blocks by identity and version. A later block with the same
 * (identity, version) replaces an earlier one. Blocks without a usable version
 * are left out.
 */
export function indexApiComments(comments: Iterable<ApiComment>, options: IndexOptions = {}): ApiIndex {
  const index: ApiIndex = new Map();

  for (const { text, file } of comments) {
    const { key, version } = extractApiDetails(text);
    const location = file !== undefined ? { file } : undefined;

    if (version === undefined) {
      addFinding(options.report, {
        kind: 'missingVersion',
        severity: 'info',
        message: `API block ${key} has no @apiVersion and was not indexed`,
        location,
      });
      continue;
    }

    if (!isValidVersion(version)) {
      if (options.strictVersions) throw new InvalidVersionError(version, file ?? key);
      addFinding(options.report, {
        kind: 'invalidVersion',
        severity: 'warning',
        message: `Skipped ${key}: invalid @apiVersion "${version}"`,
        location,
        tags: { key, version },
      });
      continue;
    }

    let versions = index.get(key);
    if (!versions) {
      versions = new Map();
      index.set(key, versions);
    }
    versions.set(version, text);
  }

  return index;
}

/** Every `/** ... *\/` span of a previously written aggregate, normalized. */
export function parseAggregateComments(content: string): string[] {
  return (content.match(DOC_BLOCK_RE) ?? []).map(normalizeComment);
}

/**
 * Rebuild the index of an aggregate file written by a previous run.
 * A missing file is an empty index.
 */
export async function loadExistingApiIndex(filePath: string, options: IndexOptions = {}): Promise<ApiIndex> {
  const content = await readTextIfExists(filePath);
  if (content === undefined) return new Map();
  const comments = parseAggregateComments(content).map((text) => ({ text, file: filePath }));
  return indexApiComments(comments, options);
}
