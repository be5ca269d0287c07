import path from 'node:path';

import { ApiComment, indexApiComments, loadExistingApiIndex } from '../apidoc/apiIndex';
import { extractApiComments } from '../apidoc/commentExtractor';
import { mergeApiIndexes, orderApiEntries } from '../apidoc/merge';
import { latestVersion } from '../apidoc/version';
import { updateApidocJson } from '../output/apidocJson';
import { DEFAULT_OUTPUT_FILE, writeApidocJsFile } from '../output/writeApidocJs';
import type { RunReport } from '../report/runReport';
import { scanSourceFiles } from '../scan/sourceScanner';
import { isDirectory } from '../util/fsText';

export type GenerateApidocOptions = {
  sourceRoot: string;
  /** Directory holding the aggregate file and apidoc.json. */
  apidocDir: string;
  /** Aggregate file name inside apidocDir (default `_apidoc.js`). */
  output?: string;
  recursive?: boolean;
  excludeGlobs?: string[];
  strictVersions?: boolean;
  /** Filled in as the run progresses; findings for skipped blocks land here. */
  report?: RunReport;
  /** Header timestamp; defaults to now. */
  generatedAt?: Date;
  /** Called with the absolute path of each source file before it is read. */
  onFile?: (filePath: string) => void;
};

export type GenerateApidocResult =
  | { status: 'sourceNotFound'; sourceRoot: string }
  | { status: 'noComments'; sourceRoot: string; filesScanned: number }
  | {
      status: 'written';
      outputPath: string;
      filesScanned: number;
      commentsFound: number;
      updates: number;
      additions: number;
      written: number;
      latestVersion?: string;
      metadataUpdated: boolean;
    };

/**
 * Scan → parse → merge → write.
 *
 * - Nothing is written when the source root is missing or holds no apiDoc blocks.
 * - The aggregate is rewritten in full; apidoc.json only when its version changes.
 */
export async function generateApidoc(opts: GenerateApidocOptions): Promise<GenerateApidocResult> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const apidocDir = path.resolve(opts.apidocDir);
  const outputPath = path.join(apidocDir, opts.output ?? DEFAULT_OUTPUT_FILE);
  const { report } = opts;

  if (!(await isDirectory(sourceRoot))) return { status: 'sourceNotFound', sourceRoot };

  const files = await scanSourceFiles({
    sourceRoot,
    recursive: opts.recursive,
    excludeGlobs: opts.excludeGlobs,
  });

  const comments: ApiComment[] = [];
  for (const file of files) {
    const abs = path.join(sourceRoot, file);
    opts.onFile?.(abs);
    for (const text of await extractApiComments(abs)) comments.push({ text, file });
  }

  if (report) {
    report.filesScanned = files.length;
    report.commentsFound = comments.length;
  }
  if (comments.length === 0) return { status: 'noComments', sourceRoot, filesScanned: files.length };

  const indexOptions = { strictVersions: opts.strictVersions, report };
  const current = indexApiComments(comments, indexOptions);
  const existing = await loadExistingApiIndex(outputPath, indexOptions);
  const { merged, updates, additions } = mergeApiIndexes(current, existing);

  const entries = orderApiEntries(merged);
  await writeApidocJsFile(
    outputPath,
    entries.map((e) => e.comment),
    { generatedAt: opts.generatedAt },
  );

  const latest = latestVersion(entries.map((e) => e.version));
  const metadataUpdated = await updateApidocJson(apidocDir, latest);

  if (report) {
    report.counts = { updates, additions, written: entries.length };
    report.latestVersion = latest;
    report.metadataUpdated = metadataUpdated;
  }

  return {
    status: 'written',
    outputPath,
    filesScanned: files.length,
    commentsFound: comments.length,
    updates,
    additions,
    written: entries.length,
    latestVersion: latest,
    metadataUpdated,
  };
}
