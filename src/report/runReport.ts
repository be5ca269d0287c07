import { stableStringify } from '../util/deterministicJson';

export type ReportSeverity = 'info' | 'warning' | 'error';

export type ReportLocation = {
  /** Source file (posix, relative to the source root) or the aggregate file path. */
  file: string;
};

export type ReportFindingKind = 'invalidVersion' | 'missingVersion';

export type ReportFinding = {
  kind: ReportFindingKind;
  severity: ReportSeverity;
  message: string;
  location?: ReportLocation;
  tags?: Record<string, string>;
};

export type RunReport = {
  schema: 'apidoc-run-report-v1';
  tool: { name: string; version: string };
  sourceRoot: string;
  startedAtIso: string;
  finishedAtIso: string;
  filesScanned: number;
  commentsFound: number;
  counts: {
    /** Same (identity, version) with different text. */
    updates: number;
    /** (identity, version) pairs not present in the previous aggregate. */
    additions: number;
    /** Blocks written to the aggregate. */
    written: number;
  };
  metadataUpdated: boolean;
  latestVersion?: string;
  findings: ReportFinding[];
};

export function createEmptyReport(args: {
  toolName: string;
  toolVersion: string;
  sourceRoot: string;
  startedAtIso?: string;
}): RunReport {
  const now = args.startedAtIso ?? new Date().toISOString();
  return {
    schema: 'apidoc-run-report-v1',
    tool: { name: args.toolName, version: args.toolVersion },
    sourceRoot: args.sourceRoot,
    startedAtIso: now,
    finishedAtIso: now,
    filesScanned: 0,
    commentsFound: 0,
    counts: { updates: 0, additions: 0, written: 0 },
    metadataUpdated: false,
    findings: [],
  };
}

export function addFinding(report: RunReport | undefined, finding: ReportFinding): void {
  report?.findings.push(finding);
}

export function finalizeReport(report: RunReport, finishedAtIso?: string): RunReport {
  report.finishedAtIso = finishedAtIso ?? new Date().toISOString();
  return report;
}

export function serializeReport(report: RunReport): string {
  return stableStringify(report);
}
