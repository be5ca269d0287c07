import type { ReportFinding, RunReport } from './runReport';

function fmtLoc(f: ReportFinding): string {
  return f.location?.file ?? '';
}

function escapeCell(s: string): string {
  return s.replace(/\|/g, '\\|');
}

function countByKind(findings: ReportFinding[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const f of findings) out[f.kind] = (out[f.kind] ?? 0) + 1;
  return out;
}

export function reportToMarkdown(report: RunReport): string {
  const lines: string[] = [];
  const warnings = report.findings.filter((f) => f.severity !== 'info');
  const byKind = countByKind(report.findings);

  lines.push(`# apiDoc sync report`);
  lines.push('');
  lines.push(`- Tool: **${report.tool.name}** ${report.tool.version}`);
  lines.push(`- Source root: \`${report.sourceRoot}\``);
  lines.push(`- Started: ${report.startedAtIso}`);
  lines.push(`- Finished: ${report.finishedAtIso}`);
  lines.push(`- Files scanned: **${report.filesScanned}**`);
  lines.push(`- API comments found: **${report.commentsFound}**`);
  lines.push(`- Findings: **${report.findings.length}** (warnings: **${warnings.length}**)`);
  lines.push('');

  lines.push(`## Changes`);
  lines.push('');
  lines.push(`| Change | Count |`);
  lines.push(`|---|---:|`);
  lines.push(`| Updated (same version, different content) | ${report.counts.updates} |`);
  lines.push(`| Added versions | ${report.counts.additions} |`);
  lines.push(`| Blocks written | ${report.counts.written} |`);
  lines.push('');
  const latest = report.latestVersion ?? '(none)';
  lines.push(`- Latest version: **${latest}**${report.metadataUpdated ? ' (apidoc.json updated)' : ''}`);
  lines.push('');

  lines.push(`## Findings summary`);
  lines.push('');
  lines.push(`| Kind | Count |`);
  lines.push(`|---|---:|`);
  const fk = Object.keys(byKind).sort((a, b) => a.localeCompare(b));
  for (const k of fk) lines.push(`| ${k} | ${byKind[k]} |`);
  if (fk.length === 0) lines.push(`| (none) | 0 |`);
  lines.push('');

  lines.push(`## All findings`);
  lines.push('');
  lines.push(`| Severity | Kind | Location | Message |`);
  lines.push(`|---|---|---|---|`);
  const all = [...report.findings];
  all.sort((a, b) => {
    const ak = a.kind.localeCompare(b.kind);
    if (ak !== 0) return ak;
    const al = fmtLoc(a).localeCompare(fmtLoc(b));
    if (al !== 0) return al;
    return a.message.localeCompare(b.message);
  });
  for (const f of all) {
    lines.push(`| ${f.severity} | ${f.kind} | ${escapeCell(fmtLoc(f))} | ${escapeCell(f.message)} |`);
  }
  if (all.length === 0) lines.push(`| (none) | (none) |  |  |`);
  lines.push('');
  return lines.join('\n');
}
