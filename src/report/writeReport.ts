import fs from 'node:fs/promises';
import path from 'node:path';
import { RunReport, serializeReport } from './runReport';
import { reportToMarkdown } from './markdownReport';

export type ReportFormat = 'json' | 'md';

/** Format follows the extension unless given: `.json` is JSON, anything else Markdown. */
export function reportFormatFor(outFile: string): ReportFormat {
  return path.extname(outFile).toLowerCase() === '.json' ? 'json' : 'md';
}

export async function writeReportFile(outFile: string, report: RunReport, format: ReportFormat = reportFormatFor(outFile)): Promise<void> {
  await fs.mkdir(path.dirname(outFile), { recursive: true });
  const content = format === 'json' ? serializeReport(report) : reportToMarkdown(report);
  await fs.writeFile(outFile, content, 'utf8');
}
