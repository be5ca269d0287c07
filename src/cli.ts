#!/usr/bin/env node

import { Command } from 'commander';
import path from 'node:path';
import { VERSION } from './index';
import { generateApidoc } from './core/generateApidoc';
import { DEFAULT_OUTPUT_FILE } from './output/writeApidocJs';
import { createEmptyReport, finalizeReport } from './report/runReport';
import { writeReportFile } from './report/writeReport';
import { buildApiInventory, writeApiInventoryFile } from './scan/inventory';

function parseBoolish(v: unknown, defaultValue: boolean): boolean {
  if (v === undefined || v === null) return defaultValue;
  if (typeof v === 'boolean') return v;
  const s = String(v).trim().toLowerCase();
  if (s === '') return true; // presence of option with no value
  if (['1', 'true', 'yes', 'y', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(s)) return false;
  return defaultValue;
}

function nonEmpty(v: unknown): string | undefined {
  return typeof v === 'string' && v.trim() !== '' ? v : undefined;
}

export type GenerateCliOptions = {
  srcDir: string;
  apidocDir: string;
  output: string;
  recursive: boolean;
  exclude: string[];
  strictVersions: boolean;
  report?: string;
  verbose: boolean;
  /** Header timestamp override, for reproducible output. */
  generatedAt?: Date;
};

type RawGenerateOptions = {
  srcDir?: string;
  apidocDir?: string;
  output?: string;
  recursive?: boolean;
  exclude?: string[];
  strictVersions?: unknown;
  report?: string;
  verbose?: boolean;
};

type RawListOptions = {
  srcDir?: string;
  out?: string;
  recursive?: boolean;
  exclude?: string[];
  verbose?: boolean;
};

export async function runGenerate(opts: GenerateCliOptions): Promise<number> {
  const report = createEmptyReport({ toolName: 'apidoc-sync', toolVersion: VERSION, sourceRoot: opts.srcDir });

  const result = await generateApidoc({
    sourceRoot: opts.srcDir,
    apidocDir: opts.apidocDir,
    output: opts.output,
    recursive: opts.recursive,
    excludeGlobs: opts.exclude,
    strictVersions: opts.strictVersions,
    report,
    generatedAt: opts.generatedAt,
    onFile: opts.verbose
      ? (file) => {
          // eslint-disable-next-line no-console
          console.log(`Processing ${file}`);
        }
      : undefined,
  });

  for (const f of report.findings) {
    if (f.severity === 'info' && !opts.verbose) continue;
    const where = f.location ? ` (${f.location.file})` : '';
    // eslint-disable-next-line no-console
    console.error(`${f.severity === 'info' ? 'Note' : 'Warning'}: ${f.message}${where}`);
  }

  if (result.status === 'sourceNotFound') {
    // eslint-disable-next-line no-console
    console.error(`Error: Source directory ${result.sourceRoot} not found.`);
    return 1;
  }

  if (opts.report) await writeReportFile(opts.report, finalizeReport(report));

  if (result.status === 'noComments') {
    // eslint-disable-next-line no-console
    console.log('No API comments found.');
    return 0;
  }

  // eslint-disable-next-line no-console
  console.log(
    [
      `Updated ${result.outputPath}:`,
      `  - ${result.updates} API endpoints updated (same version with different content)`,
      `  - ${result.additions} new API versions added`,
      ...(result.metadataUpdated ? ['  - Updated version in apidoc.json'] : []),
    ].join('\n'),
  );
  return 0;
}

async function main(argv: string[]): Promise<number> {
  const program = new Command();

  program
    .name('apidoc-sync')
    .description('Extract apiDoc comments, merge new or changed API versions into _apidoc.js and update apidoc.json')
    .version(VERSION)
    .option('--src-dir <path>', 'Source directory of the project', './src_versions')
    .option('--apidoc-dir <path>', 'Directory for apidoc files', '.')
    .option('-r, --recursive', 'Search source files recursively', false)
    .option('--output <file>', 'Output file for version history', DEFAULT_OUTPUT_FILE)
    .option('--exclude <glob...>', 'Repeatable exclude globs (relative to --src-dir)', [])
    .option('--strict-versions [bool]', 'Abort on a malformed @apiVersion instead of skipping the block (default false)', (v) => v, undefined)
    .option('--report <file>', 'Optional run report path (.json for JSON, Markdown otherwise)', '')
    .option('-v, --verbose', 'Verbose output', false);

  program
    .command('list')
    .description('List the apiDoc blocks found in the sources as deterministic JSON, without touching _apidoc.js.')
    .option('--src-dir <path>', 'Source directory of the project', './src_versions')
    .requiredOption('--out <file>', 'Output JSON file')
    .option('-r, --recursive', 'Search source files recursively', false)
    .option('--exclude <glob...>', 'Additional exclude glob(s).', [])
    .option('-v, --verbose', 'Verbose output', false)
    .action(async (raw: RawListOptions) => {
      const srcDir = raw.srcDir ?? './src_versions';
      const out = raw.out ?? '';
      const inv = await buildApiInventory({
        sourceRoot: srcDir,
        recursive: Boolean(raw.recursive),
        excludeGlobs: raw.exclude ?? [],
      });
      await writeApiInventoryFile(out, inv);
      if (raw.verbose) {
        // eslint-disable-next-line no-console
        console.log(`Found ${inv.apis.length} API block(s) in ${inv.files.length} file(s). Wrote: ${path.resolve(out)}`);
      }
    });

  // Default action: sync _apidoc.js and apidoc.json
  program.action(async (raw: RawGenerateOptions) => {
    process.exitCode = await runGenerate({
      srcDir: raw.srcDir ?? './src_versions',
      apidocDir: raw.apidocDir ?? '.',
      output: nonEmpty(raw.output) ?? DEFAULT_OUTPUT_FILE,
      recursive: Boolean(raw.recursive),
      exclude: raw.exclude ?? [],
      strictVersions: parseBoolish(raw.strictVersions, false),
      report: nonEmpty(raw.report),
      verbose: Boolean(raw.verbose),
    });
  });

  try {
    await program.parseAsync(argv);
    return Number(process.exitCode ?? 0);
  } catch (e: unknown) {
    // eslint-disable-next-line no-console
    console.error(e instanceof Error ? e.message : String(e));
    return 2;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  void main(process.argv).then((code) => {
    process.exitCode = code;
  });
}
