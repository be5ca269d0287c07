import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { InvalidVersionError } from '../../errors';
import { createEmptyReport } from '../../report/runReport';
import { indexApiComments, loadExistingApiIndex, parseAggregateComments } from '../apiIndex';

function block(name: string, group: string, version: string, summary = 'Summary'): string {
  return ['/**', `* @api {get} /${name.toLowerCase()} ${summary}`, `* @apiName ${name}`, `* @apiGroup ${group}`, `* @apiVersion ${version}`, '*/'].join('\n');
}

function mkTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'apidoc-index-'));
}

describe('indexApiComments', () => {
  test('groups versions under one identity', () => {
    const index = indexApiComments([{ text: block('GetUser', 'User', '1.0.0') }, { text: block('GetUser', 'User', '1.1.0') }]);
    expect([...index.keys()]).toEqual(['GetUser__User']);
    expect([...(index.get('GetUser__User')?.keys() ?? [])]).toEqual(['1.0.0', '1.1.0']);
  });

  test('a later block with the same identity and version replaces the earlier one', () => {
    const later = block('GetUser', 'User', '1.0.0', 'Second');
    const index = indexApiComments([{ text: block('GetUser', 'User', '1.0.0', 'First') }, { text: later }]);
    expect(index.get('GetUser__User')?.get('1.0.0')).toBe(later);
  });

  test('blocks without @apiVersion are not indexed and noted in the report', () => {
    const report = createEmptyReport({ toolName: 't', toolVersion: '0', sourceRoot: '/x' });
    const index = indexApiComments([{ text: '/**\n* @api {get} /a A\n* @apiName A\n*/', file: 'a.cpp' }], { report });

    expect(index.size).toBe(0);
    expect(report.findings).toEqual([
      {
        kind: 'missingVersion',
        severity: 'info',
        message: 'API block A__Ungrouped has no @apiVersion and was not indexed',
        location: { file: 'a.cpp' },
      },
    ]);
  });

  test('malformed versions are skipped with a warning', () => {
    const report = createEmptyReport({ toolName: 't', toolVersion: '0', sourceRoot: '/x' });
    const index = indexApiComments(
      [{ text: block('Broken', 'Misc', '1..2'), file: 'bad.cpp' }, { text: block('Fine', 'Misc', '1.0') }],
      { report },
    );

    expect([...index.keys()]).toEqual(['Fine__Misc']);
    expect(report.findings).toHaveLength(1);
    expect(report.findings[0]).toMatchObject({
      kind: 'invalidVersion',
      severity: 'warning',
      message: 'Skipped Broken__Misc: invalid @apiVersion "1..2"',
      location: { file: 'bad.cpp' },
    });
  });

  test('strictVersions turns a malformed version into an error', () => {
    expect(() => indexApiComments([{ text: block('Broken', 'Misc', '1..2'), file: 'bad.cpp' }], { strictVersions: true })).toThrow(
      new InvalidVersionError('1..2', 'bad.cpp'),
    );
    expect(() => indexApiComments([{ text: block('Broken', 'Misc', '.') }], { strictVersions: true })).toThrow(
      'Invalid API version "." in Broken__Misc',
    );
  });
});

describe('parseAggregateComments', () => {
  test('finds every doc block and ignores the header line', () => {
    const content = '// API Documentation - Generated on 2024-01-05 07:08:09\n\n/**\n* @api {get} /a A\n*/\n\n  /**\n   * @api {get} /b B\n   */\n\n';
    expect(parseAggregateComments(content)).toEqual(['/**\n* @api {get} /a A\n*/', '/**\n* @api {get} /b B\n*/']);
  });
});

describe('loadExistingApiIndex', () => {
  test('a missing aggregate is an empty index', async () => {
    const index = await loadExistingApiIndex(path.join(mkTmpDir(), '_apidoc.js'));
    expect(index.size).toBe(0);
  });

  test('rebuilds identities and versions from a previous aggregate', async () => {
    const file = path.join(mkTmpDir(), '_apidoc.js');
    const a = block('CreateOrder', 'Order', '1.0.0');
    const b = block('GetUser', 'User', '1.1.0');
    fs.writeFileSync(file, `// API Documentation - Generated on 2024-01-05 07:08:09\n\n${a}\n\n${b}\n\n/**\n* no version\n*/\n\n`, 'utf8');

    const index = await loadExistingApiIndex(file);
    expect([...index.keys()]).toEqual(['CreateOrder__Order', 'GetUser__User']);
    expect(index.get('CreateOrder__Order')?.get('1.0.0')).toBe(a);
    expect(index.get('GetUser__User')?.get('1.1.0')).toBe(b);
  });
});
