import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { scanSourceFiles } from '../sourceScanner';

async function mkFile(p: string, content = 'x'): Promise<void> {
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, content, 'utf8');
}

async function mkTempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'apidoc-scan-'));
  await mkFile(path.join(dir, 'd.hpp'));
  await mkFile(path.join(dir, 'a.cpp'));
  await mkFile(path.join(dir, 'c.h'));
  await mkFile(path.join(dir, 'b.c'));
  await mkFile(path.join(dir, 'e.txt'));
  await mkFile(path.join(dir, 'a.cpp.bak'));
  await mkFile(path.join(dir, 'nested/f.cpp'));
  await mkFile(path.join(dir, 'node_modules/pkg/g.cpp'));
  return dir;
}

describe('scanSourceFiles', () => {
  test('top level only by default, filtered by suffix and sorted', async () => {
    const dir = await mkTempDir();
    expect(await scanSourceFiles({ sourceRoot: dir })).toEqual(['a.cpp', 'b.c', 'c.h', 'd.hpp']);
  });

  test('recursive descends into subdirectories but skips node_modules', async () => {
    const dir = await mkTempDir();
    const r1 = await scanSourceFiles({ sourceRoot: dir, recursive: true });
    const r2 = await scanSourceFiles({ sourceRoot: dir, recursive: true });

    expect(r1).toEqual(r2);
    expect(r1).toEqual(['a.cpp', 'b.c', 'c.h', 'd.hpp', 'nested/f.cpp']);
  });

  test('additional excludes are applied', async () => {
    const dir = await mkTempDir();
    const res = await scanSourceFiles({ sourceRoot: dir, recursive: true, excludeGlobs: ['**/nested/**', 'b.c'] });
    expect(res).toEqual(['a.cpp', 'c.h', 'd.hpp']);
  });

  test('orders by code unit, so upper-case names come first', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'apidoc-scan-case-'));
    await mkFile(path.join(dir, 'b.cpp'));
    await mkFile(path.join(dir, 'a.cpp'));
    await mkFile(path.join(dir, 'Z.cpp'));
    await mkFile(path.join(dir, 'a_v2.cpp'));
    await mkFile(path.join(dir, 'a.h'));

    expect(await scanSourceFiles({ sourceRoot: dir })).toEqual(['Z.cpp', 'a.cpp', 'a.h', 'a_v2.cpp', 'b.cpp']);
  });

  test('extensions can be narrowed', async () => {
    const dir = await mkTempDir();
    expect(await scanSourceFiles({ sourceRoot: dir, recursive: true, extensions: ['.hpp'] })).toEqual(['d.hpp']);
  });
});
