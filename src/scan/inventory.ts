import path from 'node:path';
import fs from 'node:fs/promises';
import { stableStringify } from '../util/deterministicJson';
import { extractApiDetails } from '../apidoc/apiDetails';
import { extractApiComments } from '../apidoc/commentExtractor';
import { scanSourceFiles, type SourceScanOptions } from './sourceScanner';

export type ApiInventoryItem = {
  name: string;
  group: string;
  version?: string;
  file: string;
};

export type ApiInventory = {
  schema: 'api-inventory-v1';
  sourceRoot: string;
  files: string[];
  apis: ApiInventoryItem[];
};

/** Every apiDoc block found under the source root, in file order; nothing is merged or written. */
export async function buildApiInventory(opts: SourceScanOptions): Promise<ApiInventory> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const files = await scanSourceFiles(opts);
  const apis: ApiInventoryItem[] = [];

  for (const file of files) {
    for (const comment of await extractApiComments(path.join(sourceRoot, file))) {
      const { identity, version } = extractApiDetails(comment);
      apis.push({ name: identity.name, group: identity.group, version, file });
    }
  }

  return { schema: 'api-inventory-v1', sourceRoot, files, apis };
}

export async function writeApiInventoryFile(outFile: string, inv: ApiInventory): Promise<void> {
  const abs = path.resolve(outFile);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, stableStringify(inv), 'utf8');
}
