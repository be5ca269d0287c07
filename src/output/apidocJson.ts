import Ajv from 'ajv/dist/2020';
import fs from 'node:fs/promises';
import path from 'node:path';

import { MetadataFileError } from '../errors';
import { readTextIfExists } from '../util/fsText';
import apidocJsonSchema from '../schema/apidoc-json.schema.json';

export const APIDOC_JSON = 'apidoc.json';

export type ApidocJson = {
  version?: string;
  [field: string]: unknown;
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateApidocJson = ajv.compile<ApidocJson>(apidocJsonSchema);

function parseApidocJson(filePath: string, content: string): ApidocJson {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (e) {
    throw new MetadataFileError(filePath, 'not valid JSON', { cause: e });
  }
  if (!validateApidocJson(data)) {
    throw new MetadataFileError(filePath, ajv.errorsText(validateApidocJson.errors, { dataVar: 'apidoc.json' }));
  }
  return data;
}

/** Parsed apidoc.json, or undefined when the file does not exist. */
export async function readApidocJson(filePath: string): Promise<ApidocJson | undefined> {
  const content = await readTextIfExists(filePath);
  if (content === undefined) return undefined;
  return parseApidocJson(filePath, content);
}

export function serializeApidocJson(data: ApidocJson): string {
  return JSON.stringify(data, null, 2) + '\n';
}

/**
 * Set `version` in `<apidocDir>/apidoc.json` to `latest`, keeping every other field.
 * The file goes through JSON.parse / JSON.stringify: integer-like keys move to the
 * front and integers beyond 2^53 lose precision.
 * Returns true when the file was rewritten; a missing file or an unchanged version
 * leaves the disk alone.
 */
export async function updateApidocJson(apidocDir: string, latest: string | undefined): Promise<boolean> {
  if (latest === undefined) return false;
  const filePath = path.join(apidocDir, APIDOC_JSON);
  const data = await readApidocJson(filePath);
  if (!data || data.version === latest) return false;

  data.version = latest;
  await fs.writeFile(filePath, serializeApidocJson(data), 'utf8');
  return true;
}
