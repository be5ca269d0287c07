import fs from 'node:fs/promises';
import path from 'node:path';

export const DEFAULT_OUTPUT_FILE = '_apidoc.js';

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(d: Date): string {
  const date = `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
  const time = `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
  return `${date} ${time}`;
}

export function generatedHeader(generatedAt: Date): string {
  return `// API Documentation - Generated on ${formatTimestamp(generatedAt)}`;
}

/** Header line, blank line, then every block followed by a blank line. */
export function serializeApidocJs(comments: readonly string[], generatedAt: Date = new Date()): string {
  let out = `${generatedHeader(generatedAt)}\n\n`;
  for (const comment of comments) out += `${comment}\n\n`;
  return out;
}

export type WriteApidocJsOptions = {
  generatedAt?: Date;
};

export async function writeApidocJsFile(
  filePath: string,
  comments: readonly string[],
  options: WriteApidocJsOptions = {},
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, serializeApidocJs(comments, options.generatedAt), 'utf8');
}
