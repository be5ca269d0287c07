import fs from 'node:fs/promises';

export const COMMENT_OPEN = '/**';
export const COMMENT_CLOSE = '*/';
/** Only doc blocks carrying this marker describe an API endpoint. */
export const API_MARKER = '@api ';

/** Trim every line, then the whole block, so re-scans compare equal regardless of indentation. */
export function normalizeComment(comment: string): string {
  return comment
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .join('\n')
    .trim();
}

/**
 * Yields the normalized apiDoc blocks of a source text, in file order.
 *
 * A block opens on a line containing `/**` and closes on the next line containing `*\/`.
 * Markers are not balanced: a nested `/**` is plain content, and a one-line `/** ... *\/`
 * stays open until a later closing line. A block still open at end of input is dropped.
 */
export function* iterateApiComments(text: string): Generator<string> {
  let current: string[] = [];
  let inComment = false;

  for (const line of text.split(/\r\n|\r|\n/)) {
    if (!inComment && line.includes(COMMENT_OPEN)) {
      inComment = true;
      current = [line];
    } else if (inComment && line.includes(COMMENT_CLOSE)) {
      current.push(line);
      const block = current.join('\n');
      current = [];
      inComment = false;
      if (block.includes(API_MARKER)) yield normalizeComment(block);
    } else if (inComment) {
      current.push(line);
    }
  }
}

export async function extractApiComments(filePath: string): Promise<string[]> {
  const text = await fs.readFile(filePath, 'utf8');
  return Array.from(iterateApiComments(text));
}
