import { readFile } from 'fs/promises';
import { logger } from '../../shared/logger';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Splits text into trimmed, non-blank lines. */
export function parseInputLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '');
}

/**
 * Reads newline-separated LinkedIn URLs from a file.
 * A missing file is logged and yields an empty list; other I/O errors propagate.
 */
export async function readInputs(filePath: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) {
      logger.error('Input file not found', { path: filePath });
      return [];
    }
    throw err;
  }

  return parseInputLines(text);
}
