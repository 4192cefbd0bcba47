import { readFileSync } from 'node:fs';
import { InputFileError } from '../../application/index.js';

/**
 * Reads a JSONL file into its physical lines.
 *
 * The whole file is loaded: the categorized inventory needs every
 * record before the first one is mapped. Throws InputFileError when
 * the file cannot be read.
 */
export function readLines(path: string): string[] {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    throw new InputFileError(path, err);
  }

  const lines = content.split(/\r?\n/);
  // A trailing newline is a terminator, not an extra line.
  if (lines.at(-1) === '') lines.pop();
  return lines;
}
