import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { stringifyJson } from '../../application/index.js';
import type { RejectionRecord, UnifiedEvent } from '../../domain/index.js';

export const VALID_FILE = 'unified_events.json';
export const INVALID_FILE = 'invalid_events.json';

export interface WrittenResults {
  readonly validPath: string;
  readonly invalidPath: string | null;
}

/**
 * Persists the two result sets as pretty-printed JSON arrays.
 * Integers past 2^53 are written with every digit.
 *
 * The valid set is always written (possibly `[]`); the invalid set
 * only when it has entries.
 */
export function writeResults(
  outDir: string,
  valid: readonly UnifiedEvent[],
  invalid: readonly RejectionRecord[],
): WrittenResults {
  mkdirSync(outDir, { recursive: true });

  const validPath = join(outDir, VALID_FILE);
  writeFileSync(validPath, stringifyJson(valid, 2), 'utf-8');

  if (invalid.length === 0) {
    return { validPath, invalidPath: null };
  }

  const invalidPath = join(outDir, INVALID_FILE);
  writeFileSync(invalidPath, stringifyJson(invalid, 2), 'utf-8');
  return { validPath, invalidPath };
}
