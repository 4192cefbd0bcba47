import type { BaseLogger } from 'pino';
import type {
  InventoryStrategy,
  RawRecord,
  RejectionRecord,
  TimestampClock,
  UnifiedEvent,
} from '../domain/index.js';
import { buildFieldInventory, describeInventory, resolveLookup } from './field-inventory.js';
import { mapRecord } from './record-mapper.js';
import { parseJson } from './json-codec.js';
import { rawRecordSchema } from './record-schema.js';

export const BAD_JSON = 'Bad JSON';
export const NOT_AN_OBJECT = 'Not a JSON object';

/** A line after parsing: either a record to map or an early rejection. */
export type StagedEntry =
  | { readonly line: number; readonly record: RawRecord }
  | { readonly line: number; readonly errors: readonly string[] };

export interface BatchOptions {
  readonly inventory?: InventoryStrategy;
  readonly clock?: TimestampClock;
  readonly log?: BaseLogger;
}

export interface BatchSummary {
  readonly valid: number;
  readonly invalid: number;
  /** Percentage of accepted lines, one decimal place. */
  readonly successRate: string;
}

export interface BatchResult {
  readonly valid: UnifiedEvent[];
  readonly invalid: RejectionRecord[];
  readonly summary: BatchSummary;
  /** Every field name seen in the batch, sorted. */
  readonly fields: string[];
}

/** `valid / (valid + invalid)` as a percentage; `0.0` for an empty batch. */
export function formatSuccessRate(valid: number, invalid: number): string {
  const total = valid + invalid;
  if (total === 0) return (0).toFixed(1);
  return ((valid / total) * 100).toFixed(1);
}

/** Classifies a parsed JSON value; only objects reach the mapper. */
function stageValue(value: unknown, line: number): StagedEntry {
  const parsed = rawRecordSchema.safeParse(value);
  return parsed.success
    ? { line, record: parsed.data }
    : { line, errors: [NOT_AN_OBJECT] };
}

/** Parses one line of text. Invalid JSON never reaches the mapper. */
export function parseLine(text: string, line: number): StagedEntry {
  let value: unknown;
  try {
    value = parseJson(text);
  } catch {
    return { line, errors: [BAD_JSON] };
  }
  return stageValue(value, line);
}

/**
 * Stages JSONL input. Line numbers are 1-based over every physical line;
 * blank lines are skipped and not counted.
 */
export function stageLines(lines: Iterable<string>): StagedEntry[] {
  const staged: StagedEntry[] = [];
  let lineNumber = 0;

  for (const raw of lines) {
    lineNumber++;
    const text = raw.trim();
    if (text === '') continue;
    staged.push(parseLine(text, lineNumber));
  }

  return staged;
}

/** Stages already-parsed values; position `i` becomes line `i + 1`. */
export function stageRecords(values: readonly unknown[]): StagedEntry[] {
  return values.map((value, index) => stageValue(value, index + 1));
}

/**
 * Maps a staged batch and partitions it into valid and invalid sets.
 *
 * The field inventory is built from every parsed record before mapping
 * starts; it always feeds the discovery report and, under the
 * `categorized` strategy, also drives candidate lookup.
 *
 * A failure on one line never affects any other line. Output order
 * matches input order in both partitions.
 */
export function runBatch(entries: readonly StagedEntry[], options: BatchOptions = {}): BatchResult {
  const { log } = options;
  const strategy = options.inventory ?? 'stateless';
  const clock = options.clock ?? 'utc';

  const records = entries.flatMap((entry) => ('record' in entry ? [entry.record] : []));
  const inventory = buildFieldInventory(records);
  const fields = describeInventory(inventory);
  const lookup = resolveLookup(strategy, inventory);

  log?.info({ fieldCount: fields.length, fields, strategy }, `Found ${fields.length} unique fields`);

  const valid: UnifiedEvent[] = [];
  const invalid: RejectionRecord[] = [];

  for (const entry of entries) {
    if ('errors' in entry) {
      invalid.push({ line: entry.line, errors: entry.errors });
      log?.warn({ line: entry.line }, `✗ Line ${entry.line}: ${entry.errors.join(', ')}`);
      continue;
    }

    const result = mapRecord(entry.record, entry.line, { lookup, clock });
    log?.debug({ line: entry.line, trace: result.trace }, 'Record mapped');

    if (result.ok) {
      valid.push(result.event);
      log?.info({ line: entry.line }, `✓ Line ${entry.line}`);
    } else {
      invalid.push({ line: entry.line, errors: result.errors, record: entry.record });
      log?.warn({ line: entry.line }, `✗ Line ${entry.line}: ${result.errors.join(', ')}`);
    }
  }

  const summary: BatchSummary = {
    valid: valid.length,
    invalid: invalid.length,
    successRate: formatSuccessRate(valid.length, invalid.length),
  };

  log?.info(summary, `Valid: ${summary.valid}, Invalid: ${summary.invalid}, Success rate: ${summary.successRate}%`);

  return { valid, invalid, summary, fields };
}

/** Runs a batch over JSONL text lines. */
export function processLines(lines: Iterable<string>, options: BatchOptions = {}): BatchResult {
  return runBatch(stageLines(lines), options);
}

/** Runs a batch over already-parsed values. */
export function processRecords(values: readonly unknown[], options: BatchOptions = {}): BatchResult {
  return runBatch(stageRecords(values), options);
}
