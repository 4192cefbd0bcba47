import type { RawRecord } from '../event.js';
import { INVALID_DATE } from './role-rules.js';
import { statelessLookup } from './lookup.js';
import type { CandidateOutcome, Extraction, FieldLookup, SkipReason } from './types.js';
import { isTruthy } from './values.js';

/** Numbers above this are epoch milliseconds (13 digits). */
const EPOCH_MS_THRESHOLD = 1_000_000_000_000;
/** Numbers above this (and not above the ms threshold) are epoch seconds. */
const EPOCH_S_THRESHOLD = 1_000_000_000;

const MAX_YEAR = 9999;

/** `YYYY-MM-DD HH:MM:SS`; month, day and time parts may drop the leading zero. */
const WALL_CLOCK_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/;

/**
 * Which clock epoch values are rendered in.
 *
 * `local` reproduces the legacy rendering: local wall time with a `Z`
 * appended, which is only a true UTC instant when the process runs in UTC.
 */
export type TimestampClock = 'utc' | 'local';

export interface TimestampOptions {
  readonly clock?: TimestampClock;
  readonly lookup?: FieldLookup;
}

export type NormalizedTimestamp =
  | { readonly ok: true; readonly value: string }
  | { readonly ok: false; readonly reason: SkipReason; readonly detail?: string };

function pad(n: number, width: number = 2): string {
  return String(n).padStart(width, '0');
}

/** `YYYY-MM-DDTHH:MM:SS[.ffffff]Z` */
function formatInstant(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  millisecond: number,
): string {
  const base = `${pad(year, 4)}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}`;
  const fraction = millisecond > 0 ? `.${pad(millisecond, 3)}000` : '';
  return `${base}${fraction}Z`;
}

function formatEpoch(epochMs: number, clock: TimestampClock): NormalizedTimestamp {
  const date = new Date(Math.floor(epochMs));
  if (Number.isNaN(date.getTime())) {
    return { ok: false, reason: 'parse-failed', detail: `epoch ${epochMs}ms is out of range` };
  }

  const year = clock === 'utc' ? date.getUTCFullYear() : date.getFullYear();
  if (year < 1 || year > MAX_YEAR) {
    return { ok: false, reason: 'parse-failed', detail: `year ${year} is out of range` };
  }

  return clock === 'utc'
    ? {
        ok: true,
        value: formatInstant(
          year, date.getUTCMonth() + 1, date.getUTCDate(),
          date.getUTCHours(), date.getUTCMinutes(), date.getUTCSeconds(), date.getUTCMilliseconds(),
        ),
      }
    : {
        ok: true,
        value: formatInstant(
          year, date.getMonth() + 1, date.getDate(),
          date.getHours(), date.getMinutes(), date.getSeconds(), date.getMilliseconds(),
        ),
      };
}

/**
 * Strict `YYYY-MM-DD HH:MM:SS` parse. The calendar date must exist
 * (no February 30th) and the time must be within 00:00:00–23:59:59.
 */
function parseWallClock(text: string): NormalizedTimestamp {
  const match = WALL_CLOCK_PATTERN.exec(text);
  if (match === null) {
    return { ok: false, reason: 'parse-failed', detail: `"${text}" does not match YYYY-MM-DD HH:MM:SS` };
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (
    year === undefined || month === undefined || day === undefined
    || hour === undefined || minute === undefined || second === undefined
  ) {
    return { ok: false, reason: 'parse-failed', detail: `"${text}" is incomplete` };
  }

  // Date.UTC maps years 0-99 onto 1900-1999, so the calendar check
  // is done on a fixed leap-compatible year and the year checked apart.
  const probe = new Date(Date.UTC(2000, month - 1, day));
  const validDate = year >= 1
    && month >= 1 && month <= 12
    && probe.getUTCMonth() === month - 1
    && probe.getUTCDate() === day
    && !(month === 2 && day === 29 && !isLeapYear(year));
  const validTime = hour <= 23 && minute <= 59 && second <= 59;

  if (!validDate || !validTime) {
    return { ok: false, reason: 'parse-failed', detail: `"${text}" is not a valid date and time` };
  }

  return { ok: true, value: formatInstant(year, month, day, hour, minute, second, 0) };
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Converts one raw value to a canonical instant.
 *
 * Rules, in order:
 * 1. text containing `T` is taken as ISO-8601 and returned unchanged;
 * 2. numbers above 10^12 are epoch milliseconds;
 * 3. numbers above 10^9 are epoch seconds;
 * 4. text containing a space and a hyphen is parsed as `YYYY-MM-DD HH:MM:SS`.
 * Anything else is unrecognized.
 */
export function normalizeTimestamp(value: unknown, clock: TimestampClock = 'utc'): NormalizedTimestamp {
  if (typeof value === 'string' && value.includes('T')) {
    return { ok: true, value };
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    if (value > EPOCH_MS_THRESHOLD) return formatEpoch(value, clock);
    if (value > EPOCH_S_THRESHOLD) return formatEpoch(value * 1000, clock);
  }

  if (typeof value === 'string' && value.includes(' ') && value.includes('-')) {
    return parseWallClock(value);
  }

  return { ok: false, reason: 'unrecognized-format' };
}

/**
 * Locates and normalizes the record's timestamp.
 *
 * Candidate fields are tried in lookup order; empty values and the
 * `invalid-date` sentinel are skipped, as is any value that fails to
 * normalize. Absent when no candidate yields an instant.
 */
export function findTimestamp(record: RawRecord, options: TimestampOptions = {}): Extraction<string> {
  const lookup = options.lookup ?? statelessLookup;
  const clock = options.clock ?? 'utc';
  const candidates: CandidateOutcome[] = [];

  for (const field of lookup.candidates(record, 'timestamp')) {
    const value = record[field];

    if (!isTruthy(value)) {
      candidates.push({ field, accepted: false, reason: 'empty-value' });
      continue;
    }
    if (value === INVALID_DATE) {
      candidates.push({ field, accepted: false, reason: 'invalid-date' });
      continue;
    }

    const normalized = normalizeTimestamp(value, clock);
    if (normalized.ok) {
      candidates.push({ field, accepted: true, value: normalized.value });
      return { value: normalized.value, candidates };
    }

    candidates.push(
      normalized.detail === undefined
        ? { field, accepted: false, reason: normalized.reason }
        : { field, accepted: false, reason: normalized.reason, detail: normalized.detail },
    );
  }

  return { value: undefined, candidates };
}
