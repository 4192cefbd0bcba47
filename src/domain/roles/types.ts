import type { RawRecord } from '../event.js';
import type { FieldRole } from './role-rules.js';

/** Why a candidate field did not produce a value. */
export type SkipReason =
  | 'empty-value'
  | 'guest-user'
  | 'invalid-date'
  | 'not-primary-alias'
  | 'unrecognized-format'
  | 'parse-failed';

/**
 * Outcome of trying one candidate field.
 *
 * Extractors record every field they consider so a rejected record
 * can be explained without re-running the heuristics.
 */
export type CandidateOutcome =
  | { readonly field: string; readonly accepted: true; readonly value: string }
  | { readonly field: string; readonly accepted: false; readonly reason: SkipReason; readonly detail?: string };

/**
 * Result of an extractor run.
 *
 * `fallback` names the structural rule that produced `value` when no
 * candidate field did (e.g. `generated`, `login_event`).
 */
export interface Extraction<T> {
  readonly value: T | undefined;
  readonly candidates: readonly CandidateOutcome[];
  readonly fallback?: string;
}

export type InventoryStrategy = 'stateless' | 'categorized';

/**
 * Resolves which of a record's fields are candidates for a role,
 * in the order the extractor must try them.
 */
export interface FieldLookup {
  readonly strategy: InventoryStrategy;
  candidates(record: RawRecord, role: FieldRole): readonly string[];
}
