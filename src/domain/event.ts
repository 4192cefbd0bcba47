/**
 * Core domain types for the unified event model.
 *
 * A raw record is whatever one producer wrote on one line. A unified
 * event is the canonical shape every accepted record is mapped into.
 * These types carry no framework dependencies.
 */

/** One parsed input line. Only top-level fields are inspected. */
export type RawRecord = Record<string, unknown>;

/** Producer families a record can be classified into. */
export type EventSource = 'vendor' | 'device' | 'internal';

/**
 * Canonical Event entity.
 *
 * `id` falls back to `generated_<line>` when the producer supplies
 * nothing id-like, so it is never empty. `payload` is the raw record,
 * embedded verbatim for traceability.
 */
export interface UnifiedEvent {
  readonly id: string;
  readonly timestamp: string; // ISO-8601, always ends in Z
  readonly source: EventSource;
  readonly eventType: string;
  readonly userId?: string;
  readonly payload: RawRecord;
}

/**
 * Diagnostic for a line that could not be normalized.
 *
 * `record` is omitted when the line itself failed to parse.
 */
export interface RejectionRecord {
  readonly line: number;
  readonly errors: readonly string[];
  readonly record?: RawRecord;
}
