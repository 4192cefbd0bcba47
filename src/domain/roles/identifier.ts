import type { RawRecord } from '../event.js';
import { matchesRule, rulesFor } from './role-rules.js';
import { statelessLookup } from './lookup.js';
import type { CandidateOutcome, Extraction, FieldLookup } from './types.js';
import { isTruthy, toText } from './values.js';

/**
 * Locates the record's identifier.
 *
 * Candidates are tried once per id rule, highest priority first: exact
 * primary aliases (`id`, `event_id`, ...) before any name merely
 * containing "id". Within a pass the lookup's order decides ties.
 *
 * Never fails: without a usable candidate the id is synthesized as
 * `generated_<lineNumber>`.
 */
export function findId(
  record: RawRecord,
  lineNumber: number,
  lookup: FieldLookup = statelessLookup,
): Extraction<string> & { readonly value: string } {
  const fields = lookup.candidates(record, 'id');
  const candidates: CandidateOutcome[] = [];

  for (const rule of rulesFor('id')) {
    for (const field of fields) {
      if (!matchesRule(field, rule)) {
        candidates.push({ field, accepted: false, reason: 'not-primary-alias' });
        continue;
      }

      const value = record[field];
      if (!isTruthy(value)) {
        candidates.push({ field, accepted: false, reason: 'empty-value' });
        continue;
      }

      const text = toText(value);
      candidates.push({ field, accepted: true, value: text });
      return { value: text, candidates };
    }
  }

  return { value: `generated_${lineNumber}`, candidates, fallback: 'generated' };
}
