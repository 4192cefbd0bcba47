import type { RawRecord } from '../event.js';
import { GUEST_USER } from './role-rules.js';
import { statelessLookup } from './lookup.js';
import type { CandidateOutcome, Extraction, FieldLookup } from './types.js';
import { isTruthy, toText } from './values.js';

/**
 * Locates the acting user from `user`- or `customer`-like fields.
 * Anonymous `guest` values are ignored. Absence is never an error.
 */
export function findUser(record: RawRecord, lookup: FieldLookup = statelessLookup): Extraction<string> {
  const candidates: CandidateOutcome[] = [];

  for (const field of lookup.candidates(record, 'user')) {
    const value = record[field];

    if (!isTruthy(value)) {
      candidates.push({ field, accepted: false, reason: 'empty-value' });
      continue;
    }
    if (value === GUEST_USER) {
      candidates.push({ field, accepted: false, reason: 'guest-user' });
      continue;
    }

    const text = toText(value);
    candidates.push({ field, accepted: true, value: text });
    return { value: text, candidates };
  }

  return { value: undefined, candidates };
}
