import type { RawRecord } from '../event.js';
import { EVENT_TYPE_FALLBACKS, hasField } from './role-rules.js';
import { statelessLookup } from './lookup.js';
import type { CandidateOutcome, Extraction, FieldLookup } from './types.js';
import { isTruthy, toText } from './values.js';

/**
 * Locates the event type.
 *
 * Primary: the first truthy `type`/`event`/`action`-like field.
 * Fallback: infer from structure (`login_event` → login, `error` → error,
 * `transaction_type` → its own value). Absent otherwise.
 */
export function findEventType(record: RawRecord, lookup: FieldLookup = statelessLookup): Extraction<string> {
  const candidates: CandidateOutcome[] = [];

  for (const field of lookup.candidates(record, 'eventType')) {
    const value = record[field];

    if (!isTruthy(value)) {
      candidates.push({ field, accepted: false, reason: 'empty-value' });
      continue;
    }

    const text = toText(value);
    candidates.push({ field, accepted: true, value: text });
    return { value: text, candidates };
  }

  for (const fallback of EVENT_TYPE_FALLBACKS) {
    if (!hasField(record, fallback.field)) continue;

    if (fallback.value !== null) {
      return { value: fallback.value, candidates, fallback: fallback.field };
    }

    // The field's own value decides; an empty one leaves the type absent.
    const raw = record[fallback.field];
    return isTruthy(raw)
      ? { value: toText(raw), candidates, fallback: fallback.field }
      : { value: undefined, candidates, fallback: fallback.field };
  }

  return { value: undefined, candidates };
}
