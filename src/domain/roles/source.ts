import type { EventSource, RawRecord } from '../event.js';
import { DEFAULT_SOURCE, SOURCE_RULES, hasField } from './role-rules.js';

/**
 * Classifies which producer family a record came from, by the presence
 * of tell-tale field names. Total: falls back to `internal`.
 */
export function findSource(record: RawRecord): EventSource {
  for (const rule of SOURCE_RULES) {
    const matched = 'anyOf' in rule
      ? rule.anyOf.some((field) => hasField(record, field))
      : rule.allOf.every((field) => hasField(record, field));

    if (matched) return rule.source;
  }

  return DEFAULT_SOURCE;
}
