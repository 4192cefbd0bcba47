import type { RawRecord } from '../event.js';
import { matchesRole } from './role-rules.js';
import type { FieldRole } from './role-rules.js';
import type { FieldLookup } from './types.js';

/**
 * Default lookup: scans the record's own field names, in record order,
 * on every call. Holds no state across records.
 */
export const statelessLookup: FieldLookup = {
  strategy: 'stateless',

  candidates(record: RawRecord, role: FieldRole): readonly string[] {
    return Object.keys(record).filter((name) => matchesRole(name, role));
  },
};
