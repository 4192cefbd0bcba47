export type { RawRecord, EventSource, UnifiedEvent, RejectionRecord } from './event.js';
export type {
  FieldRole,
  CandidateOutcome,
  Extraction,
  FieldLookup,
  InventoryStrategy,
  SkipReason,
  TimestampClock,
} from './roles/index.js';
export {
  FIELD_ROLES,
  statelessLookup,
  rolesOf,
  hasField,
  isRawRecord,
  findId,
  findTimestamp,
  normalizeTimestamp,
  findUser,
  findEventType,
  findSource,
} from './roles/index.js';
