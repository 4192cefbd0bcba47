export type { FieldRole, RoleRule, SourceRule } from './role-rules.js';
export {
  FIELD_ROLES,
  ROLE_RULES,
  PRIMARY_ID_ALIASES,
  SOURCE_RULES,
  EVENT_TYPE_FALLBACKS,
  GUEST_USER,
  INVALID_DATE,
  DEFAULT_SOURCE,
  matchesRule,
  matchesRole,
  rulesFor,
  rolesOf,
  hasField,
} from './role-rules.js';
export type { CandidateOutcome, Extraction, FieldLookup, InventoryStrategy, SkipReason } from './types.js';
export { statelessLookup } from './lookup.js';
export { isRawRecord, isTruthy, toText } from './values.js';
export { findId } from './identifier.js';
export { findTimestamp, normalizeTimestamp } from './timestamp.js';
export type { TimestampClock, TimestampOptions, NormalizedTimestamp } from './timestamp.js';
export { findUser } from './user.js';
export { findEventType } from './event-type.js';
export { findSource } from './source.js';
