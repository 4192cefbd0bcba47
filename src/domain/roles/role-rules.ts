import type { EventSource } from '../event.js';

/** Canonical roles that are located by field name. */
export type FieldRole = 'id' | 'timestamp' | 'user' | 'eventType';

export const FIELD_ROLES: readonly FieldRole[] = ['id', 'timestamp', 'user', 'eventType'];

/**
 * One name heuristic.
 *
 * `contains` matches when the lowercased field name includes any pattern;
 * `equals` when it is exactly one of them. Names listed in `exclude`
 * never match. Lower `priority` is tried first.
 */
export interface RoleRule {
  readonly role: FieldRole;
  readonly match: 'contains' | 'equals';
  readonly patterns: readonly string[];
  readonly exclude?: readonly string[];
  readonly priority: number;
}

/** Exact (lowercased) names that always denote the record identifier. */
export const PRIMARY_ID_ALIASES: readonly string[] = ['id', 'event_id', 'eventid', 'transaction_id'];

/**
 * The whole name-matching policy, in evaluation order.
 *
 * Candidate membership for a role is decided by its `contains` rules;
 * `equals` rules only rank candidates that are already members.
 * Primary id fields are never event-type candidates, otherwise
 * `transaction_id` ("trans-action") and `event_id` would name the type.
 */
export const ROLE_RULES: readonly RoleRule[] = [
  { role: 'id', match: 'equals', patterns: PRIMARY_ID_ALIASES, priority: 0 },
  { role: 'id', match: 'contains', patterns: ['id'], priority: 1 },
  { role: 'timestamp', match: 'contains', patterns: ['time', 'date', 'created', 'occurred', 'ts'], priority: 0 },
  { role: 'user', match: 'contains', patterns: ['user', 'customer'], priority: 0 },
  { role: 'eventType', match: 'contains', patterns: ['type', 'event', 'action'], exclude: PRIMARY_ID_ALIASES, priority: 0 },
];

/** Values that a field may carry but that never count as a match. */
export const GUEST_USER = 'guest';
export const INVALID_DATE = 'invalid-date';

/**
 * Structural event-type inference, tried in order when no type-like
 * field carried a value. `value: null` means "use the field's own value".
 */
export const EVENT_TYPE_FALLBACKS: readonly { readonly field: string; readonly value: string | null }[] = [
  { field: 'login_event', value: 'login' },
  { field: 'error', value: 'error' },
  { field: 'transaction_type', value: null },
];

/**
 * Source classification, first match wins. `anyOf` needs one of the
 * fields present, `allOf` needs every one. The last entry is the default.
 */
export type SourceRule =
  | { readonly source: EventSource; readonly anyOf: readonly string[] }
  | { readonly source: EventSource; readonly allOf: readonly string[] };

export const SOURCE_RULES: readonly SourceRule[] = [
  { source: 'vendor', anyOf: ['transaction_id', 'payment_method', 'order_details'] },
  { source: 'device', allOf: ['error', 'stack_trace'] },
];

export const DEFAULT_SOURCE: EventSource = 'internal';

export function matchesRule(fieldName: string, rule: RoleRule): boolean {
  const name = fieldName.toLowerCase();
  if (rule.exclude?.includes(name) === true) return false;
  return rule.match === 'equals'
    ? rule.patterns.includes(name)
    : rule.patterns.some((pattern) => name.includes(pattern));
}

/** Rules for one role, lowest priority first. */
export function rulesFor(role: FieldRole): RoleRule[] {
  return ROLE_RULES
    .filter((rule) => rule.role === role)
    .sort((a, b) => a.priority - b.priority);
}

/** Whether a field name is a candidate for a role. */
export function matchesRole(fieldName: string, role: FieldRole): boolean {
  return ROLE_RULES.some(
    (rule) => rule.role === role && rule.match === 'contains' && matchesRule(fieldName, rule),
  );
}

/** Every role a field name is a candidate for. */
export function rolesOf(fieldName: string): FieldRole[] {
  return FIELD_ROLES.filter((role) => matchesRole(fieldName, role));
}

/** Own-property check; inherited names such as `constructor` never count. */
export function hasField(record: object, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, name);
}
