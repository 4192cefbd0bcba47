import type {
  CandidateOutcome,
  EventSource,
  FieldLookup,
  RawRecord,
  TimestampClock,
  UnifiedEvent,
} from '../domain/index.js';
import {
  findEventType,
  findId,
  findSource,
  findTimestamp,
  findUser,
  statelessLookup,
} from '../domain/index.js';

export const MISSING_TIMESTAMP = 'Missing timestamp';
export const MISSING_EVENT_TYPE = 'Missing event type';

export interface MapOptions {
  readonly lookup?: FieldLookup;
  readonly clock?: TimestampClock;
}

/** Every candidate each extractor considered, for diagnostics. */
export interface MappingTrace {
  readonly id: readonly CandidateOutcome[];
  readonly timestamp: readonly CandidateOutcome[];
  readonly user: readonly CandidateOutcome[];
  readonly eventType: readonly CandidateOutcome[];
  readonly source: EventSource;
}

export type MapResult =
  | { readonly ok: true; readonly event: UnifiedEvent; readonly trace: MappingTrace }
  | { readonly ok: false; readonly errors: readonly string[]; readonly trace: MappingTrace };

/**
 * Maps one raw record onto the unified event shape.
 *
 * Accepted iff a timestamp and an event type were derived (the id always
 * is). Errors are reported in a fixed order: timestamp, then event type.
 * `userId` is only set when a user was found.
 *
 * Pure function: no I/O, the record is embedded as-is in `payload`.
 */
export function mapRecord(record: RawRecord, lineNumber: number, options: MapOptions = {}): MapResult {
  const lookup = options.lookup ?? statelessLookup;
  const clock = options.clock ?? 'utc';

  const id = findId(record, lineNumber, lookup);
  const timestamp = findTimestamp(record, { lookup, clock });
  const user = findUser(record, lookup);
  const eventType = findEventType(record, lookup);
  const source = findSource(record);

  const trace: MappingTrace = {
    id: id.candidates,
    timestamp: timestamp.candidates,
    user: user.candidates,
    eventType: eventType.candidates,
    source,
  };

  const errors: string[] = [];
  if (timestamp.value === undefined) errors.push(MISSING_TIMESTAMP);
  if (eventType.value === undefined) errors.push(MISSING_EVENT_TYPE);

  if (timestamp.value === undefined || eventType.value === undefined) {
    return { ok: false, errors, trace };
  }

  const event: UnifiedEvent = user.value === undefined
    ? {
        id: id.value,
        timestamp: timestamp.value,
        source,
        eventType: eventType.value,
        payload: record,
      }
    : {
        id: id.value,
        timestamp: timestamp.value,
        source,
        eventType: eventType.value,
        userId: user.value,
        payload: record,
      };

  return { ok: true, event, trace };
}
