import { describe, it, expect } from 'vitest';
import { mapRecord, MISSING_EVENT_TYPE, MISSING_TIMESTAMP } from '../../src/application/record-mapper.js';
import { EPOCH_S, EPOCH_UTC, record } from '../roles/helpers.js';

function pad(n: number, width: number = 2): string {
  return String(n).padStart(width, '0');
}

describe('mapRecord', () => {
  it('should assemble a unified event', () => {
    const raw = record(`{"id": "5", "event_type": "click", "ts": ${EPOCH_S}}`);
    const result = mapRecord(raw, 1);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.event).toEqual({
        id: '5',
        timestamp: EPOCH_UTC,
        source: 'internal',
        eventType: 'click',
        payload: raw,
      });
      expect('userId' in result.event).toBe(false);
      expect(Object.keys(result.event)).toEqual(['id', 'timestamp', 'source', 'eventType', 'payload']);
    }
  });

  it('should embed the raw record verbatim', () => {
    const raw = record(`{"id": "5", "type": "x", "ts": ${EPOCH_S}, "meta": {"a": [1, 2]}}`);
    const result = mapRecord(raw, 1);
    expect(result.ok && result.event.payload).toBe(raw);
  });

  it('should include userId before payload when a user is found', () => {
    const raw = record(`{"event": "login", "user": "u-1", "time": ${EPOCH_S}}`);
    const result = mapRecord(raw, 4);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.event.userId).toBe('u-1');
      expect(result.event.id).toBe('generated_4');
      expect(Object.keys(result.event)).toEqual(['id', 'timestamp', 'source', 'eventType', 'userId', 'payload']);
    }
  });

  it('should omit userId for guest users', () => {
    const result = mapRecord(record(`{"event": "view", "user": "guest", "time": ${EPOCH_S}}`), 1);
    expect(result.ok && 'userId' in result.event).toBe(false);
  });

  it('should reject a vendor record with no event type', () => {
    const raw = record('{"transaction_id": "T1", "amount": 50, "created": "2025-08-01T00:04:25.122Z"}');
    const result = mapRecord(raw, 3);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toEqual([MISSING_EVENT_TYPE]);
      expect(result.trace.source).toBe('vendor');
    }
  });

  it('should report both missing fields in order', () => {
    const result = mapRecord(record('{"amount": 50, "note": "n/a"}'), 2);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toEqual([MISSING_TIMESTAMP, MISSING_EVENT_TYPE]);
      expect(result.errors).toEqual(['Missing timestamp', 'Missing event type']);
    }
  });

  it('should classify a device error and infer its type', () => {
    const raw = record('{"device": "d-9", "error": "E_TEMP", "stack_trace": "at read()", "occurred_at": "2025-08-01 10:00:00"}');
    const result = mapRecord(raw, 8);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.event.source).toBe('device');
      expect(result.event.eventType).toBe('error');
      expect(result.event.timestamp).toBe('2025-08-01T10:00:00Z');
      expect(result.event.id).toBe('generated_8');
    }
  });

  it('should never reject for a missing identifier or user', () => {
    const result = mapRecord(record(`{"action": "ping", "ts": ${EPOCH_S}}`), 11);
    expect(result.ok).toBe(true);
  });

  it('should expose the candidate trace', () => {
    const result = mapRecord(record('{"date": "invalid-date", "type": "x"}'), 1);

    expect(result.ok).toBe(false);
    expect(result.trace.timestamp).toEqual([{ field: 'date', accepted: false, reason: 'invalid-date' }]);
    expect(result.trace.eventType).toEqual([{ field: 'type', accepted: true, value: 'x' }]);
  });

  it('should honour the local clock option', () => {
    const raw = record(`{"type": "x", "ts": ${EPOCH_S}}`);
    const d = new Date(EPOCH_S * 1000);
    const expected = `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`
      + `T${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}Z`;

    const local = mapRecord(raw, 1, { clock: 'local' });
    const utc = mapRecord(raw, 1, { clock: 'utc' });

    expect(local.ok && local.event.timestamp).toBe(expected);
    expect(local.trace.timestamp).toEqual([{ field: 'ts', accepted: true, value: expected }]);
    expect(utc.ok && utc.event.timestamp).toBe(EPOCH_UTC);
  });
});
