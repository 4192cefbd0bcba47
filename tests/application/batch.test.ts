import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  BAD_JSON,
  NOT_AN_OBJECT,
  formatSuccessRate,
  parseLine,
  processLines,
  processRecords,
  stageLines,
} from '../../src/application/batch.js';
import { EPOCH_S, EPOCH_UTC } from '../roles/helpers.js';

function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as import('pino').BaseLogger;
}

const LINES = [
  `{"id": "5", "event_type": "click", "ts": ${EPOCH_S}}`,
  '',
  '{"transaction_id": "T1", "amount": 50, "created": "2025-08-01T00:04:25.122Z"}',
  '{not json',
  `{"event": "signup", "user": "u-3", "date": "2025-08-01 09:30:00"}`,
  '   ',
  '[1, 2]',
];

describe('formatSuccessRate', () => {
  it('should format to one decimal place', () => {
    expect(formatSuccessRate(2, 1)).toBe('66.7');
    expect(formatSuccessRate(1, 0)).toBe('100.0');
    expect(formatSuccessRate(0, 3)).toBe('0.0');
  });

  it('should report 0.0 for an empty batch', () => {
    expect(formatSuccessRate(0, 0)).toBe('0.0');
  });
});

describe('parseLine', () => {
  it('should reject invalid JSON without a record', () => {
    expect(parseLine('{"a":', 4)).toEqual({ line: 4, errors: [BAD_JSON] });
  });

  it('should reject JSON that is not an object', () => {
    expect(parseLine('42', 2)).toEqual({ line: 2, errors: [NOT_AN_OBJECT] });
    expect(parseLine('null', 2)).toEqual({ line: 2, errors: [NOT_AN_OBJECT] });
    expect(parseLine('["a"]', 2)).toEqual({ line: 2, errors: [NOT_AN_OBJECT] });
  });

  it('should stage objects as records', () => {
    expect(parseLine('{"a": 1}', 1)).toEqual({ line: 1, record: { a: 1 } });
  });
});

describe('stageLines', () => {
  it('should skip blank lines but keep physical line numbers', () => {
    const staged = stageLines(['{"a": 1}', '', '  ', '{"b": 2}']);
    expect(staged).toEqual([
      { line: 1, record: { a: 1 } },
      { line: 4, record: { b: 2 } },
    ]);
  });
});

describe('processLines', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  it('should partition lines into valid and invalid sets in order', () => {
    const result = processLines(LINES);

    expect(result.valid.map((e) => e.id)).toEqual(['5', 'generated_5']);
    expect(result.invalid.map((r) => r.line)).toEqual([3, 4, 7]);
  });

  it('should build unified events', () => {
    const result = processLines(LINES);

    expect(result.valid[0]).toEqual({
      id: '5',
      timestamp: EPOCH_UTC,
      source: 'internal',
      eventType: 'click',
      payload: { id: '5', event_type: 'click', ts: EPOCH_S },
    });
    expect(result.valid[1]).toEqual({
      id: 'generated_5',
      timestamp: '2025-08-01T09:30:00Z',
      source: 'internal',
      eventType: 'signup',
      userId: 'u-3',
      payload: { event: 'signup', user: 'u-3', date: '2025-08-01 09:30:00' },
    });
  });

  it('should build rejection records', () => {
    const result = processLines(LINES);

    expect(result.invalid).toEqual([
      {
        line: 3,
        errors: ['Missing event type'],
        record: { transaction_id: 'T1', amount: 50, created: '2025-08-01T00:04:25.122Z' },
      },
      { line: 4, errors: ['Bad JSON'] },
      { line: 7, errors: ['Not a JSON object'] },
    ]);
  });

  it('should summarize counts and success rate', () => {
    const result = processLines(LINES);
    expect(result.summary).toEqual({ valid: 2, invalid: 3, successRate: '40.0' });
  });

  it('should report discovered fields sorted', () => {
    const result = processLines(LINES);
    expect(result.fields).toEqual([
      'amount', 'created', 'date', 'event', 'event_type', 'id', 'transaction_id', 'ts', 'user',
    ]);
  });

  it('should log a per-line indicator', () => {
    processLines(LINES, { log });

    const info = vi.mocked(log.info);
    const warn = vi.mocked(log.warn);
    expect(info).toHaveBeenCalledWith({ line: 1 }, '✓ Line 1');
    expect(info).toHaveBeenCalledWith({ line: 5 }, '✓ Line 5');
    expect(warn).toHaveBeenCalledWith({ line: 3 }, '✗ Line 3: Missing event type');
    expect(warn).toHaveBeenCalledWith({ line: 4 }, '✗ Line 4: Bad JSON');
  });

  it('should log the summary', () => {
    processLines(LINES, { log });

    expect(vi.mocked(log.info)).toHaveBeenCalledWith(
      { valid: 2, invalid: 3, successRate: '40.0' },
      'Valid: 2, Invalid: 3, Success rate: 40.0%',
    );
  });

  it('should handle an empty batch', () => {
    const result = processLines(['', '']);
    expect(result.valid).toEqual([]);
    expect(result.invalid).toEqual([]);
    expect(result.summary.successRate).toBe('0.0');
  });

  it('should apply the categorized inventory to identifier tie-breaks', () => {
    const lines = [
      `{"session_id": "s1", "device_id": "d0", "type": "a", "ts": ${EPOCH_S}}`,
      `{"device_id": "d1", "session_id": "s2", "type": "b", "ts": ${EPOCH_S}}`,
    ];

    expect(processLines(lines, { inventory: 'stateless' }).valid.map((e) => e.id)).toEqual(['s1', 'd1']);
    expect(processLines(lines, { inventory: 'categorized' }).valid.map((e) => e.id)).toEqual(['s1', 's2']);
  });

  it('should keep every own key of the record in the payload', () => {
    const result = processLines([`{"__proto__": "x", "type": "a", "ts": ${EPOCH_S}}`]);
    const event = result.valid[0];

    expect(event?.eventType).toBe('a');
    expect(Object.keys(event?.payload ?? {})).toEqual(['__proto__', 'type', 'ts']);
    expect(result.fields).toEqual(['__proto__', 'ts', 'type']);
  });

  it('should keep integer ids past 2^53 exact', () => {
    const result = processLines([`{"id": 12345678901234567891, "type": "a", "ts": ${EPOCH_S}}`]);

    expect(result.valid[0]?.id).toBe('12345678901234567891');
    expect(result.valid[0]?.payload['id']).toBe(12345678901234567891n);
  });
});

describe('processRecords', () => {
  it('should number parsed values from 1', () => {
    const result = processRecords([
      { type: 'a', ts: EPOCH_S },
      'not an object',
      { amount: 1 },
    ]);

    expect(result.valid).toEqual([
      { id: 'generated_1', timestamp: EPOCH_UTC, source: 'internal', eventType: 'a', payload: { type: 'a', ts: EPOCH_S } },
    ]);
    expect(result.invalid).toEqual([
      { line: 2, errors: ['Not a JSON object'] },
      { line: 3, errors: ['Missing timestamp', 'Missing event type'], record: { amount: 1 } },
    ]);
  });
});
