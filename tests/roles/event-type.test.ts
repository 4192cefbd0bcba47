import { describe, it, expect } from 'vitest';
import { findEventType } from '../../src/domain/roles/event-type.js';
import { record } from './helpers.js';

describe('Event-Type Extractor', () => {
  it('should read type-like fields', () => {
    expect(findEventType(record('{"event_type": "click"}')).value).toBe('click');
    expect(findEventType(record('{"action": "purchase"}')).value).toBe('purchase');
    expect(findEventType(record('{"Type": "view"}')).value).toBe('view');
  });

  it('should return the first truthy candidate in record order', () => {
    const result = findEventType(record('{"type": "", "event": "view", "action": "buy"}'));
    expect(result.value).toBe('view');
    expect(result.candidates).toEqual([
      { field: 'type', accepted: false, reason: 'empty-value' },
      { field: 'event', accepted: true, value: 'view' },
    ]);
  });

  it('should not read primary id fields as the type', () => {
    expect(findEventType(record('{"transaction_id": "T1", "event_id": "E1"}')).value).toBeUndefined();
  });

  it('should serialize structured values', () => {
    expect(findEventType(record('{"event": {"name": "x"}}')).value).toBe('{"name":"x"}');
  });

  it('should infer login from an empty login_event field', () => {
    const result = findEventType(record('{"login_event": null, "user": "u1"}'));
    expect(result.value).toBe('login');
    expect(result.fallback).toBe('login_event');
  });

  it('should infer error from an error field', () => {
    const result = findEventType(record('{"error": "boom", "stack_trace": "at x"}'));
    expect(result.value).toBe('error');
    expect(result.fallback).toBe('error');
  });

  it('should prefer login_event over error', () => {
    expect(findEventType(record('{"error": "boom", "login_event": false}')).value).toBe('login');
  });

  it('should leave the type absent for an empty transaction_type', () => {
    const result = findEventType(record('{"transaction_type": ""}'));
    expect(result.value).toBeUndefined();
    expect(result.fallback).toBe('transaction_type');
  });

  it('should read a non-empty transaction_type as a regular candidate', () => {
    const result = findEventType(record('{"transaction_type": "refund"}'));
    expect(result.value).toBe('refund');
    expect(result.fallback).toBeUndefined();
  });

  it('should be absent without candidates or structural hints', () => {
    const result = findEventType(record('{"amount": 50}'));
    expect(result.value).toBeUndefined();
    expect(result.fallback).toBeUndefined();
  });
});
