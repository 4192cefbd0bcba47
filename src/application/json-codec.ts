import { isInteger, isSafeNumber, parse, stringify } from 'lossless-json';
import { hasField, isRawRecord } from '../domain/index.js';

/** Integers beyond 2^53 become `bigint`; every other number stays a `number`. */
function parseExactNumber(text: string): number | bigint {
  return isInteger(text) && !isSafeNumber(text) ? BigInt(text) : parseFloat(text);
}

function hasUnsafeInteger(value: unknown): boolean {
  if (typeof value === 'number') return Number.isInteger(value) && !Number.isSafeInteger(value);
  if (Array.isArray(value)) return value.some(hasUnsafeInteger);
  if (isRawRecord(value)) return Object.values(value).some(hasUnsafeInteger);
  return false;
}

/**
 * Copies exact integers from `exact` into the matching positions of
 * `loose`. Structure, key order and own keys such as `__proto__` are
 * taken from `loose`.
 */
function restoreIntegers(loose: unknown, exact: unknown): unknown {
  if (typeof loose === 'number') {
    return typeof exact === 'bigint' ? exact : loose;
  }

  if (Array.isArray(loose)) {
    if (!Array.isArray(exact)) return loose;
    for (let i = 0; i < loose.length; i++) {
      loose[i] = restoreIntegers(loose[i], exact[i]);
    }
    return loose;
  }

  if (isRawRecord(loose) && isRawRecord(exact)) {
    for (const key of Object.keys(loose)) {
      if (!hasField(exact, key)) continue;
      const restored = restoreIntegers(loose[key], exact[key]);
      if (restored !== loose[key]) loose[key] = restored;
    }
  }

  return loose;
}

/**
 * Parses one JSON text without losing integer precision.
 *
 * Throws a SyntaxError on invalid JSON, like `JSON.parse`.
 */
export function parseJson(text: string): unknown {
  const value: unknown = JSON.parse(text);
  if (!hasUnsafeInteger(value)) return value;

  let exact: unknown;
  try {
    exact = parse(text, undefined, parseExactNumber);
  } catch (err: unknown) {
    // lossless-json refuses duplicate keys that JSON.parse resolves last-wins.
    if (err instanceof SyntaxError) return value;
    throw err;
  }
  return restoreIntegers(value, exact);
}

/** Serializes like `JSON.stringify`, writing `bigint` values as plain numbers. */
export function stringifyJson(value: unknown, space?: number): string {
  return stringify(value, undefined, space) ?? 'null';
}
