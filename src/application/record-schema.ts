import { z } from 'zod';
import { isRawRecord } from '../domain/index.js';
import type { RawRecord } from '../domain/index.js';

/**
 * A raw record is any JSON object. Field values are left open:
 * role detection decides what they mean, and nested values pass
 * through untouched in the payload. Arrays and scalars are rejected.
 * The parsed value is the input object itself, every own key kept.
 */
export const rawRecordSchema = z.custom<RawRecord>(isRawRecord, { message: 'Expected a JSON object' });

/**
 * Schema for POST /api/v1/normalize.
 *
 * Either JSONL-style `lines` (each one JSON text, empty ones skipped)
 * or already-parsed `records`. Exactly one of the two.
 */
export const normalizeRequestSchema = z.union([
  z.object({
    lines: z.array(z.string()).min(1, 'lines must contain at least one entry'),
  }).strict(),
  z.object({
    records: z.array(z.unknown()).min(1, 'records must contain at least one entry'),
  }).strict(),
]);

export type NormalizeRequest = z.infer<typeof normalizeRequestSchema>;
