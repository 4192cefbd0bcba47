import type { RawRecord } from '../../src/domain/index.js';
import { rawRecordSchema } from '../../src/application/record-schema.js';

/** 2025-08-03T06:42:15Z as epoch seconds and milliseconds. */
export const EPOCH_S = 1754203335;
export const EPOCH_MS = 1754203335000;
export const EPOCH_UTC = '2025-08-03T06:42:15Z';

/**
 * Parses JSON text the way the batch driver does, so tests see the
 * same field order a producer's line would have.
 */
export function record(json: string): RawRecord {
  return rawRecordSchema.parse(JSON.parse(json));
}
