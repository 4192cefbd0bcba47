export { rawRecordSchema, normalizeRequestSchema } from './record-schema.js';
export type { NormalizeRequest } from './record-schema.js';
export { configSchema } from './config-schema.js';
export type { AppConfig } from './config-schema.js';
export { InputFileError, ConfigError } from './errors.js';
export { buildFieldInventory, describeInventory, createCategorizedLookup, resolveLookup } from './field-inventory.js';
export type { FieldInventory } from './field-inventory.js';
export { mapRecord, MISSING_TIMESTAMP, MISSING_EVENT_TYPE } from './record-mapper.js';
export type { MapOptions, MapResult, MappingTrace } from './record-mapper.js';
export {
  processLines,
  processRecords,
  runBatch,
  stageLines,
  stageRecords,
  parseLine,
  formatSuccessRate,
  BAD_JSON,
  NOT_AN_OBJECT,
} from './batch.js';
export type { BatchOptions, BatchResult, BatchSummary, StagedEntry } from './batch.js';
export { parseJson, stringifyJson } from './json-codec.js';
