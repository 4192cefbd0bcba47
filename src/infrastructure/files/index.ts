export { readLines } from './jsonl-reader.js';
export { writeResults, VALID_FILE, INVALID_FILE } from './result-writer.js';
export type { WrittenResults } from './result-writer.js';
