export { loadConfig } from './config.js';
export type { ConfigOverrides } from './config.js';
export { createLogger } from './logger.js';
export { readLines, writeResults, VALID_FILE, INVALID_FILE } from './files/index.js';
export type { WrittenResults } from './files/index.js';
