#!/usr/bin/env node
import { runCli } from './interfaces/cli/normalize-command.js';

/** Batch entry point: normalizes one JSONL file and exits. */
try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (err: unknown) {
  console.error('Fatal: event normalization crashed', err);
  process.exitCode = 1;
}
