import { parseArgs } from 'node:util';
import type { BaseLogger } from 'pino';
import { ConfigError, InputFileError, processLines } from '../../application/index.js';
import type { AppConfig, BatchResult } from '../../application/index.js';
import { createLogger, loadConfig, readLines, writeResults } from '../../infrastructure/index.js';
import type { ConfigOverrides, WrittenResults } from '../../infrastructure/index.js';

export const USAGE = `Usage: event-unifier [input] [options]

Arguments:
  input                        JSONL file to normalize (default: $EVENTS_INPUT or events.jsonl)

Options:
  -o, --out <dir>              Directory for result files (default: $EVENTS_OUTPUT_DIR or .)
  -i, --inventory <strategy>   stateless | categorized (default: $FIELD_INVENTORY or stateless)
  -c, --clock <clock>          utc | local (default: $TIMESTAMP_CLOCK or utc)
  -l, --log-level <level>      pino log level (default: $LOG_LEVEL or info)
  -h, --help                   Show this help message
`;

export interface ParsedCliArgs {
  readonly help: boolean;
  readonly overrides: ConfigOverrides;
}

/** Parses command-line flags into config overrides. Throws on unknown flags. */
export function parseCliArgs(argv: readonly string[]): ParsedCliArgs {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      inventory: { type: 'string', short: 'i' },
      clock: { type: 'string', short: 'c' },
      'log-level': { type: 'string', short: 'l' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  return {
    help: values.help === true,
    overrides: {
      input: positionals[0],
      outputDir: values.out,
      inventory: values.inventory,
      clock: values.clock,
      logLevel: values['log-level'],
    },
  };
}

export interface NormalizeOutcome {
  readonly result: BatchResult;
  readonly written: WrittenResults;
}

/**
 * Reads the input file, normalizes every line and writes both result
 * sets. Only an unreadable input aborts the run (InputFileError).
 */
export function runNormalize(config: AppConfig, log: BaseLogger): NormalizeOutcome {
  log.info({ input: config.input, inventory: config.inventory, clock: config.clock }, 'Processing events...');

  const lines = readLines(config.input);
  const result = processLines(lines, {
    inventory: config.inventory,
    clock: config.clock,
    log,
  });

  const written = writeResults(config.outputDir, result.valid, result.invalid);

  log.info({ path: written.validPath }, `Saved ${result.valid.length} events to ${written.validPath}`);
  if (written.invalidPath !== null) {
    log.info({ path: written.invalidPath }, `Saved ${result.invalid.length} invalid events to ${written.invalidPath}`);
  }

  return { result, written };
}

export type LoggerFactory = (level: string) => BaseLogger;

/**
 * Whole CLI run: flags, configuration, batch. Returns the exit code.
 *
 * 0 on completion (even when every line was rejected), 1 on bad flags,
 * invalid configuration or an unreadable input. Loggers are only built
 * from a validated level; startup failures are reported at `info`.
 */
export function runCli(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  makeLogger: LoggerFactory = createLogger,
): number {
  let args: ParsedCliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`${message}\n\n${USAGE}`);
    return 1;
  }

  if (args.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  try {
    const config = loadConfig(env, args.overrides);
    runNormalize(config, makeLogger(config.logLevel));
    return 0;
  } catch (err: unknown) {
    if (err instanceof ConfigError || err instanceof InputFileError) {
      makeLogger('info').fatal({ err }, err.message);
      return 1;
    }
    throw err;
  }
}
