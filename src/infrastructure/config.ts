import { configSchema, ConfigError } from '../application/index.js';
import type { AppConfig } from '../application/index.js';

/** Raw string overrides, e.g. command-line flags. */
export type ConfigOverrides = {
  readonly [K in keyof AppConfig]?: string | undefined;
};

/**
 * Loads configuration from environment variables.
 *
 * | Key          | Variable            | Default        |
 * |--------------|---------------------|----------------|
 * | input        | EVENTS_INPUT        | events.jsonl   |
 * | outputDir    | EVENTS_OUTPUT_DIR   | .              |
 * | inventory    | FIELD_INVENTORY     | stateless      |
 * | clock        | TIMESTAMP_CLOCK     | utc            |
 * | logLevel     | LOG_LEVEL           | info           |
 * | host         | HOST                | 0.0.0.0        |
 * | port         | PORT                | 3000           |
 *
 * `overrides` win over the environment. Empty strings count as unset.
 * Throws ConfigError on invalid values.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): AppConfig {
  const pick = (key: keyof AppConfig, name: string): string | undefined => {
    const value = overrides[key] ?? env[name];
    return value === undefined || value === '' ? undefined : value;
  };

  const raw = {
    input: pick('input', 'EVENTS_INPUT'),
    outputDir: pick('outputDir', 'EVENTS_OUTPUT_DIR'),
    inventory: pick('inventory', 'FIELD_INVENTORY')?.toLowerCase(),
    clock: pick('clock', 'TIMESTAMP_CLOCK')?.toLowerCase(),
    logLevel: pick('logLevel', 'LOG_LEVEL')?.toLowerCase(),
    host: pick('host', 'HOST'),
    port: pick('port', 'PORT'),
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return parsed.data;
}
