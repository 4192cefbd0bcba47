import { z } from 'zod';

/** Log levels pino accepts. */
const logLevelEnum = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Runtime configuration shared by the CLI and the HTTP server.
 * Every key has a default so an empty environment is valid.
 */
export const configSchema = z.object({
  input: z.string().min(1).default('events.jsonl'),
  outputDir: z.string().min(1).default('.'),
  inventory: z.enum(['stateless', 'categorized']).default('stateless'),
  clock: z.enum(['utc', 'local']).default('utc'),
  logLevel: logLevelEnum.default('info'),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(3000),
});

export type AppConfig = z.infer<typeof configSchema>;
