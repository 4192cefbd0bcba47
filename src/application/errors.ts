/** The batch input could not be opened or read. The only fatal batch error. */
export class InputFileError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Cannot read input file "${path}"`, { cause });
    this.name = 'InputFileError';
    this.path = path;
  }
}

/** Configuration from the environment or the command line failed validation. */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
