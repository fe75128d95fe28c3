/**
 * Error taxonomy for a coverage run.
 *
 * Fatal errors (`NoInputError`, `WriteError`, `ConfigError`) abort the run.
 * `MalformedRuleError` is recovered inside the fact extractor, and
 * `NoTechniqueFoundWarning` is only ever reported.
 */

export class TechmapError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TechmapError';
  }
}

/** No candidate rule files under the input root. */
export class NoInputError extends TechmapError {
  constructor(
    message: string,
    public readonly root: string,
  ) {
    super(message);
    this.name = 'NoInputError';
  }
}

/** Rule content that does not parse to a YAML mapping. */
export class MalformedRuleError extends TechmapError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MalformedRuleError';
  }
}

/** Output directory creation or file write failed. */
export class WriteError extends TechmapError {
  constructor(
    message: string,
    public readonly outputPath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'WriteError';
  }
}

/** User configuration file is unreadable or fails validation. */
export class ConfigError extends TechmapError {
  constructor(
    message: string,
    public readonly configPath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * A rule file that yielded no technique IDs. Counted as skipped.
 */
export class NoTechniqueFoundWarning {
  readonly name = 'NoTechniqueFoundWarning';

  constructor(public readonly path: string) {}

  get message(): string {
    return `No ATT&CK technique IDs found in ${this.path}`;
  }
}

export type RuleWarning = MalformedRuleError | NoTechniqueFoundWarning;

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
