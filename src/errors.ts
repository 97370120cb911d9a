/**
 * Process exit codes, one per class of failure
 */
export const ExitCode = {
  Success: 0,
  BuildFailed: 1,
  Usage: 2,
  Config: 3,
  Metadata: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Base class for errors that map to a specific exit code
 */
export class MdsiteError extends Error {
  constructor(
    message: string,
    public readonly exitCode: ExitCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "MdsiteError";
  }
}

export class UsageError extends MdsiteError {
  constructor(message: string) {
    super(message, ExitCode.Usage);
    this.name = "UsageError";
  }
}

/**
 * Bad config file, missing content root, unsafe output directory
 */
export class ConfigError extends MdsiteError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, ExitCode.Config, options);
    this.name = "ConfigError";
  }
}

/**
 * A front-matter block that is present but cannot be read
 */
export class FrontmatterError extends MdsiteError {
  constructor(
    public readonly file: string,
    public readonly reason: string,
    options?: ErrorOptions
  ) {
    super(`${file}: ${reason}`, ExitCode.Metadata, options);
    this.name = "FrontmatterError";
  }
}

/**
 * One content file failed to convert. `file` is relative to the content root.
 */
export class ConversionError extends Error {
  constructor(
    public readonly file: string,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ConversionError";
  }
}

/**
 * Best-effort message for an unknown thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
