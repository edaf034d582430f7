export type RoffdocErrorCode = 'NO_INPUT' | 'CONFIG_ERROR' | 'SOURCE_READ_ERROR';

/**
 * Failures that stop a whole run. Problems inside a header are diagnostics, not errors;
 * only missing input, bad configuration and unreadable files end up here.
 */
export class RoffdocError extends Error {
  public readonly code: RoffdocErrorCode;
  public override cause?: unknown;

  constructor(code: RoffdocErrorCode, message: string, cause?: unknown) {
    super(message);
    this.code = code;
    this.cause = cause;
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /** Shape printed by `--format json` when a run fails. */
  toJSON(): { name: string; code: RoffdocErrorCode; message: string; cause?: string } {
    const json: { name: string; code: RoffdocErrorCode; message: string; cause?: string } = {
      name: this.name,
      code: this.code,
      message: this.message,
    };
    if (this.cause !== undefined) json.cause = this.cause instanceof Error ? this.cause.message : String(this.cause);
    return json;
  }
}

export class NoInputError extends RoffdocError {
  constructor() {
    super('NO_INPUT', 'No source files were supplied');
  }
}

/** Invalid or unreadable configuration. */
export class ConfigError extends RoffdocError {
  constructor(message: string, cause?: unknown) {
    super('CONFIG_ERROR', message, cause);
  }
}

/** A header named on the command line could not be read. */
export class SourceReadError extends RoffdocError {
  constructor(path: string, cause?: unknown) {
    super('SOURCE_READ_ERROR', `Could not read ${path}`, cause);
  }
}
