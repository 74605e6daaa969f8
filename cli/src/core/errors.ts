/**
 * Error types shared by the pipeline stages.
 */

export class InvalidCommandError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = 'InvalidCommandError';
    this.field = field;
  }
}

export type ParseErrorKind =
  | 'too_large'
  | 'malformed'
  | 'declined'
  | 'unknown_action'
  | 'program_not_allowed'
  | 'schema'
  | 'invalid_command';

export class ParseError extends Error {
  readonly kind: ParseErrorKind;

  constructor(kind: ParseErrorKind, message: string) {
    super(message);
    this.name = 'ParseError';
    this.kind = kind;
  }
}

export class PolicyLoadError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid policy:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
    this.name = 'PolicyLoadError';
    this.errors = errors;
  }
}

/** The audit sink cannot be written. Unlike every other pipeline failure, this one propagates. */
export class AuditWriteError extends Error {
  readonly logPath: string;

  constructor(logPath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Audit log ${logPath} is not writable: ${detail}`);
    this.name = 'AuditWriteError';
    this.logPath = logPath;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
