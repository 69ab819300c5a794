export class ProgressError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProgressError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** The uploaded file is not usable delimited text. Aborts the whole import. */
export class ParseError extends ProgressError {
  public readonly line?: number;

  constructor(message: string, line?: number, options?: ErrorOptions) {
    super(message, 'PARSE_ERROR', options);
    this.name = 'ParseError';
    this.line = line;
  }
}

export class FieldCoercionError extends ProgressError {
  constructor(
    public readonly field: string,
    public readonly value: string,
    message: string
  ) {
    super(message, 'FIELD_COERCION');
    this.name = 'FieldCoercionError';
  }
}

export class KeyInvalidError extends ProgressError {
  constructor(
    public readonly field: 'date' | 'week_number',
    public readonly value: string,
    message: string
  ) {
    super(message, 'KEY_INVALID');
    this.name = 'KeyInvalidError';
  }
}

export class PersistError extends ProgressError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'PERSIST_ERROR', options);
    this.name = 'PersistError';
  }
}

export class TimeoutError extends ProgressError {
  constructor(
    public readonly stage: string,
    public readonly timeoutMs: number
  ) {
    super(`Import exceeded ${timeoutMs}ms during ${stage}`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class ValidationError extends ProgressError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'VALIDATION_ERROR', options);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends ProgressError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
