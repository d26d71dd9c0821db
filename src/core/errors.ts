export type EtlStage = 'config' | 'extract' | 'load' | 'validate';

export type EtlErrorKind =
  | 'ConnectionError'
  | 'TimeoutError'
  | 'HttpError'
  | 'DecodeError'
  | 'SchemaError'
  | 'WriteError'
  | 'OutputValidationError'
  | 'ConfigError';

/**
 * Base class for every error that aborts a pipeline run. Record-level
 * problems never surface as one of these; they are counted by the transformer.
 */
export abstract class EtlError extends Error {
  public abstract readonly kind: EtlErrorKind;
  public abstract readonly stage: EtlStage;

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConnectionError extends EtlError {
  public readonly kind = 'ConnectionError';
  public readonly stage = 'extract';
}

export class TimeoutError extends EtlError {
  public readonly kind = 'TimeoutError';
  public readonly stage = 'extract';

  constructor(message: string, public readonly timeoutMs: number, cause?: unknown) {
    super(message, cause);
  }
}

export class HttpError extends EtlError {
  public readonly kind = 'HttpError';
  public readonly stage = 'extract';

  constructor(message: string, public readonly status: number, cause?: unknown) {
    super(message, cause);
  }
}

export class DecodeError extends EtlError {
  public readonly kind = 'DecodeError';
  public readonly stage = 'extract';
}

export class SchemaError extends EtlError {
  public readonly kind = 'SchemaError';
  public readonly stage = 'extract';
}

export class WriteError extends EtlError {
  public readonly kind = 'WriteError';
  public readonly stage = 'load';

  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(message, cause);
  }
}

export class OutputValidationError extends EtlError {
  public readonly kind = 'OutputValidationError';
  public readonly stage = 'validate';
}

export class ConfigError extends EtlError {
  public readonly kind = 'ConfigError';
  public readonly stage = 'config';
}

export function isEtlError(error: unknown): error is EtlError {
  return error instanceof EtlError;
}
