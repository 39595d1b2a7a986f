export const ErrorCodes = {
  ENGINE_FAILURE: 'ENGINE_FAILURE',
  INSUFFICIENT_TEXT: 'INSUFFICIENT_TEXT',
  SECTION_NOT_FOUND: 'SECTION_NOT_FOUND',
  FIELD_AMBIGUOUS: 'FIELD_AMBIGUOUS',
  MISSING_CAUSE_NUMBER: 'MISSING_CAUSE_NUMBER',
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class ExtractionError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ExtractionError';
    this.code = code;
    if (details) {
      this.details = details;
    }
  }
}

/**
 * An OCR engine errored or timed out. Recovered by cascade fallthrough.
 */
export class EngineFailureError extends ExtractionError {
  public readonly engine: string;

  constructor(engine: string, message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.ENGINE_FAILURE, message, details);
    this.name = 'EngineFailureError';
    this.engine = engine;
  }
}

export class InsufficientTextError extends ExtractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INSUFFICIENT_TEXT, message, details);
    this.name = 'InsufficientTextError';
  }
}

export class SectionNotFoundError extends ExtractionError {
  constructor(section: string, details?: Record<string, unknown>) {
    super(ErrorCodes.SECTION_NOT_FOUND, `No anchor matched for ${section} section`, details);
    this.name = 'SectionNotFoundError';
  }
}

export class FieldAmbiguousError extends ExtractionError {
  constructor(field: string, details?: Record<string, unknown>) {
    super(ErrorCodes.FIELD_AMBIGUOUS, `Conflicting separators in ${field}`, details);
    this.name = 'FieldAmbiguousError';
  }
}

/**
 * The case store could not be acquired for writing. Fatal for the current document.
 */
export class StoreUnavailableError extends ExtractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.STORE_UNAVAILABLE, message, details);
    this.name = 'StoreUnavailableError';
  }
}

export class ConfigurationError extends ExtractionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.INVALID_CONFIGURATION, message, details);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
