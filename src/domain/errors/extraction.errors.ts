/**
 * Extraction Errors
 *
 * Every failure the pipeline knows how to classify carries a stable code and
 * whether a retry can change the outcome. Errors from outside this hierarchy
 * (SDK, network) are treated as retryable service failures.
 */
export enum ExtractionErrorCode {
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  UNSUPPORTED_DOCUMENT = 'UNSUPPORTED_DOCUMENT',
  EXTRACTION_TIMEOUT = 'EXTRACTION_TIMEOUT',
  OCR_SERVICE_ERROR = 'OCR_SERVICE_ERROR',
  LOW_QUALITY = 'LOW_QUALITY',
  UNKNOWN = 'UNKNOWN',
}

export interface ExtractionErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export abstract class ExtractionError extends Error {
  abstract readonly code: ExtractionErrorCode;
  abstract readonly retryable: boolean;
  readonly timestamp: Date;
  readonly details?: Record<string, unknown>;

  protected constructor(message: string, options: ExtractionErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.timestamp = new Date();
    this.details = options.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      errorType: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      ...(this.details && { details: this.details }),
      ...(this.cause !== undefined && { originalError: describeCause(this.cause) }),
    };
  }
}

export class DocumentValidationError extends ExtractionError {
  readonly code = ExtractionErrorCode.VALIDATION_FAILED;
  readonly retryable = false;

  constructor(message: string, options?: ExtractionErrorOptions) {
    super(message, options);
  }
}

export class UnsupportedDocumentError extends ExtractionError {
  readonly code = ExtractionErrorCode.UNSUPPORTED_DOCUMENT;
  readonly retryable = false;

  constructor(message: string, options?: ExtractionErrorOptions) {
    super(message, options);
  }
}

export class ExtractionTimeoutError extends ExtractionError {
  readonly code = ExtractionErrorCode.EXTRACTION_TIMEOUT;
  readonly retryable = false;

  constructor(message: string, options?: ExtractionErrorOptions) {
    super(message, options);
  }
}

export class OcrServiceError extends ExtractionError {
  readonly code = ExtractionErrorCode.OCR_SERVICE_ERROR;
  readonly retryable = true;

  constructor(message: string, options?: ExtractionErrorOptions) {
    super(message, options);
  }
}

export class ExtractionQualityError extends ExtractionError {
  readonly code = ExtractionErrorCode.LOW_QUALITY;
  readonly retryable = false;

  constructor(message: string, options?: ExtractionErrorOptions) {
    super(message, options);
  }
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof ExtractionError) {
    return error.retryable;
  }
  return true;
}

export interface ErrorDescription {
  type: string;
  code: string;
  message: string;
  retryable: boolean;
}

export function describeError(error: unknown): ErrorDescription {
  if (error instanceof ExtractionError) {
    return {
      type: error.name,
      code: error.code,
      message: error.message,
      retryable: error.retryable,
    };
  }
  if (error instanceof Error) {
    return {
      type: error.name,
      code: ExtractionErrorCode.UNKNOWN,
      message: error.message,
      retryable: true,
    };
  }
  return {
    type: 'Unknown',
    code: ExtractionErrorCode.UNKNOWN,
    message: String(error),
    retryable: true,
  };
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
}
