export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'DOCUMENT_SKIPPED'
  | 'INDEX_UNAVAILABLE'
  | 'RETRIEVAL_TIMEOUT'
  | 'GENERATION_FAILURE'
  | 'VALIDATION_ERROR';

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly httpStatus: number;

  constructor(code: ErrorCode, message: string, options: { retryable?: boolean; httpStatus?: number; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.httpStatus = options.httpStatus ?? 500;
  }
}

/**
 * Missing or invalid settings, or a document source with nothing to index.
 * Fatal at startup.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('CONFIGURATION_ERROR', message, { httpStatus: 500, cause });
  }
}

export class DocumentSkippedError extends AppError {
  readonly documentName: string;
  readonly reason: string;

  constructor(documentName: string, reason: string, cause?: unknown) {
    super('DOCUMENT_SKIPPED', `Skipped ${documentName}: ${reason}`, { httpStatus: 422, cause });
    this.documentName = documentName;
    this.reason = reason;
  }
}

export class IndexUnavailableError extends AppError {
  constructor(message: string = 'Document index is not available yet, retry shortly', cause?: unknown) {
    super('INDEX_UNAVAILABLE', message, { retryable: true, httpStatus: 503, cause });
  }
}

export class RetrievalTimeoutError extends AppError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('RETRIEVAL_TIMEOUT', `Retrieval timed out after ${timeoutMs}ms`, { retryable: true, httpStatus: 504 });
    this.timeoutMs = timeoutMs;
  }
}

export class GenerationFailureError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('GENERATION_FAILURE', message, { retryable: true, httpStatus: 502, cause });
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message, { httpStatus: 400 });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
