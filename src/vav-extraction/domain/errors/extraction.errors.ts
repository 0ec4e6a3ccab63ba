/**
 * Extraction error taxonomy.
 *
 * Only DocumentReadError aborts a run. The others are caught at page or
 * neighborhood level and turned into diagnostics.
 */
export abstract class ExtractionError extends Error {
  /**
   * Stable machine-readable code
   */
  abstract readonly code: string;

  readonly timestamp: string;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.timestamp = new Date().toISOString();
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };
  }
}

/**
 * The document cannot be read at all (empty, not a PDF, encrypted, corrupt)
 */
export class DocumentReadError extends ExtractionError {
  readonly code = 'DOCUMENT_READ_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocumentReadError';
    Object.setPrototypeOf(this, DocumentReadError.prototype);
  }
}

export class EmptyPageError extends ExtractionError {
  readonly code = 'EMPTY_PAGE';

  constructor(readonly page: number) {
    super(`Page ${page + 1} has no embedded text`);
    this.name = 'EmptyPageError';
    Object.setPrototypeOf(this, EmptyPageError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), page: this.page };
  }
}

export class ClassificationTimeoutError extends ExtractionError {
  readonly code = 'CLASSIFICATION_TIMEOUT';

  constructor(readonly timeoutMs: number) {
    super(`Language model classification timed out after ${timeoutMs}ms`);
    this.name = 'ClassificationTimeoutError';
    Object.setPrototypeOf(this, ClassificationTimeoutError.prototype);
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), timeoutMs: this.timeoutMs };
  }
}

export class ValidationFailure extends ExtractionError {
  readonly code = 'VALIDATION_FAILURE';

  constructor(
    message: string,
    readonly boxId: string,
  ) {
    super(message);
    this.name = 'ValidationFailure';
    Object.setPrototypeOf(this, ValidationFailure.prototype);
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), boxId: this.boxId };
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export class InvalidStageTransitionError extends ExtractionError {
  readonly code = 'INVALID_STAGE_TRANSITION';

  constructor(
    readonly from: string,
    readonly to: string,
    allowed: readonly string[],
  ) {
    super(
      `Invalid stage transition: ${from} → ${to}. ` +
        `Valid transitions from ${from}: ${allowed.join(', ') || 'none'}`,
    );
    this.name = 'InvalidStageTransitionError';
    Object.setPrototypeOf(this, InvalidStageTransitionError.prototype);
  }
}
