export enum DiagnosticReason {
  EMPTY_PAGE = 'EMPTY_PAGE',
  PAGE_READ_FAILED = 'PAGE_READ_FAILED',
  PAGE_LIMIT_EXCEEDED = 'PAGE_LIMIT_EXCEEDED',
  CLASSIFICATION_TIMEOUT = 'CLASSIFICATION_TIMEOUT',
  CLASSIFICATION_FAILED = 'CLASSIFICATION_FAILED',
  CANCELLED = 'CANCELLED',
  VALIDATION_FAILURE = 'VALIDATION_FAILURE',
  FIELD_REJECTED = 'FIELD_REJECTED',
  UNASSIGNED_DISCARDED = 'UNASSIGNED_DISCARDED',
  NO_RECORDS = 'NO_RECORDS',
}
