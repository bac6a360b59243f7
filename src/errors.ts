/**
 * Custom error classes for the competition engine and its HTTP layer
 */

/**
 * Base error class for application-specific errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when input or a trio composition fails validation
 */
export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, cause);
  }
}

export class UnknownCategoryTypeError extends AppError {
  constructor(categoryType: string) {
    super(`Unknown category type '${categoryType}'`, 'UNKNOWN_CATEGORY_TYPE', 400);
  }
}

export class InvalidPlacementError extends AppError {
  constructor(placement: number, fieldSize: number) {
    super(
      `Placement ${placement} is outside the field of ${fieldSize} entries`,
      'INVALID_PLACEMENT',
      400
    );
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: number | string) {
    super(`${entity} ${id} not found`, 'NOT_FOUND', 404);
  }
}

export class DuplicateQuotaError extends AppError {
  constructor(competitorId: number, eventId: number, categoryId: number) {
    super(
      `Competitor ${competitorId} already has a participation quota for event ${eventId}, category ${categoryId}`,
      'DUPLICATE_QUOTA',
      409
    );
  }
}

/**
 * Business-level refusal: the competitor has no runs left. Not a system fault.
 */
export class QuotaExhaustedError extends AppError {
  constructor(competitorId: number, maxRunsAllowed: number) {
    super(
      `Competitor ${competitorId} has used all ${maxRunsAllowed} allowed runs`,
      'QUOTA_EXHAUSTED',
      409
    );
  }
}

export class QuotaBlockedError extends AppError {
  constructor(competitorId: number, reason: string) {
    super(`Competitor ${competitorId} is blocked: ${reason}`, 'QUOTA_BLOCKED', 409);
  }
}

/**
 * Error thrown when a compare-and-set update loses against a concurrent writer
 */
export class ConcurrencyError extends AppError {
  constructor(message: string) {
    super(message, 'CONCURRENT_UPDATE', 409);
  }
}

/**
 * Error thrown when stored data contradicts itself (e.g. a result whose trio was deleted).
 * The batch that detected it is rolled back.
 */
export class ConsistencyError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONSISTENCY_ERROR', 500, cause);
  }
}

export class TransactionTimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super(`Transaction timed out after ${timeoutMs}ms and was rolled back`, 'TRANSACTION_TIMEOUT', 504);
  }
}
