/**
 * Base class for all application-level errors.
 * These errors represent failures in request execution,
 * not domain rule violations (which are in the domain layer).
 */
export abstract class ApplicationError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): { code: string; message: string; name: string } {
    return {
      code: this.code,
      message: this.message,
      name: this.name,
    };
  }
}

// ============ Pipeline Errors ============

/**
 * Raised by the validation behavior for requests whose response is not a Result.
 */
export class RequestValidationError extends ApplicationError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(
    requestName: string,
    public readonly errors: string[],
  ) {
    super(`Validation failed for ${requestName}: ${errors.join('; ')}`);
  }
}

export class MissingCacheInvalidationError extends ApplicationError {
  readonly code = 'MISSING_CACHE_INVALIDATION';
  readonly statusCode = 500;

  constructor(commandName: string) {
    super(
      `Command ${commandName} has no @InvalidatesCache rules. ` +
        'Declare the cache prefixes it affects.',
    );
  }
}

export class InvalidCacheRuleError extends ApplicationError {
  readonly code = 'INVALID_CACHE_RULE';
  readonly statusCode = 500;

  constructor(reason: string) {
    super(`Invalid cache invalidation rule: ${reason}`);
  }
}

// ============ Generic Errors ============

export class UnexpectedError extends ApplicationError {
  readonly code = 'UNEXPECTED_ERROR';
  readonly statusCode = 500;

  constructor(reason: string) {
    super(`An unexpected error occurred: ${reason}`);
  }
}
