import { DomainException } from '@domain/exceptions';

/**
 * Outcome of a use case. A plain object, so it can be cached and serialized
 * as-is.
 *
 * @example
 * ```typescript
 * const result = await pipeline.send(new GetCourseByIdQuery(id), handler);
 * if (result.ok) {
 *   console.log(result.value.title);
 * } else {
 *   console.log(result.kind, result.errors);
 * }
 * ```
 */
export type FailureKind = 'failure' | 'validation' | 'not_found' | 'conflict' | 'unauthorized';

export interface Success<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Failure {
  readonly ok: false;
  readonly kind: FailureKind;
  readonly errors: string[];
}

export type Result<T> = Success<T> | Failure;

export const success = <T>(value: T): Result<T> => ({ ok: true, value });

export const failure = (...errors: string[]): Failure => ({
  ok: false,
  kind: 'failure',
  errors,
});

export const validationFailure = (errors: string[]): Failure => ({
  ok: false,
  kind: 'validation',
  errors: [...errors],
});

export const notFound = (message = 'Entity Not Found'): Failure => ({
  ok: false,
  kind: 'not_found',
  errors: [message],
});

export const unauthorized = (message = 'Unauthorized access'): Failure => ({
  ok: false,
  kind: 'unauthorized',
  errors: [message],
});

export const conflict = (message = 'Entity already exists'): Failure => ({
  ok: false,
  kind: 'conflict',
  errors: [message],
});

export const isSuccess = <T>(result: Result<T>): result is Success<T> => result.ok;

export const isFailure = <T>(result: Result<T>): result is Failure => !result.ok;

// Transform the success value; failures pass through untouched
export const mapResult = <T, U>(result: Result<T>, fn: (value: T) => U): Result<U> =>
  result.ok ? success(fn(result.value)) : result;

export const isResult = (value: unknown): value is Result<unknown> => {
  if (typeof value !== 'object' || value === null || !('ok' in value)) {
    return false;
  }
  if (value.ok === true) {
    return 'value' in value;
  }
  return value.ok === false && 'kind' in value && 'errors' in value && Array.isArray(value.errors);
};

/**
 * Runs domain logic and turns a rule violation into a failure result.
 * Anything that is not a DomainException propagates.
 */
export const fromDomain = async <T>(fn: () => Promise<Result<T>>): Promise<Result<T>> => {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof DomainException) {
      return failure(error.message);
    }
    throw error;
  }
};
