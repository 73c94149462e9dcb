import { Result, validationFailure } from '../common/result';

/**
 * Base class of everything sent through the request pipeline.
 * `TResponse` is carried as a phantom type so handlers and the pipeline agree on it.
 */
export abstract class Request<TResponse> {
  declare readonly __response?: TResponse;

  /**
   * Response to return instead of running the handler when validation fails.
   * Requests without it make the validation behavior throw.
   */
  validationFailure?(errors: string[]): TResponse;
}

/** A request that changes state. Runs in a transaction and invalidates cache. */
export abstract class Command<TResponse> extends Request<TResponse> {
  /**
   * Commit even when the handler returns a failure result, for commands whose
   * failures still change state (a failed login attempt is counted).
   */
  readonly commitFailedResults: boolean = false;
}

/** A read-only request. */
export abstract class Query<TResponse> extends Request<TResponse> {}

export abstract class ResultCommand<T> extends Command<Result<T>> {
  validationFailure(errors: string[]): Result<T> {
    return validationFailure(errors);
  }
}

export abstract class ResultQuery<T> extends Query<Result<T>> {
  validationFailure(errors: string[]): Result<T> {
    return validationFailure(errors);
  }
}

/**
 * Opt-in caching for queries.
 */
export interface CacheableRequest {
  readonly cacheDurationSeconds: number;
  /** Defaults to the request class name */
  readonly cachePrefix?: string;
  /** Replaces the generated key when it returns a non-empty string */
  getCacheKey?(): string;
}

export const isCacheable = (request: object): request is CacheableRequest =>
  'cacheDurationSeconds' in request && typeof request.cacheDurationSeconds === 'number';

export const requestName = (request: object): string => request.constructor.name;
