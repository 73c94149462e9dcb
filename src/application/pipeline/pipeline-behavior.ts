import { Request } from './request';

export type NextHandler<TResponse> = () => Promise<TResponse>;

/**
 * Cross-cutting step wrapped around every request handler.
 * A behavior either calls `next()` and post-processes its result, or
 * short-circuits by returning a response of its own.
 */
export interface PipelineBehavior {
  handle<TResponse>(request: Request<TResponse>, next: NextHandler<TResponse>): Promise<TResponse>;
}

export interface RequestHandler<TRequest extends Request<TResponse>, TResponse> {
  handle(request: TRequest): Promise<TResponse>;
}

/** Injection token for the ordered behavior list */
export const PIPELINE_BEHAVIORS = 'PIPELINE_BEHAVIORS';
