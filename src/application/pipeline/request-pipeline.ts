import { Inject, Injectable } from '@nestjs/common';
import { NextHandler, PIPELINE_BEHAVIORS, PipelineBehavior, RequestHandler } from './pipeline-behavior';
import { Request } from './request';

/**
 * Sends requests to their handler through the registered behaviors.
 * The first behavior in the list is the outermost one.
 *
 * @example
 * ```typescript
 * const result = await this.pipeline.send(new GetCourseByIdQuery(id), this.getCourseById);
 * ```
 */
@Injectable()
export class RequestPipeline {
  constructor(
    @Inject(PIPELINE_BEHAVIORS)
    private readonly behaviors: PipelineBehavior[],
  ) {}

  send<TRequest extends Request<TResponse>, TResponse>(
    request: TRequest,
    handler: RequestHandler<TRequest, TResponse>,
  ): Promise<TResponse> {
    const terminal: NextHandler<TResponse> = () => handler.handle(request);

    const chain = this.behaviors.reduceRight<NextHandler<TResponse>>(
      (next, behavior) => () => behavior.handle(request, next),
      terminal,
    );

    return chain();
  }
}
