import { Injectable, Logger } from '@nestjs/common';
import { NextHandler, PipelineBehavior } from '../pipeline-behavior';
import { Request, requestName } from '../request';

@Injectable()
export class LoggingBehavior implements PipelineBehavior {
  private readonly logger = new Logger(LoggingBehavior.name);

  async handle<TResponse>(
    request: Request<TResponse>,
    next: NextHandler<TResponse>,
  ): Promise<TResponse> {
    const name = requestName(request);
    this.logger.log(`Handling ${name}`);

    const startedAt = Date.now();
    const response = await next();

    this.logger.log(`Handled ${name} in ${Date.now() - startedAt}ms`);
    return response;
  }
}
