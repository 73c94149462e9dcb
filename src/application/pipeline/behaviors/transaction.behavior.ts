import { Inject, Injectable, Logger } from '@nestjs/common';
import { isResult } from '../../common/result';
import { IRequestMetricsPort, IUnitOfWorkPort } from '../../ports';
import { NextHandler, PipelineBehavior } from '../pipeline-behavior';
import { Command, Request, requestName } from '../request';

class FailedResultRollback extends Error {
  constructor() {
    super('Request returned a failure result');
  }
}

/**
 * Runs commands inside a unit of work. Thrown errors and failure results
 * both roll the transaction back; a failure result is still returned to the caller.
 * Commands flagged `commitFailedResults` commit their failure results.
 */
@Injectable()
export class TransactionBehavior implements PipelineBehavior {
  private readonly logger = new Logger(TransactionBehavior.name);

  constructor(
    @Inject('IUnitOfWork')
    private readonly unitOfWork: IUnitOfWorkPort,
    @Inject('IRequestMetrics')
    private readonly metrics: IRequestMetricsPort,
  ) {}

  async handle<TResponse>(
    request: Request<TResponse>,
    next: NextHandler<TResponse>,
  ): Promise<TResponse> {
    const name = requestName(request);
    if (!(request instanceof Command)) {
      this.logger.debug(`${name} is not a command, skipping transaction`);
      return next();
    }

    this.logger.log(`Starting transaction for ${name}`);
    const { commitFailedResults } = request;
    const rollback: { failure: { response: TResponse } | null } = { failure: null };

    try {
      const response = await this.unitOfWork.execute(async () => {
        const result = await next();
        if (isResult(result) && !result.ok && !commitFailedResults) {
          rollback.failure = { response: result };
          throw new FailedResultRollback();
        }
        return result;
      });

      this.logger.log(`Committed transaction for ${name}`);
      this.metrics.recordTransaction(name, 'committed');
      return response;
    } catch (error) {
      this.metrics.recordTransaction(name, 'rolled_back');

      if (error instanceof FailedResultRollback && rollback.failure) {
        this.logger.log(`Rolled back transaction for ${name}`);
        return rollback.failure.response;
      }

      this.logger.error(
        `Rolled back transaction for ${name}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }
}
