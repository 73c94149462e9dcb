import { Inject, Injectable, Logger } from '@nestjs/common';
import { isResult } from '../../common/result';
import { IRequestMetricsPort } from '../../ports';
import { NextHandler, PipelineBehavior } from '../pipeline-behavior';
import { Request, requestName } from '../request';

export interface PerformanceThresholds {
  slowRequestMs: number;
  moderateRequestMs: number;
}

export const PERFORMANCE_THRESHOLDS = 'PERFORMANCE_THRESHOLDS';

/**
 * Times every request and flags slow ones.
 */
@Injectable()
export class PerformanceMetricsBehavior implements PipelineBehavior {
  private readonly logger = new Logger(PerformanceMetricsBehavior.name);

  constructor(
    @Inject('IRequestMetrics')
    private readonly metrics: IRequestMetricsPort,
    @Inject(PERFORMANCE_THRESHOLDS)
    private readonly thresholds: PerformanceThresholds,
  ) {}

  async handle<TResponse>(
    request: Request<TResponse>,
    next: NextHandler<TResponse>,
  ): Promise<TResponse> {
    const name = requestName(request);
    const startedAt = Date.now();

    try {
      const response = await next();
      const elapsedMs = Date.now() - startedAt;

      if (elapsedMs > this.thresholds.slowRequestMs) {
        this.logger.warn(`${name} took ${elapsedMs}ms - this is slower than expected`);
      } else if (elapsedMs > this.thresholds.moderateRequestMs) {
        this.logger.log(`${name} took ${elapsedMs}ms - moderate performance`);
      } else {
        this.logger.debug(`${name} took ${elapsedMs}ms - good performance`);
      }

      const outcome = isResult(response) && !response.ok ? 'failure' : 'success';
      this.metrics.recordRequest(name, outcome, elapsedMs / 1000);
      return response;
    } catch (error) {
      const elapsedMs = Date.now() - startedAt;
      this.logger.error(
        `${name} failed after ${elapsedMs}ms`,
        error instanceof Error ? error.stack : String(error),
      );
      this.metrics.recordRequest(name, 'error', elapsedMs / 1000);
      throw error;
    }
  }
}
