import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request, Response } from 'express';
import { MetricsService } from './metrics.service';

/**
 * Records count and latency of every HTTP request, labelled by route.
 */
@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metricsService: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const startTime = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const durationSec = (Date.now() - startTime) / 1000;
          const path = this.normalizePath(this.getRoutePath(request));

          this.metricsService.recordHttpRequest(
            request.method,
            path,
            response.statusCode,
            durationSec,
          );
        },
        error: (error: unknown) => {
          const durationSec = (Date.now() - startTime) / 1000;
          const path = this.normalizePath(this.getRoutePath(request));

          this.metricsService.recordHttpRequest(
            request.method,
            path,
            // Exception filters have not set the status yet
            error instanceof HttpException ? error.getStatus() : 500,
            durationSec,
          );
        },
      }),
    );
  }

  private getRoutePath(request: Request): string {
    const route = request.route as { path?: string } | undefined;
    return route?.path ?? request.url;
  }

  // Unmatched routes still carry raw ids
  normalizePath(path: string): string {
    return path
      .split('?')[0]
      .replace(/\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, '/:id')
      .replace(/\/\d+(?=\/|$)/g, '/:n');
  }
}
