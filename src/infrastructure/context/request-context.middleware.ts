import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { RequestContext } from './request-context';

function header(request: Request, name: string): string | null {
  const value = request.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim().length > 0 ? first.trim() : null;
}

@Injectable()
export class RequestContextMiddleware implements NestMiddleware {
  constructor(private readonly context: RequestContext) {}

  use(request: Request, _response: Response, next: NextFunction): void {
    this.context.run(
      {
        requestId: header(request, 'x-request-id'),
        userId: header(request, 'x-user-id'),
        ipAddress: request.ip ?? null,
        userAgent: header(request, 'user-agent'),
      },
      next,
    );
  }
}
