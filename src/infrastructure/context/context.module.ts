import { Global, Module } from '@nestjs/common';
import { RequestContext } from './request-context';
import { RequestContextMiddleware } from './request-context.middleware';

@Global()
@Module({
  providers: [RequestContext, RequestContextMiddleware],
  exports: [RequestContext, RequestContextMiddleware],
})
export class ContextModule {}
