export { ContextModule } from './context.module';
export { RequestContext, RequestMetadata } from './request-context';
export { RequestContextMiddleware } from './request-context.middleware';
