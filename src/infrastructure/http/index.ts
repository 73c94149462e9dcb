export { HttpModule } from './http.module';
export { APPLICATION_PROVIDERS, HANDLERS } from './application.providers';
export { unwrapResult, toHttpException } from './result.mapper';
export * from './controllers';
