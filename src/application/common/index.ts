export * from './result';
export * from './paged-result';
