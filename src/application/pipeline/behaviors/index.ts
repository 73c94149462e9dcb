export * from './validation.behavior';
export * from './caching.behavior';
export * from './performance-metrics.behavior';
export * from './transaction.behavior';
export * from './cache-invalidation.behavior';
export * from './logging.behavior';
