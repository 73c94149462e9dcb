export * from './cache-prefixes';
export * from './invalidates-cache.decorator';
