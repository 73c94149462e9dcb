/**
 * APPLICATION LAYER
 *
 * Orchestrates the domain for the marketplace's use cases. Every command and
 * query goes through the request pipeline (validation, caching, metrics,
 * transaction, cache invalidation, logging) before its handler runs.
 *
 * Rules:
 * - CAN import from domain layer
 * - CANNOT import from infrastructure layer
 * - Defines interfaces (ports) that infrastructure implements
 */

export * from './common';
export * from './errors';
export * from './dtos';
export * from './ports';
export * from './pipeline';
export * from './caching';
export * from './services';
export * from './use-cases';
