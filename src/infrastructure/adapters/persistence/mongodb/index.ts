// Module
export { MongoDBModule } from './mongodb.module';

// Unit of work
export { MongoUnitOfWork, UNIT_OF_WORK_OPTIONS, UnitOfWorkOptions } from './mongo-unit-of-work';
export { MongoSessionContext, SessionScope } from './mongo-session.context';
export { AggregateWriter } from './aggregate-writer';
export { AuditTrailRecorder, resolveAuditAction } from './audit-trail.recorder';

// Repositories
export * from './repositories';

// Schemas
export * from './schemas';

// Mappers
export * from './mappers';
