/**
 * DOMAIN LAYER
 *
 * Core of the marketplace: aggregates, value objects and the rules they enforce.
 * This layer has NO framework dependencies (no NestJS, no Mongoose).
 *
 * Contains:
 * - Entities: Aggregates with identity (User, Course, Booking, Payment, ...)
 * - Value Objects: Immutable values (EntityId, Money, Email, BookingStatus, ...)
 * - Events: Domain events recorded by aggregates
 * - Exceptions: Domain-specific errors (BusinessRuleViolationException, InvalidValueException)
 * - Services: Rules spanning several objects (RefundPolicy)
 *
 * Rules:
 * - NO imports from application or infrastructure layers
 * - Pure TypeScript only
 */

export * from './entities';
export * from './events';
export * from './value-objects';
export * from './exceptions';
export * from './services';
