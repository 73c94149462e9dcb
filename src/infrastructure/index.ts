/**
 * INFRASTRUCTURE LAYER
 *
 * Contains all external implementations and framework-specific code.
 *
 * Contains:
 * - Adapters: MongoDB repositories and the unit of work
 * - HTTP: NestJS controllers and request DTOs
 * - Cache, config, logging, metrics and password hashing
 *
 * Rules:
 * - CAN import from domain and application layers
 * - Implements interfaces defined in application/ports
 * - Contains all framework-specific code (NestJS, Mongoose, etc.)
 */

export * from './adapters';
export * from './config';
