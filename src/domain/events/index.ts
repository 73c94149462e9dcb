export { DomainEvent } from './domain-event';
export { AggregateRoot } from './aggregate-root';
