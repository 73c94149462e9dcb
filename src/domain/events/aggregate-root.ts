import { EntityId } from '../value-objects';
import { DomainEvent } from './domain-event';

/**
 * Base class for aggregates that record domain events.
 * Repositories call pullDomainEvents() after a successful save.
 */
export abstract class AggregateRoot {
  private _domainEvents: DomainEvent[] = [];

  protected constructor(public readonly id: EntityId) {}

  get domainEvents(): readonly DomainEvent[] {
    return [...this._domainEvents];
  }

  pullDomainEvents(): DomainEvent[] {
    const events = this._domainEvents;
    this._domainEvents = [];
    return events;
  }

  protected record(name: string, payload: Record<string, unknown> = {}): void {
    this._domainEvents.push({
      name,
      aggregateType: this.constructor.name,
      aggregateId: this.id.toString(),
      occurredAt: new Date(),
      payload,
    });
  }

  equals(other: AggregateRoot): boolean {
    return this.constructor === other.constructor && this.id.equals(other.id);
  }
}
