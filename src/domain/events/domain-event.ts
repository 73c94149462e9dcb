/**
 * Something that happened to an aggregate, recorded by the aggregate itself
 * and published after it is persisted.
 */
export interface DomainEvent {
  readonly name: string;
  readonly aggregateType: string;
  readonly aggregateId: string;
  readonly occurredAt: Date;
  readonly payload: Readonly<Record<string, unknown>>;
}
