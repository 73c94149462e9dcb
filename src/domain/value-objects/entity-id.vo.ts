import { randomUUID } from 'crypto';
import { InvalidValueException } from '../exceptions';

/**
 * Value Object representing the identifier of any aggregate.
 * Identifiers are UUID strings so they can be generated before persistence.
 */
export class EntityId {
  private constructor(public readonly value: string) {
    this.validate();
  }

  // Factory method: create from existing string (e.g., from database)
  static fromString(id: string): EntityId {
    return new EntityId(id.trim());
  }

  // Factory method: generate new unique ID
  static generate(): EntityId {
    return new EntityId(randomUUID());
  }

  private validate(): void {
    if (!this.value || this.value.length === 0) {
      throw new InvalidValueException('EntityId', 'cannot be empty');
    }
  }

  equals(other: EntityId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
