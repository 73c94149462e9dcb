import { AvailabilitySlot } from '@domain/entities';
import { EntityId } from '@domain/value-objects';

export interface IAvailabilitySlotRepositoryPort {
  save(slot: AvailabilitySlot): Promise<void>;

  findById(id: EntityId): Promise<AvailabilitySlot | null>;

  /**
   * Retrieves the slots of an instructor ordered by start time.
   */
  findByInstructor(instructorId: EntityId): Promise<AvailabilitySlot[]>;

  /**
   * Retrieves active slots with free seats starting inside [start, end).
   *
   * @param instructorId - Restricts the result to one instructor when given
   */
  findAvailable(start: Date, end: Date, instructorId?: EntityId): Promise<AvailabilitySlot[]>;

  /**
   * Retrieves active slots of an instructor whose time range intersects [start, end).
   *
   * @param excludeId - Slot to leave out, used when moving an existing slot
   */
  findOverlapping(
    instructorId: EntityId,
    start: Date,
    end: Date,
    excludeId?: EntityId,
  ): Promise<AvailabilitySlot[]>;
}
