import { AvailabilitySlot } from '@domain/entities';
import { EntityId, Money } from '@domain/value-objects';
import { AvailabilitySlotDocument } from '../schemas';

export class AvailabilitySlotMapper {
  static toDomain(document: AvailabilitySlotDocument): AvailabilitySlot {
    return AvailabilitySlot.reconstitute(EntityId.fromString(document._id), {
      courseId: EntityId.fromString(document.courseId),
      instructorId: EntityId.fromString(document.instructorId),
      startTime: document.startTime,
      endTime: document.endTime,
      price: Money.fromCents(document.priceCents, document.currency),
      maxParticipants: document.maxParticipants,
      currentParticipants: document.currentParticipants,
      isBooked: document.isBooked,
      isActive: document.isActive,
      notes: document.notes ?? null,
      isRecurring: document.isRecurring,
      recurringPattern: document.recurringPattern ?? null,
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }

  static toDocument(slot: AvailabilitySlot): AvailabilitySlotDocument {
    const document = new AvailabilitySlotDocument();
    document._id = slot.id.toString();
    document.courseId = slot.courseId.toString();
    document.instructorId = slot.instructorId.toString();
    document.startTime = slot.startTime;
    document.endTime = slot.endTime;
    document.priceCents = slot.price.cents;
    document.currency = slot.price.currency;
    document.maxParticipants = slot.maxParticipants;
    document.currentParticipants = slot.currentParticipants;
    document.isBooked = slot.isBooked;
    document.isActive = slot.isActive;
    document.notes = slot.notes;
    document.isRecurring = slot.isRecurring;
    document.recurringPattern = slot.recurringPattern;
    document.createdAt = slot.createdAt;
    document.updatedAt = slot.updatedAt;
    return document;
  }
}
