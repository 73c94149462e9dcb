import { AvailabilitySlot } from '@domain/entities';

export interface AvailabilitySlotOutputDto {
  readonly id: string;
  readonly courseId: string;
  readonly instructorId: string;
  readonly startTime: string;
  readonly endTime: string;
  readonly durationMinutes: number;
  readonly price: number;
  readonly currency: string;
  readonly maxParticipants: number;
  readonly currentParticipants: number;
  readonly remainingCapacity: number;
  readonly isBooked: boolean;
  readonly isActive: boolean;
  readonly notes: string | null;
  readonly isRecurring: boolean;
  readonly recurringPattern: string | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export function toAvailabilitySlotOutput(slot: AvailabilitySlot): AvailabilitySlotOutputDto {
  return {
    id: slot.id.toString(),
    courseId: slot.courseId.toString(),
    instructorId: slot.instructorId.toString(),
    startTime: slot.startTime.toISOString(),
    endTime: slot.endTime.toISOString(),
    durationMinutes: slot.durationMinutes,
    price: slot.price.amount,
    currency: slot.price.currency,
    maxParticipants: slot.maxParticipants,
    currentParticipants: slot.currentParticipants,
    remainingCapacity: slot.remainingCapacity,
    isBooked: slot.isBooked,
    isActive: slot.isActive,
    notes: slot.notes,
    isRecurring: slot.isRecurring,
    recurringPattern: slot.recurringPattern,
    createdAt: slot.createdAt.toISOString(),
    updatedAt: slot.updatedAt.toISOString(),
  };
}
