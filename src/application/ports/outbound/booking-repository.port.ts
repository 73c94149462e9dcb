import { Booking } from '@domain/entities';
import { BookingStatusValue, EntityId } from '@domain/value-objects';

export interface IBookingRepositoryPort {
  save(booking: Booking): Promise<void>;

  findById(id: EntityId): Promise<Booking | null>;

  /**
   * Bookings made by a student, newest first.
   */
  findByStudent(studentId: EntityId): Promise<Booking[]>;

  /**
   * Bookings on an instructor's slots, newest first.
   */
  findByInstructor(instructorId: EntityId): Promise<Booking[]>;

  findByStatus(status: BookingStatusValue): Promise<Booking[]>;

  /**
   * @returns the pending, confirmed or rescheduled booking of the student on the slot, if any
   */
  findActiveForStudentAndSlot(studentId: EntityId, slotId: EntityId): Promise<Booking | null>;
}
