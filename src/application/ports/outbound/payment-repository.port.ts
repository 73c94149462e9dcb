import { Payment } from '@domain/entities';
import { EntityId } from '@domain/value-objects';

export interface IPaymentRepositoryPort {
  save(payment: Payment): Promise<void>;

  findById(id: EntityId): Promise<Payment | null>;

  findByBooking(bookingId: EntityId): Promise<Payment | null>;

  /**
   * Payments made by a user, newest first.
   */
  findByUser(userId: EntityId): Promise<Payment[]>;
}
