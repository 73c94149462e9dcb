import { Payment } from '@domain/entities';
import {
  EntityId,
  Money,
  PAYMENT_PROVIDERS,
  PaymentStatus,
  parseEnumeration,
} from '@domain/value-objects';
import { PaymentDocument } from '../schemas';

export class PaymentMapper {
  static toDomain(document: PaymentDocument): Payment {
    return Payment.reconstitute(EntityId.fromString(document._id), {
      bookingId: EntityId.fromString(document.bookingId),
      userId: EntityId.fromString(document.userId),
      amount: Money.fromCents(document.amountCents, document.currency),
      status: PaymentStatus.fromString(document.status),
      provider: parseEnumeration(PAYMENT_PROVIDERS, document.provider, 'PaymentProvider'),
      providerTransactionId: document.providerTransactionId ?? null,
      failureReason: document.failureReason ?? null,
      processedAt: document.processedAt ?? null,
      refundAmount:
        document.refundCents === null || document.refundCents === undefined
          ? null
          : Money.fromCents(document.refundCents, document.currency),
      refundReason: document.refundReason ?? null,
      refundedAt: document.refundedAt ?? null,
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }

  static toDocument(payment: Payment): PaymentDocument {
    const document = new PaymentDocument();
    document._id = payment.id.toString();
    document.bookingId = payment.bookingId.toString();
    document.userId = payment.userId.toString();
    document.amountCents = payment.amount.cents;
    document.currency = payment.amount.currency;
    document.status = payment.status.value;
    document.provider = payment.provider;
    document.providerTransactionId = payment.providerTransactionId;
    document.failureReason = payment.failureReason;
    document.processedAt = payment.processedAt;
    document.refundCents = payment.refundAmount?.cents ?? null;
    document.refundReason = payment.refundReason;
    document.refundedAt = payment.refundedAt;
    document.createdAt = payment.createdAt;
    document.updatedAt = payment.updatedAt;
    return document;
  }
}
