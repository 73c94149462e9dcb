import { Payment } from '@domain/entities';

export interface PaymentOutputDto {
  readonly id: string;
  readonly bookingId: string;
  readonly userId: string;
  readonly amount: number;
  readonly currency: string;
  readonly status: string;
  readonly provider: string;
  readonly providerTransactionId: string | null;
  readonly failureReason: string | null;
  readonly processedAt: string | null;
  readonly refundAmount: number | null;
  readonly refundReason: string | null;
  readonly refundedAt: string | null;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export function toPaymentOutput(payment: Payment): PaymentOutputDto {
  return {
    id: payment.id.toString(),
    bookingId: payment.bookingId.toString(),
    userId: payment.userId.toString(),
    amount: payment.amount.amount,
    currency: payment.amount.currency,
    status: payment.status.toString(),
    provider: payment.provider,
    providerTransactionId: payment.providerTransactionId,
    failureReason: payment.failureReason,
    processedAt: payment.processedAt?.toISOString() ?? null,
    refundAmount: payment.refundAmount?.amount ?? null,
    refundReason: payment.refundReason,
    refundedAt: payment.refundedAt?.toISOString() ?? null,
    createdAt: payment.createdAt.toISOString(),
    updatedAt: payment.updatedAt.toISOString(),
  };
}
