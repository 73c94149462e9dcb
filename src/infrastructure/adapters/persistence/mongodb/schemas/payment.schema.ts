import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose document for the Payment entity.
 */
@Schema({
  collection: 'payments',
  _id: false,
})
export class PaymentDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  bookingId!: string;

  @Prop({ required: true })
  userId!: string;

  @Prop({ required: true })
  amountCents!: number;

  @Prop({ required: true })
  currency!: string;

  @Prop({ required: true })
  status!: string;

  @Prop({ required: true })
  provider!: string;

  @Prop({ type: String, default: null })
  providerTransactionId!: string | null;

  @Prop({ type: String, default: null })
  failureReason!: string | null;

  @Prop({ type: Date, default: null })
  processedAt!: Date | null;

  @Prop({ type: Number, default: null })
  refundCents!: number | null;

  @Prop({ type: String, default: null })
  refundReason!: string | null;

  @Prop({ type: Date, default: null })
  refundedAt!: Date | null;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  updatedAt!: Date;
}

export type PaymentDocumentType = HydratedDocument<PaymentDocument>;
export const PaymentSchema = SchemaFactory.createForClass(PaymentDocument);

PaymentSchema.index({ bookingId: 1 });
PaymentSchema.index({ userId: 1, createdAt: -1 });
