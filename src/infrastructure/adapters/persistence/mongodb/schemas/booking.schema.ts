import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose document for the Booking entity.
 */
@Schema({
  collection: 'bookings',
  _id: false,
})
export class BookingDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  studentId!: string;

  @Prop({ required: true })
  instructorId!: string;

  @Prop({ required: true })
  courseId!: string;

  @Prop({ required: true })
  availabilitySlotId!: string;

  @Prop({ required: true })
  status!: string;

  @Prop({ required: true })
  amountCents!: number;

  @Prop({ required: true, default: 0 })
  discountCents!: number;

  @Prop({ required: true })
  currency!: string;

  @Prop({ type: String, default: null })
  promoCode!: string | null;

  @Prop({ type: String, default: null })
  studentNotes!: string | null;

  @Prop({ type: String, default: null })
  instructorNotes!: string | null;

  @Prop({ type: String, default: null })
  cancellationReason!: string | null;

  @Prop({ type: Date, default: null })
  confirmedAt!: Date | null;

  @Prop({ type: Date, default: null })
  cancelledAt!: Date | null;

  @Prop({ type: Date, default: null })
  completedAt!: Date | null;

  @Prop({ type: String, default: null })
  paymentId!: string | null;

  @Prop({ type: String, default: null })
  rescheduledFromSlotId!: string | null;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  updatedAt!: Date;
}

export type BookingDocumentType = HydratedDocument<BookingDocument>;
export const BookingSchema = SchemaFactory.createForClass(BookingDocument);

BookingSchema.index({ studentId: 1, createdAt: -1 });
BookingSchema.index({ instructorId: 1, createdAt: -1 });
BookingSchema.index({ status: 1 });
BookingSchema.index({ studentId: 1, availabilitySlotId: 1, status: 1 });
