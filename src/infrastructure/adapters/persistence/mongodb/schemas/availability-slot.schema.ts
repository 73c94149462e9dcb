import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose document for the AvailabilitySlot entity.
 */
@Schema({
  collection: 'availability_slots',
  _id: false,
})
export class AvailabilitySlotDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  courseId!: string;

  @Prop({ required: true })
  instructorId!: string;

  @Prop({ required: true })
  startTime!: Date;

  @Prop({ required: true })
  endTime!: Date;

  @Prop({ required: true })
  priceCents!: number;

  @Prop({ required: true })
  currency!: string;

  @Prop({ required: true, min: 1 })
  maxParticipants!: number;

  @Prop({ required: true, min: 0, default: 0 })
  currentParticipants!: number;

  @Prop({ required: true, default: false })
  isBooked!: boolean;

  @Prop({ required: true, default: true })
  isActive!: boolean;

  @Prop({ type: String, default: null })
  notes!: string | null;

  @Prop({ required: true, default: false })
  isRecurring!: boolean;

  @Prop({ type: String, default: null })
  recurringPattern!: string | null;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  updatedAt!: Date;
}

export type AvailabilitySlotDocumentType = HydratedDocument<AvailabilitySlotDocument>;
export const AvailabilitySlotSchema = SchemaFactory.createForClass(AvailabilitySlotDocument);

AvailabilitySlotSchema.index({ instructorId: 1, startTime: 1 });
AvailabilitySlotSchema.index({ isActive: 1, isBooked: 1, startTime: 1 });
AvailabilitySlotSchema.index({ courseId: 1 });
