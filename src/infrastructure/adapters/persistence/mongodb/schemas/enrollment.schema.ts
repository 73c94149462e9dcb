import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose document for the Enrollment entity.
 */
@Schema({
  collection: 'enrollments',
  _id: false,
})
export class EnrollmentDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  studentId!: string;

  @Prop({ required: true })
  courseId!: string;

  @Prop({ required: true })
  enrolledAt!: Date;

  @Prop({ required: true, default: true })
  isActive!: boolean;

  @Prop({ required: true, min: 0, max: 100, default: 0 })
  progressPercentage!: number;

  @Prop({ type: Date, default: null })
  completedAt!: Date | null;

  @Prop({ type: Date, default: null })
  lastAccessedAt!: Date | null;

  @Prop({ type: [String], default: [] })
  completedMaterialIds!: string[];

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  updatedAt!: Date;
}

export type EnrollmentDocumentType = HydratedDocument<EnrollmentDocument>;
export const EnrollmentSchema = SchemaFactory.createForClass(EnrollmentDocument);

EnrollmentSchema.index({ studentId: 1, courseId: 1 }, { unique: true });
EnrollmentSchema.index({ courseId: 1, isActive: 1 });
