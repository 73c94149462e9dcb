import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose document for course ratings.
 */
@Schema({
  collection: 'course_ratings',
  _id: false,
})
export class CourseRatingDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  courseId!: string;

  @Prop({ required: true })
  studentId!: string;

  @Prop({ required: true, min: 1, max: 5 })
  rating!: number;

  @Prop({ type: String, default: null })
  review!: string | null;

  @Prop({ required: true, default: true })
  isPublic!: boolean;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  updatedAt!: Date;
}

export type CourseRatingDocumentType = HydratedDocument<CourseRatingDocument>;
export const CourseRatingSchema = SchemaFactory.createForClass(CourseRatingDocument);

CourseRatingSchema.index({ courseId: 1, studentId: 1 }, { unique: true });
CourseRatingSchema.index({ courseId: 1, isPublic: 1, createdAt: -1 });

/**
 * Mongoose document for instructor ratings. One per completed booking.
 */
@Schema({
  collection: 'instructor_ratings',
  _id: false,
})
export class InstructorRatingDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  instructorId!: string;

  @Prop({ required: true })
  studentId!: string;

  @Prop({ required: true })
  bookingId!: string;

  @Prop({ required: true, min: 1, max: 5 })
  rating!: number;

  @Prop({ type: String, default: null })
  review!: string | null;

  @Prop({ required: true, default: true })
  isPublic!: boolean;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  updatedAt!: Date;
}

export type InstructorRatingDocumentType = HydratedDocument<InstructorRatingDocument>;
export const InstructorRatingSchema = SchemaFactory.createForClass(InstructorRatingDocument);

InstructorRatingSchema.index({ bookingId: 1 }, { unique: true });
InstructorRatingSchema.index({ instructorId: 1, isPublic: 1, createdAt: -1 });
