import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose subdocument for course materials.
 */
@Schema({ _id: false })
export class CourseMaterialDocument {
  @Prop({ required: true })
  id!: string;

  @Prop({ required: true })
  title!: string;

  @Prop({ type: String, default: null })
  description!: string | null;

  @Prop({ required: true })
  fileUrl!: string;

  @Prop({ required: true })
  fileType!: string;

  @Prop({ type: String, default: null })
  fileName!: string | null;

  @Prop({ type: Number, default: null })
  fileSizeBytes!: number | null;

  @Prop({ required: true, min: 0 })
  orderIndex!: number;

  @Prop({ required: true, default: false })
  isFree!: boolean;

  @Prop({ required: true, default: true })
  isRequired!: boolean;

  @Prop({ type: Number, default: null })
  durationMinutes!: number | null;
}

export const CourseMaterialSchema = SchemaFactory.createForClass(CourseMaterialDocument);

/**
 * Mongoose document for the Course aggregate. Materials are embedded.
 */
@Schema({
  collection: 'courses',
  _id: false,
})
export class CourseDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  instructorId!: string;

  @Prop({ required: true })
  title!: string;

  @Prop({ required: true })
  description!: string;

  @Prop({ type: String, default: null })
  shortDescription!: string | null;

  @Prop({ type: String, default: null })
  content!: string | null;

  @Prop({ required: true })
  category!: string;

  @Prop({ type: String, default: null })
  difficultyLevel!: string | null;

  @Prop({ type: [String], default: [] })
  tags!: string[];

  @Prop({ required: true })
  priceCents!: number;

  @Prop({ required: true })
  currency!: string;

  @Prop({ type: Number, default: null })
  durationMinutes!: number | null;

  @Prop({ type: Number, default: null })
  maxStudents!: number | null;

  @Prop({ type: String, default: null })
  thumbnailUrl!: string | null;

  @Prop({ type: String, default: null })
  videoIntroUrl!: string | null;

  @Prop({ required: true, default: false })
  isPublished!: boolean;

  @Prop({ type: Date, default: null })
  publishedAt!: Date | null;

  @Prop({ type: Date, default: null })
  deletedAt!: Date | null;

  @Prop({ type: [CourseMaterialSchema], default: [] })
  materials!: CourseMaterialDocument[];

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  updatedAt!: Date;
}

export type CourseDocumentType = HydratedDocument<CourseDocument>;
export const CourseSchema = SchemaFactory.createForClass(CourseDocument);

CourseSchema.index({ instructorId: 1, createdAt: -1 });
CourseSchema.index({ isPublished: 1, deletedAt: 1, createdAt: -1 });
CourseSchema.index({ category: 1 });
CourseSchema.index({ tags: 1 });
CourseSchema.index({ priceCents: 1, currency: 1 });
