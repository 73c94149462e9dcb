import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose document for the Notification entity.
 */
@Schema({
  collection: 'notifications',
  _id: false,
})
export class NotificationDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  userId!: string;

  @Prop({ required: true })
  type!: string;

  @Prop({ required: true })
  title!: string;

  @Prop({ required: true })
  message!: string;

  @Prop({ required: true, default: false })
  isRead!: boolean;

  @Prop({ type: Date, default: null })
  readAt!: Date | null;

  @Prop({ required: true, default: false })
  emailSent!: boolean;

  @Prop({ type: Date, default: null })
  emailSentAt!: Date | null;

  @Prop({ required: true, default: false })
  smsSent!: boolean;

  @Prop({ type: Date, default: null })
  smsSentAt!: Date | null;

  @Prop({ required: true, default: false })
  pushSent!: boolean;

  @Prop({ type: Date, default: null })
  pushSentAt!: Date | null;

  @Prop({ type: String, default: null })
  relatedEntityType!: string | null;

  @Prop({ type: String, default: null })
  relatedEntityId!: string | null;

  @Prop({ type: Object, default: {} })
  metadata!: Record<string, string>;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  updatedAt!: Date;
}

export type NotificationDocumentType = HydratedDocument<NotificationDocument>;
export const NotificationSchema = SchemaFactory.createForClass(NotificationDocument);

NotificationSchema.index({ userId: 1, isRead: 1, createdAt: -1 });
