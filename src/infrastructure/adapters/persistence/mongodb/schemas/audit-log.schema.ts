import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose document for audit trail entries. Written once, never updated.
 */
@Schema({
  collection: 'audit_logs',
  _id: false,
})
export class AuditLogDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  entityName!: string;

  @Prop({ required: true })
  entityId!: string;

  @Prop({ required: true })
  action!: string;

  @Prop({ type: String, default: null })
  userId!: string | null;

  @Prop({ type: String, default: null })
  ipAddress!: string | null;

  @Prop({ type: String, default: null })
  userAgent!: string | null;

  @Prop({ type: String, default: null })
  oldValues!: string | null;

  @Prop({ type: String, default: null })
  newValues!: string | null;

  @Prop({ type: String, default: null })
  metadata!: string | null;

  @Prop({ required: true })
  createdAt!: Date;
}

export type AuditLogDocumentType = HydratedDocument<AuditLogDocument>;
export const AuditLogSchema = SchemaFactory.createForClass(AuditLogDocument);

AuditLogSchema.index({ entityName: 1, entityId: 1, createdAt: -1 });
AuditLogSchema.index({ userId: 1, createdAt: -1 });
