import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose document for the User entity.
 * Timestamps are owned by the domain, so Mongoose does not manage them.
 */
@Schema({
  collection: 'users',
  _id: false, // Disable auto ObjectId, we use custom string _id
})
export class UserDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  name!: string;

  @Prop({ required: true })
  email!: string;

  @Prop({ required: true })
  passwordHash!: string;

  @Prop({ required: true })
  role!: string;

  @Prop({ required: true, default: true })
  isActive!: boolean;

  @Prop({ required: true, default: false })
  emailConfirmed!: boolean;

  @Prop({ type: String, default: null })
  emailConfirmationToken!: string | null;

  @Prop({ type: Date, default: null })
  emailConfirmationTokenExpiresAt!: Date | null;

  @Prop({ type: String, default: null })
  passwordResetToken!: string | null;

  @Prop({ type: Date, default: null })
  passwordResetTokenExpiresAt!: Date | null;

  @Prop({ required: true, default: 'UTC' })
  timezone!: string;

  @Prop({ type: String, default: null })
  phoneNumber!: string | null;

  @Prop({ type: String, default: null })
  profilePictureUrl!: string | null;

  @Prop({ type: Date, default: null })
  lastLoginAt!: Date | null;

  @Prop({ required: true, default: 0 })
  failedLoginAttempts!: number;

  @Prop({ type: Date, default: null })
  lockedUntil!: Date | null;

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  updatedAt!: Date;
}

export type UserDocumentType = HydratedDocument<UserDocument>;
export const UserSchema = SchemaFactory.createForClass(UserDocument);

UserSchema.index({ email: 1 }, { unique: true });
UserSchema.index({ role: 1, isActive: 1 });
UserSchema.index({ emailConfirmationToken: 1 }, { sparse: true });
UserSchema.index({ passwordResetToken: 1 }, { sparse: true });
UserSchema.index({ createdAt: -1 });
