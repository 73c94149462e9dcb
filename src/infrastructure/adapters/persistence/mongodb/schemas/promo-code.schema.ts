import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose document for the PromoCode entity.
 */
@Schema({
  collection: 'promo_codes',
  _id: false,
})
export class PromoCodeDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true })
  code!: string;

  @Prop({ type: String, default: null })
  description!: string | null;

  @Prop({ required: true })
  discountType!: string;

  @Prop({ required: true, min: 0 })
  discountValue!: number;

  @Prop({ required: true })
  currency!: string;

  @Prop({ type: Number, default: null })
  maxUses!: number | null;

  @Prop({ required: true, default: 0 })
  currentUses!: number;

  @Prop({ required: true })
  validFrom!: Date;

  @Prop({ required: true })
  validUntil!: Date;

  @Prop({ required: true, default: true })
  isActive!: boolean;

  @Prop({ type: [String], default: [] })
  applicableCourseIds!: string[];

  @Prop({ required: true })
  createdAt!: Date;

  @Prop({ required: true })
  updatedAt!: Date;
}

export type PromoCodeDocumentType = HydratedDocument<PromoCodeDocument>;
export const PromoCodeSchema = SchemaFactory.createForClass(PromoCodeDocument);

PromoCodeSchema.index({ code: 1 }, { unique: true });
PromoCodeSchema.index({ isActive: 1, validUntil: 1 });
