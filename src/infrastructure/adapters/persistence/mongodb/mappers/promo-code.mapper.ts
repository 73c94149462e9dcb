import { PromoCode } from '@domain/entities';
import { Currency, DISCOUNT_TYPES, EntityId, parseEnumeration } from '@domain/value-objects';
import { PromoCodeDocument } from '../schemas';

export class PromoCodeMapper {
  static toDomain(document: PromoCodeDocument): PromoCode {
    return PromoCode.reconstitute(EntityId.fromString(document._id), {
      code: document.code,
      description: document.description ?? null,
      discountType: parseEnumeration(DISCOUNT_TYPES, document.discountType, 'DiscountType'),
      discountValue: document.discountValue,
      currency: Currency.of(document.currency),
      maxUses: document.maxUses ?? null,
      currentUses: document.currentUses,
      validFrom: document.validFrom,
      validUntil: document.validUntil,
      isActive: document.isActive,
      applicableCourseIds: [...document.applicableCourseIds],
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }

  static toDocument(promoCode: PromoCode): PromoCodeDocument {
    const document = new PromoCodeDocument();
    document._id = promoCode.id.toString();
    document.code = promoCode.code;
    document.description = promoCode.description;
    document.discountType = promoCode.discountType;
    document.discountValue = promoCode.discountValue;
    document.currency = promoCode.currency.code;
    document.maxUses = promoCode.maxUses;
    document.currentUses = promoCode.currentUses;
    document.validFrom = promoCode.validFrom;
    document.validUntil = promoCode.validUntil;
    document.isActive = promoCode.isActive;
    document.applicableCourseIds = [...promoCode.applicableCourseIds];
    document.createdAt = promoCode.createdAt;
    document.updatedAt = promoCode.updatedAt;
    return document;
  }
}
