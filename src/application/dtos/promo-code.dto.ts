import { PromoCode } from '@domain/entities';

export interface PromoCodeOutputDto {
  readonly id: string;
  readonly code: string;
  readonly description: string | null;
  readonly discountType: string;
  readonly discountValue: number;
  readonly currency: string;
  readonly maxUses: number | null;
  readonly currentUses: number;
  readonly validFrom: string;
  readonly validUntil: string;
  readonly isActive: boolean;
  readonly applicableCourseIds: string[];
}

export interface PromoCodeValidationOutputDto {
  readonly code: string;
  readonly isValid: boolean;
  readonly discountAmount: number;
  readonly finalAmount: number;
  readonly currency: string;
}

export function toPromoCodeOutput(promoCode: PromoCode): PromoCodeOutputDto {
  return {
    id: promoCode.id.toString(),
    code: promoCode.code,
    description: promoCode.description,
    discountType: promoCode.discountType,
    discountValue: promoCode.discountValue,
    currency: promoCode.currency.code,
    maxUses: promoCode.maxUses,
    currentUses: promoCode.currentUses,
    validFrom: promoCode.validFrom.toISOString(),
    validUntil: promoCode.validUntil.toISOString(),
    isActive: promoCode.isActive,
    applicableCourseIds: [...promoCode.applicableCourseIds],
  };
}
