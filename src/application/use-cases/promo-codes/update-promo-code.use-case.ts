import { Inject, Injectable } from '@nestjs/common';
import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { DISCOUNT_TYPES, DiscountType, EntityId } from '@domain/value-objects';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { PromoCodeOutputDto, toPromoCodeOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IPromoCodeRepositoryPort } from '../../ports';

export interface UpdatePromoCodeInput {
  promoCodeId: string;
  description?: string | null;
  discountType?: DiscountType;
  discountValue?: number;
  maxUses?: number | null;
  validFrom?: string;
  validUntil?: string;
  applicableCourseIds?: string[];
  isActive?: boolean;
}

@InvalidatesCache(CachePrefixes.GetPromoCodes, 'Promo code changed')
export class UpdatePromoCodeCommand extends ResultCommand<PromoCodeOutputDto> {
  @IsNotEmpty({ message: 'Promo code ID is required.' })
  readonly promoCodeId!: string;

  @IsOptional()
  @MaxLength(500, { message: 'Description must not exceed 500 characters.' })
  readonly description?: string | null;

  @IsOptional()
  @IsIn(DISCOUNT_TYPES, { message: `Discount type must be one of: ${DISCOUNT_TYPES.join(', ')}.` })
  readonly discountType?: DiscountType;

  @IsOptional()
  @IsNumber({}, { message: 'Discount value cannot be negative.' })
  @Min(0, { message: 'Discount value cannot be negative.' })
  readonly discountValue?: number;

  @IsOptional()
  @IsInt({ message: 'Max uses must be positive if specified.' })
  @Min(1, { message: 'Max uses must be positive if specified.' })
  readonly maxUses?: number | null;

  @IsOptional()
  @IsISO8601({}, { message: 'Valid from must be a valid date.' })
  readonly validFrom?: string;

  @IsOptional()
  @IsISO8601({}, { message: 'Valid until must be a valid date.' })
  readonly validUntil?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  readonly applicableCourseIds?: string[];

  @IsOptional()
  @IsBoolean()
  readonly isActive?: boolean;

  constructor(input: UpdatePromoCodeInput) {
    super();
    Object.assign(this, input);
  }
}

@Injectable()
export class UpdatePromoCodeHandler
  implements RequestHandler<UpdatePromoCodeCommand, Result<PromoCodeOutputDto>>
{
  constructor(
    @Inject('IPromoCodeRepository')
    private readonly promoCodeRepository: IPromoCodeRepositoryPort,
  ) {}

  handle(command: UpdatePromoCodeCommand): Promise<Result<PromoCodeOutputDto>> {
    return fromDomain(async () => {
      const promoCode = await this.promoCodeRepository.findById(
        EntityId.fromString(command.promoCodeId),
      );
      if (!promoCode) {
        return notFound(`Promo code with ID ${command.promoCodeId} not found`);
      }

      if (command.description !== undefined) {
        promoCode.updateDescription(command.description);
      }
      if (command.discountType !== undefined || command.discountValue !== undefined) {
        promoCode.updateDiscount(
          command.discountType ?? promoCode.discountType,
          command.discountValue ?? promoCode.discountValue,
        );
      }
      if (command.maxUses !== undefined) {
        promoCode.updateMaxUses(command.maxUses);
      }
      if (command.validFrom !== undefined || command.validUntil !== undefined) {
        promoCode.updateValidity(
          command.validFrom ? new Date(command.validFrom) : promoCode.validFrom,
          command.validUntil ? new Date(command.validUntil) : promoCode.validUntil,
        );
      }
      if (command.applicableCourseIds !== undefined) {
        promoCode.updateApplicableCourses(command.applicableCourseIds);
      }
      if (command.isActive !== undefined) {
        promoCode.setActive(command.isActive);
      }

      await this.promoCodeRepository.save(promoCode);
      return success(toPromoCodeOutput(promoCode));
    });
  }
}
