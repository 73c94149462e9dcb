import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  IsArray,
  IsIn,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  MaxLength,
  Min,
} from 'class-validator';
import { PromoCode } from '@domain/entities';
import { Currency, DISCOUNT_TYPES, DiscountType } from '@domain/value-objects';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, conflict, fromDomain, success } from '../../common/result';
import { PromoCodeOutputDto, toPromoCodeOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { IPromoCodeRepositoryPort } from '../../ports';

export interface CreatePromoCodeInput {
  code: string;
  description?: string | null;
  discountType: DiscountType;
  discountValue: number;
  currency?: string;
  maxUses?: number | null;
  validFrom: string;
  validUntil: string;
  applicableCourseIds?: string[];
}

@InvalidatesCache(CachePrefixes.GetPromoCodes, 'New promo code')
export class CreatePromoCodeCommand extends ResultCommand<PromoCodeOutputDto> {
  @IsNotEmpty({ message: 'Code is required.' })
  @MaxLength(50, { message: 'Code must not exceed 50 characters.' })
  readonly code!: string;

  @IsOptional()
  @MaxLength(500, { message: 'Description must not exceed 500 characters.' })
  readonly description?: string | null;

  @IsIn(DISCOUNT_TYPES, { message: `Discount type must be one of: ${DISCOUNT_TYPES.join(', ')}.` })
  readonly discountType!: DiscountType;

  @IsNumber({}, { message: 'Discount value cannot be negative.' })
  @Min(0, { message: 'Discount value cannot be negative.' })
  readonly discountValue!: number;

  @IsOptional()
  @Length(3, 3, { message: 'Currency must be a 3-character code (e.g., USD, EUR).' })
  readonly currency?: string;

  @IsOptional()
  @IsInt({ message: 'Max uses must be positive if specified.' })
  @Min(1, { message: 'Max uses must be positive if specified.' })
  readonly maxUses?: number | null;

  @IsISO8601({}, { message: 'Valid from must be a valid date.' })
  readonly validFrom!: string;

  @IsISO8601({}, { message: 'Valid until must be a valid date.' })
  readonly validUntil!: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  readonly applicableCourseIds?: string[];

  constructor(input: CreatePromoCodeInput) {
    super();
    Object.assign(this, input);
  }
}

@Injectable()
export class CreatePromoCodeHandler
  implements RequestHandler<CreatePromoCodeCommand, Result<PromoCodeOutputDto>>
{
  private readonly logger = new Logger(CreatePromoCodeHandler.name);

  constructor(
    @Inject('IPromoCodeRepository')
    private readonly promoCodeRepository: IPromoCodeRepositoryPort,
  ) {}

  handle(command: CreatePromoCodeCommand): Promise<Result<PromoCodeOutputDto>> {
    return fromDomain(async () => {
      const code = PromoCode.normalizeCode(command.code);
      if (await this.promoCodeRepository.findByCode(code)) {
        return conflict(`Promo code ${code} already exists`);
      }

      const promoCode = PromoCode.create({
        code,
        description: command.description ?? null,
        discountType: command.discountType,
        discountValue: command.discountValue,
        currency: command.currency ? Currency.of(command.currency) : undefined,
        maxUses: command.maxUses ?? null,
        validFrom: new Date(command.validFrom),
        validUntil: new Date(command.validUntil),
        applicableCourseIds: command.applicableCourseIds,
      });

      await this.promoCodeRepository.save(promoCode);
      this.logger.log(`Promo code ${code} created`);

      return success(toPromoCodeOutput(promoCode));
    });
  }
}
