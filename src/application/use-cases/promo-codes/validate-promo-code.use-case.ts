import { Inject, Injectable } from '@nestjs/common';
import { IsNotEmpty, IsNumber, IsOptional, Length, Min } from 'class-validator';
import { Money } from '@domain/value-objects';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { PromoCodeValidationOutputDto } from '../../dtos';
import { RequestHandler, ResultQuery } from '../../pipeline';
import { IPromoCodeRepositoryPort } from '../../ports';

/**
 * Previews the discount a code gives on an amount for a course without
 * redeeming it. Not cached: validity depends on the current time and use count.
 */
export class ValidatePromoCodeQuery extends ResultQuery<PromoCodeValidationOutputDto> {
  @IsNotEmpty({ message: 'Code is required.' })
  readonly code: string;

  @IsNotEmpty({ message: 'Course ID is required.' })
  readonly courseId: string;

  @IsNumber({}, { message: 'Amount must be greater than or equal to 0.' })
  @Min(0, { message: 'Amount must be greater than or equal to 0.' })
  readonly amount: number;

  @IsOptional()
  @Length(3, 3, { message: 'Currency must be a 3-character code (e.g., USD, EUR).' })
  readonly currency?: string;

  constructor(code: string, courseId: string, amount: number, currency?: string) {
    super();
    this.code = code;
    this.courseId = courseId;
    this.amount = amount;
    this.currency = currency;
  }
}

@Injectable()
export class ValidatePromoCodeHandler
  implements RequestHandler<ValidatePromoCodeQuery, Result<PromoCodeValidationOutputDto>>
{
  constructor(
    @Inject('IPromoCodeRepository')
    private readonly promoCodeRepository: IPromoCodeRepositoryPort,
  ) {}

  handle(query: ValidatePromoCodeQuery): Promise<Result<PromoCodeValidationOutputDto>> {
    return fromDomain<PromoCodeValidationOutputDto>(async () => {
      const promoCode = await this.promoCodeRepository.findByCode(query.code);
      if (!promoCode) {
        return notFound(`Promo code ${query.code.trim().toUpperCase()} not found`);
      }

      const amount = Money.of(query.amount, query.currency?.toUpperCase());
      if (!promoCode.isRedeemableFor(query.courseId)) {
        return success({
          code: promoCode.code,
          isValid: false,
          discountAmount: 0,
          finalAmount: amount.amount,
          currency: amount.currency,
        });
      }

      const discount = promoCode.calculateDiscount(amount);
      return success({
        code: promoCode.code,
        isValid: true,
        discountAmount: discount.amount,
        finalAmount: amount.subtract(discount).amount,
        currency: amount.currency,
      });
    });
  }
}
