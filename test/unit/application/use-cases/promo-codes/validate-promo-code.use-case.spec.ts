import { IPromoCodeRepositoryPort } from '@application/ports';
import { ValidatePromoCodeHandler, ValidatePromoCodeQuery } from '@application/use-cases';
import { PromoCode } from '@domain/entities';
import { createPromoCodeRepositoryMock, hoursFromNow } from '../fixtures';

describe('ValidatePromoCodeHandler', () => {
  let promoCodeRepository: jest.Mocked<IPromoCodeRepositoryPort>;
  let handler: ValidatePromoCodeHandler;

  const createCode = (overrides: Partial<{ validUntil: Date; courses: string[] }> = {}) =>
    PromoCode.create({
      code: 'RESIDENT15',
      discountType: 'fixed_amount',
      discountValue: 15,
      validFrom: hoursFromNow(-48),
      validUntil: overrides.validUntil ?? hoursFromNow(48),
      applicableCourseIds: overrides.courses,
    });

  beforeEach(() => {
    promoCodeRepository = createPromoCodeRepositoryMock();
    handler = new ValidatePromoCodeHandler(promoCodeRepository);
  });

  it('should preview the discount without redeeming the code', async () => {
    // Arrange
    const promo = createCode();
    promoCodeRepository.findByCode.mockResolvedValue(promo);

    // Act
    const result = await handler.handle(new ValidatePromoCodeQuery('resident15', 'course-1', 60));

    // Assert
    expect(result).toEqual({
      ok: true,
      value: {
        code: 'RESIDENT15',
        isValid: true,
        discountAmount: 15,
        finalAmount: 45,
        currency: 'USD',
      },
    });
    expect(promo.currentUses).toBe(0);
    expect(promoCodeRepository.save).not.toHaveBeenCalled();
  });

  it('should cap a fixed discount at the amount', async () => {
    promoCodeRepository.findByCode.mockResolvedValue(createCode());

    const result = await handler.handle(new ValidatePromoCodeQuery('RESIDENT15', 'course-1', 10));

    expect(result.ok && result.value.finalAmount).toBe(0);
    expect(result.ok && result.value.discountAmount).toBe(10);
  });

  it('should report a code for another course as invalid', async () => {
    promoCodeRepository.findByCode.mockResolvedValue(createCode({ courses: ['course-9'] }));

    const result = await handler.handle(new ValidatePromoCodeQuery('RESIDENT15', 'course-1', 60));

    expect(result).toEqual({
      ok: true,
      value: {
        code: 'RESIDENT15',
        isValid: false,
        discountAmount: 0,
        finalAmount: 60,
        currency: 'USD',
      },
    });
  });

  it('should return not found for an unknown code', async () => {
    promoCodeRepository.findByCode.mockResolvedValue(null);

    const result = await handler.handle(new ValidatePromoCodeQuery(' intern ', 'course-1', 60));

    expect(result).toEqual({ ok: false, kind: 'not_found', errors: ['Promo code INTERN not found'] });
  });
});
