import { AggregateRoot } from '../events';
import { BusinessRuleViolationException } from '../exceptions';
import { Currency, DiscountType, EntityId, Money } from '../value-objects';

export interface PromoCodeProps {
  code: string;
  description: string | null;
  discountType: DiscountType;
  discountValue: number;
  currency: Currency;
  maxUses: number | null;
  currentUses: number;
  validFrom: Date;
  validUntil: Date;
  isActive: boolean;
  applicableCourseIds: string[];
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Discount code redeemable on bookings. A code with no applicable courses
 * applies to every course.
 */
export class PromoCode extends AggregateRoot {
  private constructor(id: EntityId, private readonly props: PromoCodeProps) {
    super(id);
  }

  static create(params: {
    id?: EntityId;
    code: string;
    description?: string | null;
    discountType: DiscountType;
    discountValue: number;
    currency?: Currency;
    maxUses?: number | null;
    validFrom: Date;
    validUntil: Date;
    applicableCourseIds?: string[];
  }): PromoCode {
    const code = PromoCode.normalizeCode(params.code);
    PromoCode.ensureDiscount(params.discountType, params.discountValue);
    PromoCode.ensureMaxUses(params.maxUses ?? null);
    if (params.validUntil.getTime() <= params.validFrom.getTime()) {
      throw new BusinessRuleViolationException('Valid until must be after valid from.');
    }

    const now = new Date();
    const promoCode = new PromoCode(params.id ?? EntityId.generate(), {
      code,
      description: params.description ?? null,
      discountType: params.discountType,
      discountValue: params.discountValue,
      currency: params.currency ?? Currency.usd(),
      maxUses: params.maxUses ?? null,
      currentUses: 0,
      validFrom: params.validFrom,
      validUntil: params.validUntil,
      isActive: true,
      applicableCourseIds: [...new Set(params.applicableCourseIds ?? [])],
      createdAt: now,
      updatedAt: now,
    });
    promoCode.record('PromoCodeCreated', { code });
    return promoCode;
  }

  static reconstitute(id: EntityId, props: PromoCodeProps): PromoCode {
    return new PromoCode(id, { ...props, applicableCourseIds: [...props.applicableCourseIds] });
  }

  static normalizeCode(code: string): string {
    const normalized = (code ?? '').trim().toUpperCase();
    if (normalized.length === 0) {
      throw new BusinessRuleViolationException('Code is required.');
    }
    return normalized;
  }

  get code(): string {
    return this.props.code;
  }

  get description(): string | null {
    return this.props.description;
  }

  get discountType(): DiscountType {
    return this.props.discountType;
  }

  get discountValue(): number {
    return this.props.discountValue;
  }

  get currency(): Currency {
    return this.props.currency;
  }

  get maxUses(): number | null {
    return this.props.maxUses;
  }

  get currentUses(): number {
    return this.props.currentUses;
  }

  get validFrom(): Date {
    return this.props.validFrom;
  }

  get validUntil(): Date {
    return this.props.validUntil;
  }

  get isActive(): boolean {
    return this.props.isActive;
  }

  get applicableCourseIds(): readonly string[] {
    return [...this.props.applicableCourseIds];
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  isExhausted(): boolean {
    return this.props.maxUses !== null && this.props.currentUses >= this.props.maxUses;
  }

  isValidAt(now: Date): boolean {
    return (
      this.props.isActive &&
      !this.isExhausted() &&
      now.getTime() >= this.props.validFrom.getTime() &&
      now.getTime() <= this.props.validUntil.getTime()
    );
  }

  appliesTo(courseId: string): boolean {
    return (
      this.props.applicableCourseIds.length === 0 ||
      this.props.applicableCourseIds.includes(courseId)
    );
  }

  isRedeemableFor(courseId: string, now: Date = new Date()): boolean {
    return this.isValidAt(now) && this.appliesTo(courseId);
  }

  // Discount never exceeds the amount it applies to
  calculateDiscount(amount: Money): Money {
    if (this.props.discountType === 'percentage') {
      return amount.percentage(this.props.discountValue);
    }

    if (amount.currency !== this.props.currency.code) {
      throw new BusinessRuleViolationException(
        `Promo code ${this.props.code} only applies to ${this.props.currency.code} amounts.`,
      );
    }
    return Money.of(this.props.discountValue, amount.currency).min(amount);
  }

  /**
   * Consumes one use of the code for the given course.
   *
   * @returns the discount to subtract from the amount
   */
  redeem(courseId: string, amount: Money, now: Date = new Date()): Money {
    if (!this.isValidAt(now)) {
      throw new BusinessRuleViolationException(`Promo code ${this.props.code} is not valid.`);
    }
    if (!this.appliesTo(courseId)) {
      throw new BusinessRuleViolationException(
        `Promo code ${this.props.code} does not apply to this course.`,
      );
    }

    const discount = this.calculateDiscount(amount);
    this.props.currentUses += 1;
    this.touch();
    this.record('PromoCodeRedeemed', { courseId, discount: discount.format() });
    return discount;
  }

  updateDescription(description: string | null): void {
    this.props.description = description;
    this.touch();
  }

  updateDiscount(discountType: DiscountType, discountValue: number): void {
    PromoCode.ensureDiscount(discountType, discountValue);
    this.props.discountType = discountType;
    this.props.discountValue = discountValue;
    this.touch();
  }

  updateMaxUses(maxUses: number | null): void {
    PromoCode.ensureMaxUses(maxUses);
    this.props.maxUses = maxUses;
    this.touch();
  }

  updateValidity(validFrom: Date, validUntil: Date): void {
    if (validUntil.getTime() <= validFrom.getTime()) {
      throw new BusinessRuleViolationException('Valid until must be after valid from.');
    }
    this.props.validFrom = validFrom;
    this.props.validUntil = validUntil;
    this.touch();
  }

  updateApplicableCourses(courseIds: string[]): void {
    this.props.applicableCourseIds = [...new Set(courseIds)];
    this.touch();
  }

  setActive(isActive: boolean): void {
    this.props.isActive = isActive;
    this.touch();
  }

  private static ensureDiscount(discountType: DiscountType, discountValue: number): void {
    if (!Number.isFinite(discountValue) || discountValue < 0) {
      throw new BusinessRuleViolationException('Discount value cannot be negative.');
    }
    if (discountType === 'percentage' && discountValue > 100) {
      throw new BusinessRuleViolationException('Percentage discount cannot exceed 100.');
    }
  }

  private static ensureMaxUses(maxUses: number | null): void {
    if (maxUses !== null && (!Number.isInteger(maxUses) || maxUses <= 0)) {
      throw new BusinessRuleViolationException('Max uses must be positive if specified.');
    }
  }

  private touch(): void {
    this.props.updatedAt = new Date();
  }
}
