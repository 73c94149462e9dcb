import { PromoCode } from '@domain/entities';
import { EntityId } from '@domain/value-objects';

export interface IPromoCodeRepositoryPort {
  save(promoCode: PromoCode): Promise<void>;

  findById(id: EntityId): Promise<PromoCode | null>;

  /**
   * @param code - Looked up after upper-casing
   */
  findByCode(code: string): Promise<PromoCode | null>;

  findAll(activeOnly: boolean): Promise<PromoCode[]>;
}
