import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { PromoCode } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { IPromoCodeRepositoryPort } from '@application/ports/outbound';
import { PromoCodeDocument } from '../schemas';
import { PromoCodeMapper } from '../mappers';
import { AggregateWriter } from '../aggregate-writer';
import { MongoSessionContext } from '../mongo-session.context';

const COLLECTION = 'promo_codes';

/**
 * MongoDB implementation of IPromoCodeRepositoryPort.
 * Codes are stored upper-cased, so lookups normalise the same way.
 */
@Injectable()
export class MongoPromoCodeRepository implements IPromoCodeRepositoryPort {
  constructor(
    @InjectModel(PromoCodeDocument.name)
    private readonly promoCodeModel: Model<PromoCodeDocument>,
    private readonly sessions: MongoSessionContext,
    private readonly writer: AggregateWriter,
  ) {}

  async save(promoCode: PromoCode): Promise<void> {
    const document = PromoCodeMapper.toDocument(promoCode);
    const { _id, ...fields } = document;

    await this.writer.save({
      collection: COLLECTION,
      entityName: 'PromoCode',
      aggregate: promoCode,
      document,
      upsert: (session) =>
        this.promoCodeModel
          .findByIdAndUpdate(_id, { $set: fields }, { upsert: true, session })
          .lean()
          .exec(),
    });
  }

  async findById(id: EntityId): Promise<PromoCode | null> {
    return this.findOne({ _id: id.toString() });
  }

  async findByCode(code: string): Promise<PromoCode | null> {
    return this.findOne({ code: code.trim().toUpperCase() });
  }

  async findAll(activeOnly: boolean): Promise<PromoCode[]> {
    const filter: FilterQuery<PromoCodeDocument> = activeOnly ? { isActive: true } : {};

    const documents = await this.writer.timed('find', COLLECTION, () =>
      this.promoCodeModel.find(filter).sort({ code: 1 }).session(this.sessions.session()).exec(),
    );
    return documents.map((doc) => PromoCodeMapper.toDomain(doc));
  }

  private async findOne(filter: FilterQuery<PromoCodeDocument>): Promise<PromoCode | null> {
    const document = await this.writer.timed('find', COLLECTION, () =>
      this.promoCodeModel.findOne(filter).session(this.sessions.session()).exec(),
    );
    return document ? PromoCodeMapper.toDomain(document) : null;
  }
}
