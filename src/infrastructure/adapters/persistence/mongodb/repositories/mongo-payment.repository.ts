import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Payment } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { IPaymentRepositoryPort } from '@application/ports/outbound';
import { PaymentDocument } from '../schemas';
import { PaymentMapper } from '../mappers';
import { AggregateWriter } from '../aggregate-writer';
import { MongoSessionContext } from '../mongo-session.context';

const COLLECTION = 'payments';

@Injectable()
export class MongoPaymentRepository implements IPaymentRepositoryPort {
  constructor(
    @InjectModel(PaymentDocument.name)
    private readonly paymentModel: Model<PaymentDocument>,
    private readonly sessions: MongoSessionContext,
    private readonly writer: AggregateWriter,
  ) {}

  async save(payment: Payment): Promise<void> {
    const document = PaymentMapper.toDocument(payment);
    const { _id, ...fields } = document;

    await this.writer.save({
      collection: COLLECTION,
      entityName: 'Payment',
      aggregate: payment,
      document,
      upsert: (session) =>
        this.paymentModel
          .findByIdAndUpdate(_id, { $set: fields }, { upsert: true, session })
          .lean()
          .exec(),
    });
  }

  async findById(id: EntityId): Promise<Payment | null> {
    const document = await this.writer.timed('find', COLLECTION, () =>
      this.paymentModel.findById(id.toString()).session(this.sessions.session()).exec(),
    );
    return document ? PaymentMapper.toDomain(document) : null;
  }

  // Latest attempt for the booking
  async findByBooking(bookingId: EntityId): Promise<Payment | null> {
    const document = await this.writer.timed('find', COLLECTION, () =>
      this.paymentModel
        .findOne({ bookingId: bookingId.toString() })
        .sort({ createdAt: -1 })
        .session(this.sessions.session())
        .exec(),
    );
    return document ? PaymentMapper.toDomain(document) : null;
  }

  async findByUser(userId: EntityId): Promise<Payment[]> {
    const documents = await this.writer.timed('find', COLLECTION, () =>
      this.paymentModel
        .find({ userId: userId.toString() })
        .sort({ createdAt: -1 })
        .session(this.sessions.session())
        .exec(),
    );
    return documents.map((doc) => PaymentMapper.toDomain(doc));
  }
}
