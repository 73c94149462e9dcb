import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { Notification } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { INotificationRepositoryPort } from '@application/ports/outbound';
import { NotificationDocument } from '../schemas';
import { NotificationMapper } from '../mappers';
import { AggregateWriter } from '../aggregate-writer';
import { MongoSessionContext } from '../mongo-session.context';

const COLLECTION = 'notifications';

@Injectable()
export class MongoNotificationRepository implements INotificationRepositoryPort {
  constructor(
    @InjectModel(NotificationDocument.name)
    private readonly notificationModel: Model<NotificationDocument>,
    private readonly sessions: MongoSessionContext,
    private readonly writer: AggregateWriter,
  ) {}

  async save(notification: Notification): Promise<void> {
    const document = NotificationMapper.toDocument(notification);
    const { _id, ...fields } = document;

    await this.writer.save({
      collection: COLLECTION,
      entityName: 'Notification',
      aggregate: notification,
      document,
      upsert: (session) =>
        this.notificationModel
          .findByIdAndUpdate(_id, { $set: fields }, { upsert: true, session })
          .lean()
          .exec(),
    });
  }

  async findById(id: EntityId): Promise<Notification | null> {
    const document = await this.writer.timed('find', COLLECTION, () =>
      this.notificationModel.findById(id.toString()).session(this.sessions.session()).exec(),
    );
    return document ? NotificationMapper.toDomain(document) : null;
  }

  async findByUser(userId: EntityId, unreadOnly: boolean): Promise<Notification[]> {
    const filter: FilterQuery<NotificationDocument> = { userId: userId.toString() };
    if (unreadOnly) {
      filter.isRead = false;
    }

    const documents = await this.writer.timed('find', COLLECTION, () =>
      this.notificationModel
        .find(filter)
        .sort({ createdAt: -1 })
        .session(this.sessions.session())
        .exec(),
    );
    return documents.map((doc) => NotificationMapper.toDomain(doc));
  }
}
