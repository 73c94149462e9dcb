import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { User } from '@domain/entities';
import { Email, EntityId } from '@domain/value-objects';
import { IUserRepositoryPort, UserSearchCriteria } from '@application/ports/outbound';
import { PageRequest } from '@application/common';
import { UserDocument } from '../schemas';
import { UserMapper } from '../mappers';
import { AggregateWriter } from '../aggregate-writer';
import { MongoSessionContext } from '../mongo-session.context';
import { containsText } from './regex';

const COLLECTION = 'users';

/**
 * MongoDB implementation of IUserRepositoryPort.
 */
@Injectable()
export class MongoUserRepository implements IUserRepositoryPort {
  constructor(
    @InjectModel(UserDocument.name)
    private readonly userModel: Model<UserDocument>,
    private readonly sessions: MongoSessionContext,
    private readonly writer: AggregateWriter,
  ) {}

  async save(user: User): Promise<void> {
    const document = UserMapper.toDocument(user);
    const { _id, ...fields } = document;

    await this.writer.save({
      collection: COLLECTION,
      entityName: 'User',
      aggregate: user,
      document,
      upsert: (session) =>
        this.userModel
          .findByIdAndUpdate(_id, { $set: fields }, { upsert: true, session })
          .lean()
          .exec(),
    });
  }

  async findById(id: EntityId): Promise<User | null> {
    return this.findOne({ _id: id.toString() });
  }

  async findByEmail(email: Email): Promise<User | null> {
    return this.findOne({ email: email.toString() });
  }

  async existsByEmail(email: Email): Promise<boolean> {
    const count = await this.writer.timed('find', COLLECTION, () =>
      this.userModel
        .countDocuments({ email: email.toString() })
        .session(this.sessions.session())
        .exec(),
    );
    return count > 0;
  }

  async findByEmailConfirmationToken(token: string): Promise<User | null> {
    return this.findOne({ emailConfirmationToken: token });
  }

  async findByPasswordResetToken(token: string): Promise<User | null> {
    return this.findOne({ passwordResetToken: token });
  }

  /**
   * Newest accounts first.
   */
  async findPage(
    criteria: UserSearchCriteria,
    { page, pageSize }: PageRequest,
  ): Promise<{ items: User[]; totalCount: number }> {
    const filter: FilterQuery<UserDocument> = {};
    if (criteria.role !== undefined) {
      filter.role = criteria.role;
    }
    if (criteria.isActive !== undefined) {
      filter.isActive = criteria.isActive;
    }
    if (criteria.search) {
      filter.$or = [{ name: containsText(criteria.search) }, { email: containsText(criteria.search) }];
    }

    const session = this.sessions.session();
    const [documents, totalCount] = await this.writer.timed('find', COLLECTION, () =>
      Promise.all([
        this.userModel
          .find(filter)
          .sort({ createdAt: -1, _id: 1 })
          .skip(page * pageSize)
          .limit(pageSize)
          .session(session)
          .exec(),
        this.userModel.countDocuments(filter).session(session).exec(),
      ]),
    );

    return { items: documents.map((doc) => UserMapper.toDomain(doc)), totalCount };
  }

  private async findOne(filter: FilterQuery<UserDocument>): Promise<User | null> {
    const document = await this.writer.timed('find', COLLECTION, () =>
      this.userModel.findOne(filter).session(this.sessions.session()).exec(),
    );

    if (!document) {
      return null;
    }

    return UserMapper.toDomain(document);
  }
}
