import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { AvailabilitySlot } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { IAvailabilitySlotRepositoryPort } from '@application/ports/outbound';
import { AvailabilitySlotDocument } from '../schemas';
import { AvailabilitySlotMapper } from '../mappers';
import { AggregateWriter } from '../aggregate-writer';
import { MongoSessionContext } from '../mongo-session.context';

const COLLECTION = 'availability_slots';

/**
 * MongoDB implementation of IAvailabilitySlotRepositoryPort.
 */
@Injectable()
export class MongoAvailabilitySlotRepository implements IAvailabilitySlotRepositoryPort {
  constructor(
    @InjectModel(AvailabilitySlotDocument.name)
    private readonly slotModel: Model<AvailabilitySlotDocument>,
    private readonly sessions: MongoSessionContext,
    private readonly writer: AggregateWriter,
  ) {}

  async save(slot: AvailabilitySlot): Promise<void> {
    const document = AvailabilitySlotMapper.toDocument(slot);
    const { _id, ...fields } = document;

    await this.writer.save({
      collection: COLLECTION,
      entityName: 'AvailabilitySlot',
      aggregate: slot,
      document,
      upsert: (session) =>
        this.slotModel
          .findByIdAndUpdate(_id, { $set: fields }, { upsert: true, session })
          .lean()
          .exec(),
    });
  }

  async findById(id: EntityId): Promise<AvailabilitySlot | null> {
    const document = await this.writer.timed('find', COLLECTION, () =>
      this.slotModel.findById(id.toString()).session(this.sessions.session()).exec(),
    );

    if (!document) {
      return null;
    }

    return AvailabilitySlotMapper.toDomain(document);
  }

  async findByInstructor(instructorId: EntityId): Promise<AvailabilitySlot[]> {
    return this.findSorted({ instructorId: instructorId.toString() });
  }

  async findAvailable(
    start: Date,
    end: Date,
    instructorId?: EntityId,
  ): Promise<AvailabilitySlot[]> {
    const filter: FilterQuery<AvailabilitySlotDocument> = {
      isActive: true,
      startTime: { $gte: start, $lt: end },
      $expr: { $lt: ['$currentParticipants', '$maxParticipants'] },
    };
    if (instructorId) {
      filter.instructorId = instructorId.toString();
    }

    return this.findSorted(filter);
  }

  async findOverlapping(
    instructorId: EntityId,
    start: Date,
    end: Date,
    excludeId?: EntityId,
  ): Promise<AvailabilitySlot[]> {
    const filter: FilterQuery<AvailabilitySlotDocument> = {
      instructorId: instructorId.toString(),
      isActive: true,
      startTime: { $lt: end },
      endTime: { $gt: start },
    };
    if (excludeId) {
      filter._id = { $ne: excludeId.toString() };
    }

    return this.findSorted(filter);
  }

  private async findSorted(
    filter: FilterQuery<AvailabilitySlotDocument>,
  ): Promise<AvailabilitySlot[]> {
    const documents = await this.writer.timed('find', COLLECTION, () =>
      this.slotModel.find(filter).sort({ startTime: 1 }).session(this.sessions.session()).exec(),
    );

    return documents.map((doc) => AvailabilitySlotMapper.toDomain(doc));
  }
}
