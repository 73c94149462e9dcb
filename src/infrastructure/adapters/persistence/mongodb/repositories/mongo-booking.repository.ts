import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { Booking } from '@domain/entities';
import { BookingStatusValue, EntityId } from '@domain/value-objects';
import { IBookingRepositoryPort } from '@application/ports/outbound';
import { MetricsService } from '@infrastructure/observability/metrics/metrics.service';
import { BookingDocument } from '../schemas';
import { BookingMapper } from '../mappers';
import { AggregateWriter } from '../aggregate-writer';
import { MongoSessionContext } from '../mongo-session.context';

const COLLECTION = 'bookings';

const ACTIVE_STATUSES: readonly BookingStatusValue[] = ['pending', 'confirmed', 'rescheduled'];

// Events that move a booking into a new status
const STATUS_EVENTS = new Set([
  'BookingCreated',
  'BookingConfirmed',
  'BookingCancelled',
  'BookingCompleted',
  'BookingNoShow',
  'BookingRescheduled',
]);

/**
 * MongoDB implementation of IBookingRepositoryPort.
 * Status changes are counted in the bookings_total metric.
 */
@Injectable()
export class MongoBookingRepository implements IBookingRepositoryPort {
  constructor(
    @InjectModel(BookingDocument.name)
    private readonly bookingModel: Model<BookingDocument>,
    private readonly sessions: MongoSessionContext,
    private readonly writer: AggregateWriter,
    private readonly metrics: MetricsService,
  ) {}

  async save(booking: Booking): Promise<void> {
    const statusChanged = booking.domainEvents.some((event) => STATUS_EVENTS.has(event.name));
    const document = BookingMapper.toDocument(booking);
    const { _id, ...fields } = document;

    await this.writer.save({
      collection: COLLECTION,
      entityName: 'Booking',
      aggregate: booking,
      document,
      upsert: (session) =>
        this.bookingModel
          .findByIdAndUpdate(_id, { $set: fields }, { upsert: true, session })
          .lean()
          .exec(),
    });

    if (statusChanged) {
      this.metrics.recordBooking(booking.status.value);
    }
  }

  async findById(id: EntityId): Promise<Booking | null> {
    const document = await this.writer.timed('find', COLLECTION, () =>
      this.bookingModel.findById(id.toString()).session(this.sessions.session()).exec(),
    );

    if (!document) {
      return null;
    }

    return BookingMapper.toDomain(document);
  }

  async findByStudent(studentId: EntityId): Promise<Booking[]> {
    return this.findNewestFirst({ studentId: studentId.toString() });
  }

  async findByInstructor(instructorId: EntityId): Promise<Booking[]> {
    return this.findNewestFirst({ instructorId: instructorId.toString() });
  }

  async findByStatus(status: BookingStatusValue): Promise<Booking[]> {
    return this.findNewestFirst({ status });
  }

  async findActiveForStudentAndSlot(studentId: EntityId, slotId: EntityId): Promise<Booking | null> {
    const document = await this.writer.timed('find', COLLECTION, () =>
      this.bookingModel
        .findOne({
          studentId: studentId.toString(),
          availabilitySlotId: slotId.toString(),
          status: { $in: ACTIVE_STATUSES },
        })
        .session(this.sessions.session())
        .exec(),
    );

    if (!document) {
      return null;
    }

    return BookingMapper.toDomain(document);
  }

  private async findNewestFirst(filter: FilterQuery<BookingDocument>): Promise<Booking[]> {
    const documents = await this.writer.timed('find', COLLECTION, () =>
      this.bookingModel.find(filter).sort({ createdAt: -1 }).session(this.sessions.session()).exec(),
    );

    return documents.map((doc) => BookingMapper.toDomain(doc));
  }
}
