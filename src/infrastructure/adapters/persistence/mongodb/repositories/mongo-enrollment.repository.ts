import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model } from 'mongoose';
import { Enrollment } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { IEnrollmentRepositoryPort } from '@application/ports/outbound';
import { EnrollmentDocument } from '../schemas';
import { EnrollmentMapper } from '../mappers';
import { AggregateWriter } from '../aggregate-writer';
import { MongoSessionContext } from '../mongo-session.context';

const COLLECTION = 'enrollments';

@Injectable()
export class MongoEnrollmentRepository implements IEnrollmentRepositoryPort {
  constructor(
    @InjectModel(EnrollmentDocument.name)
    private readonly enrollmentModel: Model<EnrollmentDocument>,
    private readonly sessions: MongoSessionContext,
    private readonly writer: AggregateWriter,
  ) {}

  async save(enrollment: Enrollment): Promise<void> {
    const document = EnrollmentMapper.toDocument(enrollment);
    const { _id, ...fields } = document;

    await this.writer.save({
      collection: COLLECTION,
      entityName: 'Enrollment',
      aggregate: enrollment,
      document,
      upsert: (session) =>
        this.enrollmentModel
          .findByIdAndUpdate(_id, { $set: fields }, { upsert: true, session })
          .lean()
          .exec(),
    });
  }

  async findById(id: EntityId): Promise<Enrollment | null> {
    return this.findOne({ _id: id.toString() });
  }

  async findByStudentAndCourse(studentId: EntityId, courseId: EntityId): Promise<Enrollment | null> {
    return this.findOne({ studentId: studentId.toString(), courseId: courseId.toString() });
  }

  async findByStudent(studentId: EntityId): Promise<Enrollment[]> {
    return this.findMany({ studentId: studentId.toString() });
  }

  async findByCourse(courseId: EntityId): Promise<Enrollment[]> {
    return this.findMany({ courseId: courseId.toString() });
  }

  async countActiveByCourse(courseId: EntityId): Promise<number> {
    return this.writer.timed('find', COLLECTION, () =>
      this.enrollmentModel
        .countDocuments({ courseId: courseId.toString(), isActive: true })
        .session(this.sessions.session())
        .exec(),
    );
  }

  private async findOne(filter: FilterQuery<EnrollmentDocument>): Promise<Enrollment | null> {
    const document = await this.writer.timed('find', COLLECTION, () =>
      this.enrollmentModel.findOne(filter).session(this.sessions.session()).exec(),
    );
    return document ? EnrollmentMapper.toDomain(document) : null;
  }

  private async findMany(filter: FilterQuery<EnrollmentDocument>): Promise<Enrollment[]> {
    const documents = await this.writer.timed('find', COLLECTION, () =>
      this.enrollmentModel
        .find(filter)
        .sort({ enrolledAt: -1 })
        .session(this.sessions.session())
        .exec(),
    );
    return documents.map((doc) => EnrollmentMapper.toDomain(doc));
  }
}
