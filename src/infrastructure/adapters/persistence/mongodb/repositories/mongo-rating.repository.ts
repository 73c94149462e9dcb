import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { CourseRating, InstructorRating } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { IRatingRepositoryPort } from '@application/ports/outbound';
import { CourseRatingDocument, InstructorRatingDocument } from '../schemas';
import { RatingMapper } from '../mappers';
import { AggregateWriter } from '../aggregate-writer';
import { MongoSessionContext } from '../mongo-session.context';

const COURSE_RATINGS = 'course_ratings';
const INSTRUCTOR_RATINGS = 'instructor_ratings';

/**
 * MongoDB implementation of IRatingRepositoryPort.
 * Course and instructor ratings live in separate collections.
 */
@Injectable()
export class MongoRatingRepository implements IRatingRepositoryPort {
  constructor(
    @InjectModel(CourseRatingDocument.name)
    private readonly courseRatingModel: Model<CourseRatingDocument>,
    @InjectModel(InstructorRatingDocument.name)
    private readonly instructorRatingModel: Model<InstructorRatingDocument>,
    private readonly sessions: MongoSessionContext,
    private readonly writer: AggregateWriter,
  ) {}

  async saveCourseRating(rating: CourseRating): Promise<void> {
    const document = RatingMapper.courseRatingToDocument(rating);
    const { _id, ...fields } = document;

    await this.writer.save({
      collection: COURSE_RATINGS,
      entityName: 'CourseRating',
      aggregate: rating,
      document,
      upsert: (session) =>
        this.courseRatingModel
          .findByIdAndUpdate(_id, { $set: fields }, { upsert: true, session })
          .lean()
          .exec(),
    });
  }

  async saveInstructorRating(rating: InstructorRating): Promise<void> {
    const document = RatingMapper.instructorRatingToDocument(rating);
    const { _id, ...fields } = document;

    await this.writer.save({
      collection: INSTRUCTOR_RATINGS,
      entityName: 'InstructorRating',
      aggregate: rating,
      document,
      upsert: (session) =>
        this.instructorRatingModel
          .findByIdAndUpdate(_id, { $set: fields }, { upsert: true, session })
          .lean()
          .exec(),
    });
  }

  async findCourseRating(studentId: EntityId, courseId: EntityId): Promise<CourseRating | null> {
    const document = await this.writer.timed('find', COURSE_RATINGS, () =>
      this.courseRatingModel
        .findOne({ studentId: studentId.toString(), courseId: courseId.toString() })
        .session(this.sessions.session())
        .exec(),
    );
    return document ? RatingMapper.courseRatingToDomain(document) : null;
  }

  async findInstructorRatingByBooking(bookingId: EntityId): Promise<InstructorRating | null> {
    const document = await this.writer.timed('find', INSTRUCTOR_RATINGS, () =>
      this.instructorRatingModel
        .findOne({ bookingId: bookingId.toString() })
        .session(this.sessions.session())
        .exec(),
    );
    return document ? RatingMapper.instructorRatingToDomain(document) : null;
  }

  async findByCourse(courseId: EntityId, publicOnly: boolean): Promise<CourseRating[]> {
    const filter = publicOnly
      ? { courseId: courseId.toString(), isPublic: true }
      : { courseId: courseId.toString() };

    const documents = await this.writer.timed('find', COURSE_RATINGS, () =>
      this.courseRatingModel
        .find(filter)
        .sort({ createdAt: -1 })
        .session(this.sessions.session())
        .exec(),
    );
    return documents.map((doc) => RatingMapper.courseRatingToDomain(doc));
  }

  async findByInstructor(instructorId: EntityId, publicOnly: boolean): Promise<InstructorRating[]> {
    const filter = publicOnly
      ? { instructorId: instructorId.toString(), isPublic: true }
      : { instructorId: instructorId.toString() };

    const documents = await this.writer.timed('find', INSTRUCTOR_RATINGS, () =>
      this.instructorRatingModel
        .find(filter)
        .sort({ createdAt: -1 })
        .session(this.sessions.session())
        .exec(),
    );
    return documents.map((doc) => RatingMapper.instructorRatingToDomain(doc));
  }
}
