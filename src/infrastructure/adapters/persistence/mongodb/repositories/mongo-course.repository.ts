import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { FilterQuery, Model, SortOrder } from 'mongoose';
import { Course } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import {
  CourseSearchCriteria,
  CourseSortField,
  DateRange,
  ICourseRepositoryPort,
} from '@application/ports/outbound';
import { PageRequest } from '@application/common';
import { CourseDocument } from '../schemas';
import { CourseMapper } from '../mappers';
import { AggregateWriter } from '../aggregate-writer';
import { MongoSessionContext } from '../mongo-session.context';
import { containsText } from './regex';

const COLLECTION = 'courses';

const SORT_COLUMNS: Record<CourseSortField, keyof CourseDocument> = {
  title: 'title',
  price: 'priceCents',
  createdAt: 'createdAt',
  publishedAt: 'publishedAt',
  updatedAt: 'updatedAt',
  durationMinutes: 'durationMinutes',
};

interface RangeCondition<T> {
  $gte?: T;
  $lte?: T;
}

function range<T>(from: T | undefined, to: T | undefined): RangeCondition<T> | null {
  const condition: RangeCondition<T> = {};
  if (from !== undefined) {
    condition.$gte = from;
  }
  if (to !== undefined) {
    condition.$lte = to;
  }
  return Object.keys(condition).length > 0 ? condition : null;
}

function dateRange(value: DateRange | undefined): RangeCondition<Date> | null {
  return value ? range(value.from, value.to) : null;
}

/**
 * MongoDB implementation of ICourseRepositoryPort.
 * A course is active while it has no deletedAt.
 */
@Injectable()
export class MongoCourseRepository implements ICourseRepositoryPort {
  constructor(
    @InjectModel(CourseDocument.name)
    private readonly courseModel: Model<CourseDocument>,
    private readonly sessions: MongoSessionContext,
    private readonly writer: AggregateWriter,
  ) {}

  async save(course: Course): Promise<void> {
    const document = CourseMapper.toDocument(course);
    const { _id, ...fields } = document;

    await this.writer.save({
      collection: COLLECTION,
      entityName: 'Course',
      aggregate: course,
      document,
      upsert: (session) =>
        this.courseModel
          .findByIdAndUpdate(_id, { $set: fields }, { upsert: true, session })
          .lean()
          .exec(),
    });
  }

  async findById(id: EntityId): Promise<Course | null> {
    const document = await this.writer.timed('find', COLLECTION, () =>
      this.courseModel.findById(id.toString()).session(this.sessions.session()).exec(),
    );

    if (!document) {
      return null;
    }

    return CourseMapper.toDomain(document);
  }

  async findByInstructor(instructorId: EntityId): Promise<Course[]> {
    const documents = await this.writer.timed('find', COLLECTION, () =>
      this.courseModel
        .find({ instructorId: instructorId.toString() })
        .sort({ createdAt: -1 })
        .session(this.sessions.session())
        .exec(),
    );

    return documents.map((doc) => CourseMapper.toDomain(doc));
  }

  async search(
    criteria: CourseSearchCriteria,
    { page, pageSize }: PageRequest,
  ): Promise<{ items: Course[]; totalCount: number }> {
    const filter = this.buildFilter(criteria);
    const sort: Record<string, SortOrder> = {
      [SORT_COLUMNS[criteria.sortBy ?? 'createdAt']]: criteria.sortDirection === 'asc' ? 1 : -1,
      _id: 1,
    };

    const session = this.sessions.session();
    const [documents, totalCount] = await this.writer.timed('find', COLLECTION, () =>
      Promise.all([
        this.courseModel
          .find(filter)
          .sort(sort)
          .skip(page * pageSize)
          .limit(pageSize)
          .session(session)
          .exec(),
        this.courseModel.countDocuments(filter).session(session).exec(),
      ]),
    );

    return { items: documents.map((doc) => CourseMapper.toDomain(doc)), totalCount };
  }

  private buildFilter(criteria: CourseSearchCriteria): FilterQuery<CourseDocument> {
    const filter: FilterQuery<CourseDocument> = {};

    if (criteria.isPublished !== undefined) {
      filter.isPublished = criteria.isPublished;
    }
    if (criteria.isActive !== undefined) {
      filter.deletedAt = criteria.isActive ? null : { $ne: null };
    }
    if (criteria.instructorId) {
      filter.instructorId = criteria.instructorId;
    }
    if (criteria.titleContains) {
      filter.title = containsText(criteria.titleContains);
    }
    if (criteria.descriptionContains) {
      filter.description = containsText(criteria.descriptionContains);
    }
    if (criteria.category) {
      filter.category = criteria.category;
    }
    if (criteria.difficultyLevel) {
      filter.difficultyLevel = criteria.difficultyLevel;
    }
    if (criteria.tagsContains) {
      filter.tags = containsText(criteria.tagsContains);
    }
    if (criteria.currency) {
      filter.currency = criteria.currency.toUpperCase();
    }

    const price = range(
      criteria.minPrice === undefined ? undefined : Math.round(criteria.minPrice * 100),
      criteria.maxPrice === undefined ? undefined : Math.round(criteria.maxPrice * 100),
    );
    if (price) {
      filter.priceCents = price;
    }

    const duration = range(criteria.minDurationMinutes, criteria.maxDurationMinutes);
    if (duration) {
      filter.durationMinutes = duration;
    }

    const capacity = range(criteria.minMaxStudents, criteria.maxMaxStudents);
    if (capacity) {
      filter.maxStudents = capacity;
    }

    const created = dateRange(criteria.created);
    if (created) {
      filter.createdAt = created;
    }
    const published = dateRange(criteria.published);
    if (published) {
      filter.publishedAt = published;
    }
    const updated = dateRange(criteria.updated);
    if (updated) {
      filter.updatedAt = updated;
    }

    return filter;
  }
}
