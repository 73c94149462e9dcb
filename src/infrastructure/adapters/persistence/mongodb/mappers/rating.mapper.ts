import { CourseRating, InstructorRating } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { CourseRatingDocument, InstructorRatingDocument } from '../schemas';

/**
 * Mapper for both rating collections.
 */
export class RatingMapper {
  static courseRatingToDomain(document: CourseRatingDocument): CourseRating {
    return CourseRating.reconstitute(EntityId.fromString(document._id), {
      courseId: EntityId.fromString(document.courseId),
      studentId: EntityId.fromString(document.studentId),
      rating: document.rating,
      review: document.review ?? null,
      isPublic: document.isPublic,
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }

  static courseRatingToDocument(rating: CourseRating): CourseRatingDocument {
    const document = new CourseRatingDocument();
    document._id = rating.id.toString();
    document.courseId = rating.courseId.toString();
    document.studentId = rating.studentId.toString();
    document.rating = rating.rating;
    document.review = rating.review;
    document.isPublic = rating.isPublic;
    document.createdAt = rating.createdAt;
    document.updatedAt = rating.updatedAt;
    return document;
  }

  static instructorRatingToDomain(document: InstructorRatingDocument): InstructorRating {
    return InstructorRating.reconstitute(EntityId.fromString(document._id), {
      instructorId: EntityId.fromString(document.instructorId),
      studentId: EntityId.fromString(document.studentId),
      bookingId: EntityId.fromString(document.bookingId),
      rating: document.rating,
      review: document.review ?? null,
      isPublic: document.isPublic,
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }

  static instructorRatingToDocument(rating: InstructorRating): InstructorRatingDocument {
    const document = new InstructorRatingDocument();
    document._id = rating.id.toString();
    document.instructorId = rating.instructorId.toString();
    document.studentId = rating.studentId.toString();
    document.bookingId = rating.bookingId.toString();
    document.rating = rating.rating;
    document.review = rating.review;
    document.isPublic = rating.isPublic;
    document.createdAt = rating.createdAt;
    document.updatedAt = rating.updatedAt;
    return document;
  }
}
