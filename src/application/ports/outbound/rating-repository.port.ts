import { CourseRating, InstructorRating } from '@domain/entities';
import { EntityId } from '@domain/value-objects';

/**
 * Outbound port for course and instructor ratings.
 */
export interface IRatingRepositoryPort {
  saveCourseRating(rating: CourseRating): Promise<void>;

  saveInstructorRating(rating: InstructorRating): Promise<void>;

  findCourseRating(studentId: EntityId, courseId: EntityId): Promise<CourseRating | null>;

  findInstructorRatingByBooking(bookingId: EntityId): Promise<InstructorRating | null>;

  /**
   * @param publicOnly - Leave out ratings the student hid
   */
  findByCourse(courseId: EntityId, publicOnly: boolean): Promise<CourseRating[]>;

  findByInstructor(instructorId: EntityId, publicOnly: boolean): Promise<InstructorRating[]>;
}
