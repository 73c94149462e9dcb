import { CourseRating, InstructorRating } from '../rating.entity';
import { EntityId } from '../../value-objects';

describe('Ratings', () => {
  it('should create a public course rating by default', () => {
    const rating = CourseRating.create({
      courseId: EntityId.fromString('course-1'),
      studentId: EntityId.fromString('student-1'),
      rating: 4,
      review: 'Clear explanations',
    });

    expect(rating.isPublic).toBe(true);
    expect(rating.courseId.toString()).toBe('course-1');
    expect(rating.pullDomainEvents()[0].name).toBe('CourseRated');
  });

  it('should reject ratings outside 1-5', () => {
    expect(() =>
      CourseRating.create({
        courseId: EntityId.fromString('course-1'),
        studentId: EntityId.fromString('student-1'),
        rating: 6,
      }),
    ).toThrow('Rating must be between 1 and 5.');
  });

  it('should update an instructor rating', () => {
    const rating = InstructorRating.create({
      instructorId: EntityId.fromString('instructor-1'),
      studentId: EntityId.fromString('student-1'),
      bookingId: EntityId.fromString('booking-1'),
      rating: 3,
    });

    rating.updateRating(5);
    rating.setVisibility(false);

    expect(rating.rating).toBe(5);
    expect(rating.isPublic).toBe(false);
    expect(() => rating.updateRating(0)).toThrow('Rating must be between 1 and 5.');
  });
});
