import { CourseRating, InstructorRating } from '@domain/entities';

export interface RatingOutputDto {
  readonly id: string;
  /** Course or instructor being rated */
  readonly subjectId: string;
  readonly studentId: string;
  readonly bookingId: string | null;
  readonly rating: number;
  readonly review: string | null;
  readonly isPublic: boolean;
  readonly createdAt: string;
}

export interface RatingSummaryOutputDto {
  readonly subjectId: string;
  /** Mean of all ratings rounded to two decimals, 0 when there are none */
  readonly averageRating: number;
  readonly ratingCount: number;
  readonly ratings: RatingOutputDto[];
}

export function toCourseRatingOutput(rating: CourseRating): RatingOutputDto {
  return {
    id: rating.id.toString(),
    subjectId: rating.courseId.toString(),
    studentId: rating.studentId.toString(),
    bookingId: null,
    rating: rating.rating,
    review: rating.review,
    isPublic: rating.isPublic,
    createdAt: rating.createdAt.toISOString(),
  };
}

export function toInstructorRatingOutput(rating: InstructorRating): RatingOutputDto {
  return {
    id: rating.id.toString(),
    subjectId: rating.instructorId.toString(),
    studentId: rating.studentId.toString(),
    bookingId: rating.bookingId.toString(),
    rating: rating.rating,
    review: rating.review,
    isPublic: rating.isPublic,
    createdAt: rating.createdAt.toISOString(),
  };
}

export function summarizeRatings(
  subjectId: string,
  ratings: RatingOutputDto[],
): RatingSummaryOutputDto {
  const total = ratings.reduce((sum, rating) => sum + rating.rating, 0);
  const average = ratings.length === 0 ? 0 : Math.round((total / ratings.length) * 100) / 100;
  return {
    subjectId,
    averageRating: average,
    ratingCount: ratings.length,
    ratings,
  };
}
