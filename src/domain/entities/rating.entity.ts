import { AggregateRoot } from '../events';
import { BusinessRuleViolationException } from '../exceptions';
import { EntityId } from '../value-objects';

export interface RatingProps {
  studentId: EntityId;
  rating: number;
  review: string | null;
  isPublic: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Shared 1-5 star rating behaviour for courses and instructors.
 */
export abstract class Rating<TProps extends RatingProps> extends AggregateRoot {
  static readonly MIN_RATING = 1;
  static readonly MAX_RATING = 5;
  static readonly MAX_REVIEW_LENGTH = 2000;

  protected constructor(id: EntityId, protected readonly props: TProps) {
    super(id);
    Rating.ensureRating(props.rating);
    Rating.ensureReview(props.review);
  }

  get studentId(): EntityId {
    return this.props.studentId;
  }

  get rating(): number {
    return this.props.rating;
  }

  get review(): string | null {
    return this.props.review;
  }

  get isPublic(): boolean {
    return this.props.isPublic;
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  updateRating(rating: number): void {
    Rating.ensureRating(rating);
    this.props.rating = rating;
    this.touch();
  }

  updateReview(review: string | null): void {
    Rating.ensureReview(review);
    this.props.review = review;
    this.touch();
  }

  setVisibility(isPublic: boolean): void {
    this.props.isPublic = isPublic;
    this.touch();
  }

  private static ensureRating(rating: number): void {
    if (!Number.isInteger(rating) || rating < Rating.MIN_RATING || rating > Rating.MAX_RATING) {
      throw new BusinessRuleViolationException('Rating must be between 1 and 5.');
    }
  }

  private static ensureReview(review: string | null): void {
    if (review !== null && review.length > Rating.MAX_REVIEW_LENGTH) {
      throw new BusinessRuleViolationException(
        `Review cannot exceed ${Rating.MAX_REVIEW_LENGTH} characters.`,
      );
    }
  }

  protected touch(): void {
    this.props.updatedAt = new Date();
  }
}

export interface CourseRatingProps extends RatingProps {
  courseId: EntityId;
}

export class CourseRating extends Rating<CourseRatingProps> {
  static create(params: {
    id?: EntityId;
    courseId: EntityId;
    studentId: EntityId;
    rating: number;
    review?: string | null;
    isPublic?: boolean;
  }): CourseRating {
    const now = new Date();
    const courseRating = new CourseRating(params.id ?? EntityId.generate(), {
      courseId: params.courseId,
      studentId: params.studentId,
      rating: params.rating,
      review: params.review ?? null,
      isPublic: params.isPublic ?? true,
      createdAt: now,
      updatedAt: now,
    });
    courseRating.record('CourseRated', {
      courseId: params.courseId.toString(),
      rating: params.rating,
    });
    return courseRating;
  }

  static reconstitute(id: EntityId, props: CourseRatingProps): CourseRating {
    return new CourseRating(id, { ...props });
  }

  get courseId(): EntityId {
    return this.props.courseId;
  }
}

export interface InstructorRatingProps extends RatingProps {
  instructorId: EntityId;
  bookingId: EntityId;
}

export class InstructorRating extends Rating<InstructorRatingProps> {
  static create(params: {
    id?: EntityId;
    instructorId: EntityId;
    studentId: EntityId;
    bookingId: EntityId;
    rating: number;
    review?: string | null;
    isPublic?: boolean;
  }): InstructorRating {
    const now = new Date();
    const instructorRating = new InstructorRating(params.id ?? EntityId.generate(), {
      instructorId: params.instructorId,
      studentId: params.studentId,
      bookingId: params.bookingId,
      rating: params.rating,
      review: params.review ?? null,
      isPublic: params.isPublic ?? true,
      createdAt: now,
      updatedAt: now,
    });
    instructorRating.record('InstructorRated', {
      instructorId: params.instructorId.toString(),
      rating: params.rating,
    });
    return instructorRating;
  }

  static reconstitute(id: EntityId, props: InstructorRatingProps): InstructorRating {
    return new InstructorRating(id, { ...props });
  }

  get instructorId(): EntityId {
    return this.props.instructorId;
  }

  get bookingId(): EntityId {
    return this.props.bookingId;
  }
}
