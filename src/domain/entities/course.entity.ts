import { AggregateRoot } from '../events';
import { BusinessRuleViolationException } from '../exceptions';
import { DifficultyLevel, EntityId, Money, Url, UserRole } from '../value-objects';
import { CourseMaterial } from './course-material.entity';

export interface CourseProps {
  instructorId: EntityId;
  title: string;
  description: string;
  shortDescription: string | null;
  content: string | null;
  category: string;
  difficultyLevel: DifficultyLevel | null;
  tags: string[];
  price: Money;
  durationMinutes: number | null;
  maxStudents: number | null;
  thumbnailUrl: Url | null;
  videoIntroUrl: Url | null;
  isPublished: boolean;
  publishedAt: Date | null;
  deletedAt: Date | null;
  materials: CourseMaterial[];
  createdAt: Date;
  updatedAt: Date;
}

export interface CourseDetails {
  title: string;
  description: string;
  shortDescription: string | null;
  content: string | null;
  category: string;
  difficultyLevel: DifficultyLevel | null;
  tags: string[];
  durationMinutes: number | null;
  maxStudents: number | null;
  thumbnailUrl: Url | null;
  videoIntroUrl: Url | null;
}

/**
 * Entity representing a course offered by an instructor.
 * Aggregate root - controls access to its CourseMaterials.
 */
export class Course extends AggregateRoot {
  static readonly MAX_TITLE_LENGTH = 200;
  static readonly MAX_DESCRIPTION_LENGTH = 2000;
  static readonly MAX_SHORT_DESCRIPTION_LENGTH = 500;

  private constructor(id: EntityId, private readonly props: CourseProps) {
    super(id);
  }

  // Factory method: create new unpublished course
  static create(params: {
    id?: EntityId;
    instructorId: EntityId;
    price: Money;
    details: Partial<CourseDetails> & Pick<CourseDetails, 'title' | 'description' | 'category'>;
  }): Course {
    const details = Course.normalizeDetails({
      shortDescription: null,
      content: null,
      difficultyLevel: null,
      tags: [],
      durationMinutes: null,
      maxStudents: null,
      thumbnailUrl: null,
      videoIntroUrl: null,
      ...params.details,
    });

    const now = new Date();
    const course = new Course(params.id ?? EntityId.generate(), {
      ...details,
      instructorId: params.instructorId,
      price: params.price,
      isPublished: false,
      publishedAt: null,
      deletedAt: null,
      materials: [],
      createdAt: now,
      updatedAt: now,
    });
    course.record('CourseCreated', {
      instructorId: params.instructorId.toString(),
      title: details.title,
    });
    return course;
  }

  // Factory method: reconstitute from persistence
  static reconstitute(id: EntityId, props: CourseProps): Course {
    return new Course(id, {
      ...props,
      materials: [...props.materials].sort((a, b) => a.orderIndex - b.orderIndex),
    });
  }

  get instructorId(): EntityId {
    return this.props.instructorId;
  }

  get title(): string {
    return this.props.title;
  }

  get description(): string {
    return this.props.description;
  }

  get shortDescription(): string | null {
    return this.props.shortDescription;
  }

  get content(): string | null {
    return this.props.content;
  }

  get category(): string {
    return this.props.category;
  }

  get difficultyLevel(): DifficultyLevel | null {
    return this.props.difficultyLevel;
  }

  get tags(): readonly string[] {
    return [...this.props.tags];
  }

  get price(): Money {
    return this.props.price;
  }

  get durationMinutes(): number | null {
    return this.props.durationMinutes;
  }

  get maxStudents(): number | null {
    return this.props.maxStudents;
  }

  get thumbnailUrl(): Url | null {
    return this.props.thumbnailUrl;
  }

  get videoIntroUrl(): Url | null {
    return this.props.videoIntroUrl;
  }

  get isPublished(): boolean {
    return this.props.isPublished;
  }

  get publishedAt(): Date | null {
    return this.props.publishedAt;
  }

  get deletedAt(): Date | null {
    return this.props.deletedAt;
  }

  get isActive(): boolean {
    return this.props.deletedAt === null;
  }

  get materials(): readonly CourseMaterial[] {
    return [...this.props.materials];
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  // Business logic: change descriptive fields, keeping omitted ones
  updateDetails(changes: Partial<CourseDetails>): void {
    const details = Course.normalizeDetails({
      title: changes.title ?? this.props.title,
      description: changes.description ?? this.props.description,
      shortDescription:
        changes.shortDescription !== undefined
          ? changes.shortDescription
          : this.props.shortDescription,
      content: changes.content !== undefined ? changes.content : this.props.content,
      category: changes.category ?? this.props.category,
      difficultyLevel:
        changes.difficultyLevel !== undefined
          ? changes.difficultyLevel
          : this.props.difficultyLevel,
      tags: changes.tags ?? this.props.tags,
      durationMinutes:
        changes.durationMinutes !== undefined
          ? changes.durationMinutes
          : this.props.durationMinutes,
      maxStudents: changes.maxStudents !== undefined ? changes.maxStudents : this.props.maxStudents,
      thumbnailUrl:
        changes.thumbnailUrl !== undefined ? changes.thumbnailUrl : this.props.thumbnailUrl,
      videoIntroUrl:
        changes.videoIntroUrl !== undefined ? changes.videoIntroUrl : this.props.videoIntroUrl,
    });

    Object.assign(this.props, details);
    this.touch();
    this.record('CourseUpdated', { title: details.title });
  }

  updatePrice(price: Money): void {
    this.props.price = price;
    this.touch();
    this.record('CourseUpdated', { price: price.format() });
  }

  // Business logic: make the course visible in the catalogue
  publish(now: Date = new Date()): void {
    if (this.props.isPublished) {
      throw new BusinessRuleViolationException('Course is already published');
    }
    if (this.props.materials.length === 0) {
      throw new BusinessRuleViolationException('Cannot publish course without materials');
    }

    this.props.isPublished = true;
    this.props.publishedAt = now;
    this.touch();
    this.record('CoursePublished', { publishedAt: now.toISOString() });
  }

  unpublish(): void {
    if (!this.props.isPublished) {
      throw new BusinessRuleViolationException('Course is not published');
    }

    this.props.isPublished = false;
    this.props.publishedAt = null;
    this.touch();
    this.record('CourseUnpublished');
  }

  // Business logic: soft delete handling
  activate(): void {
    if (this.isActive) {
      throw new BusinessRuleViolationException('Course is already active');
    }
    this.props.deletedAt = null;
    this.touch();
    this.record('CourseActivated');
  }

  deactivate(now: Date = new Date()): void {
    if (!this.isActive) {
      throw new BusinessRuleViolationException('Course is already inactive');
    }
    this.props.deletedAt = now;
    this.touch();
    this.record('CourseDeactivated');
  }

  // Business logic: add a material, keeping materials ordered
  addMaterial(material: CourseMaterial): void {
    if (this.props.materials.some((existing) => existing.equals(material))) {
      throw new BusinessRuleViolationException('Material already exists in course');
    }

    this.props.materials.push(material);
    this.sortMaterials();
    this.touch();
    this.record('CourseMaterialAdded', { materialId: material.id.toString() });
  }

  removeMaterial(materialId: string): void {
    const index = this.props.materials.findIndex(
      (material) => material.id.toString() === materialId,
    );
    if (index === -1) {
      throw new BusinessRuleViolationException('Material not found in course');
    }

    this.props.materials.splice(index, 1);
    this.touch();
    this.record('CourseMaterialRemoved', { materialId });
  }

  replaceMaterials(materials: CourseMaterial[]): void {
    const ids = new Set(materials.map((material) => material.id.toString()));
    if (ids.size !== materials.length) {
      throw new BusinessRuleViolationException('Material already exists in course');
    }

    this.props.materials = [...materials];
    this.sortMaterials();
    this.touch();
    this.record('CourseUpdated', { materials: this.props.materials.length });
  }

  // Business logic: assign order 1..n following the given id sequence
  reorderMaterials(materialIds: readonly string[]): void {
    if (
      materialIds.length !== this.props.materials.length ||
      new Set(materialIds).size !== materialIds.length
    ) {
      throw new BusinessRuleViolationException(
        'Must provide all material IDs in the correct order',
      );
    }

    const reordered = materialIds.map((materialId, position) => {
      const material = this.props.materials.find((m) => m.id.toString() === materialId);
      if (!material) {
        throw new BusinessRuleViolationException(
          `Material with ID ${materialId} not found in course`,
        );
      }
      return material.withOrderIndex(position + 1);
    });

    this.props.materials = reordered;
    this.touch();
    this.record('CourseMaterialsReordered', { materialIds: [...materialIds] });
  }

  /**
   * Access rule: admins see everything, instructors see their own courses,
   * students see published, active courses they are enrolled in.
   */
  canBeAccessedBy(userId: string, role: UserRole, isEnrolled: boolean): boolean {
    if (role === 'admin') {
      return true;
    }
    if (role === 'instructor' && this.props.instructorId.toString() === userId) {
      return true;
    }
    return this.props.isPublished && this.isActive && isEnrolled;
  }

  isOwnedBy(instructorId: string): boolean {
    return this.props.instructorId.toString() === instructorId;
  }

  // Course is open for new enrollments and bookings
  isAvailable(): boolean {
    return this.props.isPublished && this.isActive;
  }

  private static normalizeDetails(details: CourseDetails): CourseDetails {
    const title = details.title?.trim() ?? '';
    if (title.length === 0) {
      throw new BusinessRuleViolationException('Title cannot be empty');
    }
    if (title.length > Course.MAX_TITLE_LENGTH) {
      throw new BusinessRuleViolationException(
        `Title cannot exceed ${Course.MAX_TITLE_LENGTH} characters`,
      );
    }
    if (details.description.length > Course.MAX_DESCRIPTION_LENGTH) {
      throw new BusinessRuleViolationException(
        `Description cannot exceed ${Course.MAX_DESCRIPTION_LENGTH} characters`,
      );
    }
    if (
      details.shortDescription !== null &&
      details.shortDescription.length > Course.MAX_SHORT_DESCRIPTION_LENGTH
    ) {
      throw new BusinessRuleViolationException(
        `Short description cannot exceed ${Course.MAX_SHORT_DESCRIPTION_LENGTH} characters`,
      );
    }
    if (!details.category || details.category.trim().length === 0) {
      throw new BusinessRuleViolationException('Category is required');
    }
    if (details.durationMinutes !== null && details.durationMinutes <= 0) {
      throw new BusinessRuleViolationException('Duration must be positive');
    }
    if (details.maxStudents !== null && details.maxStudents <= 0) {
      throw new BusinessRuleViolationException('Max students must be positive');
    }

    return {
      ...details,
      title,
      category: details.category.trim(),
      tags: [...new Set(details.tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0))],
    };
  }

  private sortMaterials(): void {
    this.props.materials.sort((a, b) => a.orderIndex - b.orderIndex);
  }

  private touch(): void {
    this.props.updatedAt = new Date();
  }
}
