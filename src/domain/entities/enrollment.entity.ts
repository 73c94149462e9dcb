import { AggregateRoot } from '../events';
import { BusinessRuleViolationException } from '../exceptions';
import { EntityId } from '../value-objects';

export interface EnrollmentProps {
  studentId: EntityId;
  courseId: EntityId;
  enrolledAt: Date;
  isActive: boolean;
  progressPercentage: number;
  completedAt: Date | null;
  lastAccessedAt: Date | null;
  completedMaterialIds: string[];
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Entity representing a student's access to a course and their progress in it.
 */
export class Enrollment extends AggregateRoot {
  private constructor(id: EntityId, private readonly props: EnrollmentProps) {
    super(id);
  }

  static create(params: { id?: EntityId; studentId: EntityId; courseId: EntityId }): Enrollment {
    const now = new Date();
    const enrollment = new Enrollment(params.id ?? EntityId.generate(), {
      studentId: params.studentId,
      courseId: params.courseId,
      enrolledAt: now,
      isActive: true,
      progressPercentage: 0,
      completedAt: null,
      lastAccessedAt: null,
      completedMaterialIds: [],
      createdAt: now,
      updatedAt: now,
    });
    enrollment.record('StudentEnrolled', {
      studentId: params.studentId.toString(),
      courseId: params.courseId.toString(),
    });
    return enrollment;
  }

  static reconstitute(id: EntityId, props: EnrollmentProps): Enrollment {
    return new Enrollment(id, { ...props, completedMaterialIds: [...props.completedMaterialIds] });
  }

  get studentId(): EntityId {
    return this.props.studentId;
  }

  get courseId(): EntityId {
    return this.props.courseId;
  }

  get enrolledAt(): Date {
    return this.props.enrolledAt;
  }

  get isActive(): boolean {
    return this.props.isActive;
  }

  get progressPercentage(): number {
    return this.props.progressPercentage;
  }

  get completedAt(): Date | null {
    return this.props.completedAt;
  }

  get lastAccessedAt(): Date | null {
    return this.props.lastAccessedAt;
  }

  get completedMaterialIds(): readonly string[] {
    return [...this.props.completedMaterialIds];
  }

  get createdAt(): Date {
    return this.props.createdAt;
  }

  get updatedAt(): Date {
    return this.props.updatedAt;
  }

  isCompleted(): boolean {
    return this.props.completedAt !== null;
  }

  complete(now: Date = new Date()): void {
    if (this.isCompleted()) {
      throw new BusinessRuleViolationException('Enrollment is already completed.');
    }

    this.props.completedAt = now;
    this.props.progressPercentage = 100;
    this.touch();
    this.record('EnrollmentCompleted');
  }

  updateProgress(percentage: number): void {
    if (!Number.isFinite(percentage) || percentage < 0 || percentage > 100) {
      throw new BusinessRuleViolationException('Progress percentage must be between 0 and 100.');
    }
    if (this.isCompleted()) {
      throw new BusinessRuleViolationException('Cannot update progress on completed enrollment.');
    }

    this.props.progressPercentage = Math.round(percentage * 100) / 100;
    this.props.lastAccessedAt = new Date();
    this.touch();
  }

  /**
   * Marks one course material as done and recomputes progress against the
   * number of materials in the course. Reaching 100% completes the enrollment.
   */
  completeMaterial(materialId: string, totalMaterials: number): void {
    if (this.props.completedMaterialIds.includes(materialId)) {
      throw new BusinessRuleViolationException('Course material is already completed.');
    }
    if (this.isCompleted()) {
      throw new BusinessRuleViolationException('Cannot update progress on completed enrollment.');
    }

    this.props.completedMaterialIds.push(materialId);
    const percentage =
      totalMaterials > 0
        ? Math.min((this.props.completedMaterialIds.length / totalMaterials) * 100, 100)
        : 100;
    this.updateProgress(percentage);

    if (this.props.progressPercentage >= 100) {
      this.complete();
    }
  }

  deactivate(): void {
    if (!this.props.isActive) {
      throw new BusinessRuleViolationException('Enrollment is already inactive.');
    }
    this.props.isActive = false;
    this.touch();
    this.record('EnrollmentDeactivated');
  }

  reactivate(): void {
    if (this.props.isActive) {
      throw new BusinessRuleViolationException('Enrollment is already active.');
    }
    this.props.isActive = true;
    this.touch();
    this.record('EnrollmentReactivated');
  }

  recordAccess(now: Date = new Date()): void {
    this.props.lastAccessedAt = now;
    this.touch();
  }

  private touch(): void {
    this.props.updatedAt = new Date();
  }
}
