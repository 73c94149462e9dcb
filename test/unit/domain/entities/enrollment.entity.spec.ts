import { Enrollment } from '@domain/entities';
import { EntityId } from '@domain/value-objects';

describe('Enrollment', () => {
  const createTestEnrollment = (): Enrollment =>
    Enrollment.create({
      studentId: EntityId.fromString('student-1'),
      courseId: EntityId.fromString('course-1'),
    });

  it('should start active with no progress', () => {
    const enrollment = createTestEnrollment();

    expect(enrollment.isActive).toBe(true);
    expect(enrollment.progressPercentage).toBe(0);
    expect(enrollment.isCompleted()).toBe(false);
  });

  it('should validate the progress range', () => {
    const enrollment = createTestEnrollment();

    expect(() => enrollment.updateProgress(101)).toThrow(
      'Progress percentage must be between 0 and 100.',
    );
    enrollment.updateProgress(42.5);
    expect(enrollment.progressPercentage).toBe(42.5);
  });

  it('should set progress to 100 on completion and refuse further updates', () => {
    const enrollment = createTestEnrollment();

    enrollment.complete();

    expect(enrollment.progressPercentage).toBe(100);
    expect(() => enrollment.complete()).toThrow('Enrollment is already completed.');
    expect(() => enrollment.updateProgress(50)).toThrow(
      'Cannot update progress on completed enrollment.',
    );
  });

  it('should compute progress from completed materials', () => {
    const enrollment = createTestEnrollment();

    enrollment.completeMaterial('m1', 3);
    expect(enrollment.progressPercentage).toBe(33.33);

    expect(() => enrollment.completeMaterial('m1', 3)).toThrow(
      'Course material is already completed.',
    );

    enrollment.completeMaterial('m2', 3);
    enrollment.completeMaterial('m3', 3);
    expect(enrollment.isCompleted()).toBe(true);
    expect(enrollment.progressPercentage).toBe(100);
  });

  it('should toggle activity with guards', () => {
    const enrollment = createTestEnrollment();

    expect(() => enrollment.reactivate()).toThrow('Enrollment is already active.');
    enrollment.deactivate();
    expect(() => enrollment.deactivate()).toThrow('Enrollment is already inactive.');
    enrollment.reactivate();
    expect(enrollment.isActive).toBe(true);
  });
});
