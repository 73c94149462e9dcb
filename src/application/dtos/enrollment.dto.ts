import { Enrollment } from '@domain/entities';

export interface EnrollmentOutputDto {
  readonly id: string;
  readonly studentId: string;
  readonly courseId: string;
  readonly enrolledAt: string;
  readonly isActive: boolean;
  readonly progressPercentage: number;
  readonly completedAt: string | null;
  readonly lastAccessedAt: string | null;
  readonly completedMaterialIds: string[];
}

export function toEnrollmentOutput(enrollment: Enrollment): EnrollmentOutputDto {
  return {
    id: enrollment.id.toString(),
    studentId: enrollment.studentId.toString(),
    courseId: enrollment.courseId.toString(),
    enrolledAt: enrollment.enrolledAt.toISOString(),
    isActive: enrollment.isActive,
    progressPercentage: enrollment.progressPercentage,
    completedAt: enrollment.completedAt?.toISOString() ?? null,
    lastAccessedAt: enrollment.lastAccessedAt?.toISOString() ?? null,
    completedMaterialIds: [...enrollment.completedMaterialIds],
  };
}
