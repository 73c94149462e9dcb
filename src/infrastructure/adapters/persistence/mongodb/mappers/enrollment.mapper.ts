import { Enrollment } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import { EnrollmentDocument } from '../schemas';

export class EnrollmentMapper {
  static toDomain(document: EnrollmentDocument): Enrollment {
    return Enrollment.reconstitute(EntityId.fromString(document._id), {
      studentId: EntityId.fromString(document.studentId),
      courseId: EntityId.fromString(document.courseId),
      enrolledAt: document.enrolledAt,
      isActive: document.isActive,
      progressPercentage: document.progressPercentage,
      completedAt: document.completedAt ?? null,
      lastAccessedAt: document.lastAccessedAt ?? null,
      completedMaterialIds: [...document.completedMaterialIds],
      createdAt: document.createdAt,
      updatedAt: document.updatedAt,
    });
  }

  static toDocument(enrollment: Enrollment): EnrollmentDocument {
    const document = new EnrollmentDocument();
    document._id = enrollment.id.toString();
    document.studentId = enrollment.studentId.toString();
    document.courseId = enrollment.courseId.toString();
    document.enrolledAt = enrollment.enrolledAt;
    document.isActive = enrollment.isActive;
    document.progressPercentage = enrollment.progressPercentage;
    document.completedAt = enrollment.completedAt;
    document.lastAccessedAt = enrollment.lastAccessedAt;
    document.completedMaterialIds = [...enrollment.completedMaterialIds];
    document.createdAt = enrollment.createdAt;
    document.updatedAt = enrollment.updatedAt;
    return document;
  }
}
