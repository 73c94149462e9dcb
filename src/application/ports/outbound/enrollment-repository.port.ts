import { Enrollment } from '@domain/entities';
import { EntityId } from '@domain/value-objects';

export interface IEnrollmentRepositoryPort {
  save(enrollment: Enrollment): Promise<void>;

  findById(id: EntityId): Promise<Enrollment | null>;

  /**
   * @returns the student's enrollment in the course (active or not), null otherwise
   */
  findByStudentAndCourse(studentId: EntityId, courseId: EntityId): Promise<Enrollment | null>;

  findByStudent(studentId: EntityId): Promise<Enrollment[]>;

  findByCourse(courseId: EntityId): Promise<Enrollment[]>;

  countActiveByCourse(courseId: EntityId): Promise<number>;
}
