import {
  ICourseRepositoryPort,
  IEnrollmentRepositoryPort,
  IUserRepositoryPort,
} from '@application/ports';
import { EnrollStudentCommand, EnrollStudentHandler } from '@application/use-cases';
import { Enrollment } from '@domain/entities';
import { EntityId } from '@domain/value-objects';
import {
  createCourseRepositoryMock,
  createEnrollmentRepositoryMock,
  createTestCourse,
  createTestUser,
  createUserRepositoryMock,
} from '../fixtures';

describe('EnrollStudentHandler', () => {
  let enrollmentRepository: jest.Mocked<IEnrollmentRepositoryPort>;
  let courseRepository: jest.Mocked<ICourseRepositoryPort>;
  let userRepository: jest.Mocked<IUserRepositoryPort>;
  let handler: EnrollStudentHandler;

  const existingEnrollment = (): Enrollment =>
    Enrollment.create({
      studentId: EntityId.fromString('student-1'),
      courseId: EntityId.fromString('course-1'),
    });

  beforeEach(() => {
    enrollmentRepository = createEnrollmentRepositoryMock();
    courseRepository = createCourseRepositoryMock();
    userRepository = createUserRepositoryMock();
    handler = new EnrollStudentHandler(enrollmentRepository, courseRepository, userRepository);

    userRepository.findById.mockResolvedValue(createTestUser({ id: 'student-1' }));
    courseRepository.findById.mockResolvedValue(createTestCourse());
    enrollmentRepository.findByStudentAndCourse.mockResolvedValue(null);
  });

  it('should enroll a student in a published course', async () => {
    const result = await handler.handle(new EnrollStudentCommand('student-1', 'course-1'));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.studentId).toBe('student-1');
    expect(result.value.courseId).toBe('course-1');
    expect(result.value.progressPercentage).toBe(0);
    expect(enrollmentRepository.save).toHaveBeenCalledWith(expect.any(Enrollment));
  });

  it('should report an existing active enrollment as a conflict', async () => {
    enrollmentRepository.findByStudentAndCourse.mockResolvedValue(existingEnrollment());

    const result = await handler.handle(new EnrollStudentCommand('student-1', 'course-1'));

    expect(result).toEqual({
      ok: false,
      kind: 'conflict',
      errors: ['Student is already enrolled in this course.'],
    });
  });

  it('should ask to reactivate an inactive enrollment', async () => {
    const inactive = existingEnrollment();
    inactive.deactivate();
    enrollmentRepository.findByStudentAndCourse.mockResolvedValue(inactive);

    const result = await handler.handle(new EnrollStudentCommand('student-1', 'course-1'));

    expect(result).toEqual({
      ok: false,
      kind: 'failure',
      errors: ['Enrollment exists but is inactive. Reactivate it instead.'],
    });
  });

  it('should refuse a full course', async () => {
    courseRepository.findById.mockResolvedValue(createTestCourse({ maxStudents: 2 }));
    enrollmentRepository.countActiveByCourse.mockResolvedValue(2);

    const result = await handler.handle(new EnrollStudentCommand('student-1', 'course-1'));

    expect(result).toEqual({
      ok: false,
      kind: 'failure',
      errors: ['Course has reached its maximum number of students.'],
    });
    expect(enrollmentRepository.save).not.toHaveBeenCalled();
  });

  it('should refuse an unpublished course', async () => {
    courseRepository.findById.mockResolvedValue(createTestCourse({ published: false }));

    const result = await handler.handle(new EnrollStudentCommand('student-1', 'course-1'));

    expect(result).toEqual({
      ok: false,
      kind: 'failure',
      errors: ['Course is not open for enrollment.'],
    });
  });
});
