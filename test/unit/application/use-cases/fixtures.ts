import {
  IAvailabilitySlotRepositoryPort,
  IBookingRepositoryPort,
  ICourseRepositoryPort,
  IEnrollmentRepositoryPort,
  INotificationRepositoryPort,
  IPasswordHasherPort,
  IPaymentRepositoryPort,
  IPromoCodeRepositoryPort,
  IRatingRepositoryPort,
  IUserRepositoryPort,
} from '@application/ports';
import { AvailabilitySlot, Course, CourseMaterial, User } from '@domain/entities';
import { Email, EntityId, Money, Url, UserRole } from '@domain/value-objects';

// ============ Repository mocks ============

export const createUserRepositoryMock = (): jest.Mocked<IUserRepositoryPort> => ({
  save: jest.fn(),
  findById: jest.fn(),
  findByEmail: jest.fn(),
  existsByEmail: jest.fn(),
  findByEmailConfirmationToken: jest.fn(),
  findByPasswordResetToken: jest.fn(),
  findPage: jest.fn(),
});

export const createCourseRepositoryMock = (): jest.Mocked<ICourseRepositoryPort> => ({
  save: jest.fn(),
  findById: jest.fn(),
  findByInstructor: jest.fn(),
  search: jest.fn(),
});

export const createSlotRepositoryMock = (): jest.Mocked<IAvailabilitySlotRepositoryPort> => ({
  save: jest.fn(),
  findById: jest.fn(),
  findByInstructor: jest.fn(),
  findAvailable: jest.fn(),
  findOverlapping: jest.fn(),
});

export const createBookingRepositoryMock = (): jest.Mocked<IBookingRepositoryPort> => ({
  save: jest.fn(),
  findById: jest.fn(),
  findByStudent: jest.fn(),
  findByInstructor: jest.fn(),
  findByStatus: jest.fn(),
  findActiveForStudentAndSlot: jest.fn(),
});

export const createPaymentRepositoryMock = (): jest.Mocked<IPaymentRepositoryPort> => ({
  save: jest.fn(),
  findById: jest.fn(),
  findByBooking: jest.fn(),
  findByUser: jest.fn(),
});

export const createEnrollmentRepositoryMock = (): jest.Mocked<IEnrollmentRepositoryPort> => ({
  save: jest.fn(),
  findById: jest.fn(),
  findByStudentAndCourse: jest.fn(),
  findByStudent: jest.fn(),
  findByCourse: jest.fn(),
  countActiveByCourse: jest.fn(),
});

export const createRatingRepositoryMock = (): jest.Mocked<IRatingRepositoryPort> => ({
  saveCourseRating: jest.fn(),
  saveInstructorRating: jest.fn(),
  findCourseRating: jest.fn(),
  findInstructorRatingByBooking: jest.fn(),
  findByCourse: jest.fn(),
  findByInstructor: jest.fn(),
});

export const createNotificationRepositoryMock = (): jest.Mocked<INotificationRepositoryPort> => ({
  save: jest.fn(),
  findById: jest.fn(),
  findByUser: jest.fn(),
});

export const createPromoCodeRepositoryMock = (): jest.Mocked<IPromoCodeRepositoryPort> => ({
  save: jest.fn(),
  findById: jest.fn(),
  findByCode: jest.fn(),
  findAll: jest.fn(),
});

export const createPasswordHasherMock = (): jest.Mocked<IPasswordHasherPort> => ({
  hash: jest.fn(),
  verify: jest.fn(),
});

// ============ Entity builders ============

const HOUR_MS = 60 * 60 * 1000;

export const hoursFromNow = (hours: number): Date => new Date(Date.now() + hours * HOUR_MS);

export const createTestUser = (
  overrides: Partial<{ id: string; name: string; email: string; role: UserRole }> = {},
): User =>
  User.create({
    id: EntityId.fromString(overrides.id ?? 'user-1'),
    name: overrides.name ?? 'Dana Whitfield',
    email: Email.of(overrides.email ?? 'dana@clinic.test'),
    passwordHash: 'stored-hash',
    role: overrides.role ?? 'student',
  });

export const createTestCourse = (
  overrides: Partial<{
    id: string;
    instructorId: string;
    price: number;
    maxStudents: number | null;
    published: boolean;
  }> = {},
): Course => {
  const course = Course.create({
    id: EntityId.fromString(overrides.id ?? 'course-1'),
    instructorId: EntityId.fromString(overrides.instructorId ?? 'instructor-1'),
    price: Money.of(overrides.price ?? 100),
    details: {
      title: 'Emergency Airway Management',
      description: 'Hands-on airway skills for emergency physicians',
      category: 'Emergency Medicine',
      maxStudents: overrides.maxStudents ?? null,
    },
  });
  course.addMaterial(
    CourseMaterial.create(
      {
        title: 'Intubation checklist',
        fileUrl: Url.of('https://cdn.test/intubation.pdf'),
        fileType: 'pdf',
        orderIndex: 0,
      },
      EntityId.fromString('material-1'),
    ),
  );
  if (overrides.published ?? true) {
    course.publish();
  }
  return course;
};

export const createTestSlot = (
  overrides: Partial<{
    id: string;
    courseId: string;
    instructorId: string;
    startsInHours: number;
    price: number;
    maxParticipants: number;
  }> = {},
): AvailabilitySlot => {
  const startTime = hoursFromNow(overrides.startsInHours ?? 72);
  return AvailabilitySlot.create({
    id: EntityId.fromString(overrides.id ?? 'slot-1'),
    courseId: EntityId.fromString(overrides.courseId ?? 'course-1'),
    instructorId: EntityId.fromString(overrides.instructorId ?? 'instructor-1'),
    startTime,
    endTime: new Date(startTime.getTime() + HOUR_MS),
    price: Money.of(overrides.price ?? 100),
    maxParticipants: overrides.maxParticipants ?? 2,
  });
};
