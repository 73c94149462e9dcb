import { Test, TestingModule } from '@nestjs/testing';
import { getConnectionToken } from '@nestjs/mongoose';
import { AvailabilitySlot, Course, PromoCode, User } from '@domain/entities';
import { Email } from '@domain/value-objects';
import { MarketplaceSeederService, parseSeedData } from '@infrastructure/database/seeds';
import { AppLoggerService } from '@infrastructure/observability/logging/app-logger.service';

describe('MarketplaceSeederService', () => {
  let seeder: MarketplaceSeederService;
  let mockUsers: { findByEmail: jest.Mock; save: jest.Mock };
  let mockCourses: { findByInstructor: jest.Mock; save: jest.Mock };
  let mockSlots: { findOverlapping: jest.Mock; save: jest.Mock };
  let mockPromoCodes: { findByCode: jest.Mock; save: jest.Mock };
  let mockHasher: { hash: jest.Mock };
  let mockAppLogger: { logSeed: jest.Mock };
  let mockConnection: { models: Record<string, unknown> };

  const now = new Date('2026-03-01T15:00:00Z');

  const existingStudent = User.create({
    name: 'Mina Sato',
    email: Email.of('mina@example.test'),
    passwordHash: 'existing-hash',
    role: 'student',
  });

  const seedData = parseSeedData({
    users: [
      { name: 'Dana Okafor', email: 'dana@example.test', password: 'test-password', role: 'instructor' },
      { name: 'Mina Sato', email: 'mina@example.test', password: 'test-password', role: 'student' },
    ],
    courses: [
      {
        instructorEmail: 'dana@example.test',
        title: 'ECG Interpretation',
        description: 'Reading 12-lead ECGs',
        category: 'Cardiology',
        price: 89,
        publish: true,
        materials: [
          { title: 'Workbook', fileUrl: 'https://files.example.test/workbook.pdf', fileType: 'pdf' },
        ],
      },
    ],
    availabilitySlots: [
      {
        courseTitle: 'ECG Interpretation',
        startsInDays: 2,
        startHourUtc: 9,
        durationMinutes: 90,
        price: 45,
      },
    ],
    promoCodes: [
      {
        code: 'ecg20',
        discountType: 'fixed_amount',
        discountValue: 20,
        validForDays: 30,
        courseTitles: ['ECG Interpretation'],
      },
    ],
  });

  beforeEach(async () => {
    mockUsers = {
      findByEmail: jest.fn(async (email: Email) =>
        email.toString() === 'mina@example.test' ? existingStudent : null,
      ),
      save: jest.fn().mockResolvedValue(undefined),
    };
    mockCourses = {
      findByInstructor: jest.fn().mockResolvedValue([]),
      save: jest.fn().mockResolvedValue(undefined),
    };
    mockSlots = {
      findOverlapping: jest.fn().mockResolvedValue([]),
      save: jest.fn().mockResolvedValue(undefined),
    };
    mockPromoCodes = {
      findByCode: jest.fn().mockResolvedValue(null),
      save: jest.fn().mockResolvedValue(undefined),
    };
    mockHasher = { hash: jest.fn(async (plainText: string) => `hashed:${plainText}`) };
    mockAppLogger = { logSeed: jest.fn() };
    mockConnection = { models: {} };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MarketplaceSeederService,
        { provide: 'IUserRepository', useValue: mockUsers },
        { provide: 'ICourseRepository', useValue: mockCourses },
        { provide: 'IAvailabilitySlotRepository', useValue: mockSlots },
        { provide: 'IPromoCodeRepository', useValue: mockPromoCodes },
        { provide: 'IPasswordHasher', useValue: mockHasher },
        { provide: getConnectionToken(), useValue: mockConnection },
        { provide: AppLoggerService, useValue: mockAppLogger },
      ],
    }).compile();

    seeder = module.get<MarketplaceSeederService>(MarketplaceSeederService);
  });

  describe('seed', () => {
    it('should create missing users with hashed passwords and confirmed emails', async () => {
      // Act
      await seeder.seed(seedData, now);

      // Assert
      expect(mockUsers.save).toHaveBeenCalledTimes(1);
      const saved: User = mockUsers.save.mock.calls[0][0];
      expect(saved.email.toString()).toBe('dana@example.test');
      expect(saved.passwordHash).toBe('hashed:test-password');
      expect(saved.emailConfirmed).toBe(true);
      expect(mockAppLogger.logSeed).toHaveBeenCalledWith({
        collection: 'users',
        inserted: 1,
        skipped: 1,
      });
    });

    it('should publish courses with their materials', async () => {
      // Act
      await seeder.seed(seedData, now);

      // Assert
      const course: Course = mockCourses.save.mock.calls[0][0];
      expect(course.title).toBe('ECG Interpretation');
      expect(course.isPublished).toBe(true);
      expect(course.price.cents).toBe(8900);
      expect(course.materials).toHaveLength(1);
    });

    it('should place slots relative to the seeding date', async () => {
      // Act
      await seeder.seed(seedData, now);

      // Assert
      const slot: AvailabilitySlot = mockSlots.save.mock.calls[0][0];
      expect(slot.startTime.toISOString()).toBe('2026-03-03T09:00:00.000Z');
      expect(slot.endTime.toISOString()).toBe('2026-03-03T10:30:00.000Z');
      expect(slot.price.cents).toBe(4500);
    });

    it('should resolve promo code courses by title', async () => {
      // Act
      await seeder.seed(seedData, now);

      // Assert
      const course: Course = mockCourses.save.mock.calls[0][0];
      const promoCode: PromoCode = mockPromoCodes.save.mock.calls[0][0];
      expect(promoCode.code).toBe('ECG20');
      expect(promoCode.applicableCourseIds).toEqual([course.id.toString()]);
      expect(promoCode.validUntil.toISOString()).toBe('2026-03-31T15:00:00.000Z');
    });

    it('should skip entries that already exist', async () => {
      // Arrange
      mockSlots.findOverlapping.mockResolvedValue([{}]);
      mockPromoCodes.findByCode.mockResolvedValue({});

      // Act
      await seeder.seed(seedData, now);

      // Assert
      expect(mockSlots.save).not.toHaveBeenCalled();
      expect(mockPromoCodes.save).not.toHaveBeenCalled();
      expect(mockAppLogger.logSeed).toHaveBeenCalledWith({
        collection: 'promo_codes',
        inserted: 0,
        skipped: 1,
      });
    });

    it('should reject courses whose instructor is not an instructor', async () => {
      // Arrange
      const data = parseSeedData({
        users: [
          { name: 'Mina Sato', email: 'mina@example.test', password: 'test-password', role: 'student' },
        ],
        courses: [
          {
            instructorEmail: 'mina@example.test',
            title: 'Orphan',
            description: 'No instructor',
            category: 'General',
            price: 10,
          },
        ],
      });

      // Act & Assert
      await expect(seeder.seed(data, now)).rejects.toThrow(
        'Course "Orphan" names unknown instructor mina@example.test',
      );
      expect(mockCourses.save).not.toHaveBeenCalled();
    });
  });

  describe('getStats', () => {
    it('should count documents per collection', async () => {
      // Arrange
      mockConnection.models = {
        UserDocument: {
          collection: { collectionName: 'users' },
          countDocuments: () => ({ exec: jest.fn().mockResolvedValue(5) }),
        },
        CourseDocument: {
          collection: { collectionName: 'courses' },
          countDocuments: () => ({ exec: jest.fn().mockResolvedValue(3) }),
        },
      };

      // Act & Assert
      expect(await seeder.getStats()).toEqual({ collections: { users: 5, courses: 3 } });
    });
  });
});

describe('parseSeedData', () => {
  it('should fill defaults', () => {
    // Act
    const data = parseSeedData({ promoCodes: [] });

    // Assert
    expect(data.users).toEqual([]);
    expect(data.courses).toEqual([]);
  });

  it('should list invalid entries', () => {
    expect(() =>
      parseSeedData({
        users: [{ name: 'X', email: 'not-an-email', password: 'test-password', role: 'student' }],
      }),
    ).toThrow(/users\.0\.email/);
  });
});
