import { readFile } from 'fs/promises';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import {
  IAvailabilitySlotRepositoryPort,
  ICourseRepositoryPort,
  IPasswordHasherPort,
  IPromoCodeRepositoryPort,
  IUserRepositoryPort,
} from '@application/ports/outbound';
import { AvailabilitySlot, Course, CourseMaterial, PromoCode, User } from '@domain/entities';
import { Currency, Email, Money, Url } from '@domain/value-objects';
import { AppLoggerService } from '@infrastructure/observability/logging/app-logger.service';
import {
  parseSeedData,
  SeedCourse,
  SeedData,
  SeedPromoCode,
  SeedSlot,
} from './seed-data.schema';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SeedStats {
  collections: Record<string, number>;
}

/**
 * Loads the marketplace's starter catalogue: accounts, courses, slots and promo codes.
 * Entries that already exist are skipped, so seeding twice is harmless.
 */
@Injectable()
export class MarketplaceSeederService {
  private readonly logger = new Logger(MarketplaceSeederService.name);

  constructor(
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
    @Inject('ICourseRepository')
    private readonly courseRepository: ICourseRepositoryPort,
    @Inject('IAvailabilitySlotRepository')
    private readonly slotRepository: IAvailabilitySlotRepositoryPort,
    @Inject('IPromoCodeRepository')
    private readonly promoCodeRepository: IPromoCodeRepositoryPort,
    @Inject('IPasswordHasher')
    private readonly passwordHasher: IPasswordHasherPort,
    @InjectConnection()
    private readonly connection: Connection,
    private readonly appLogger: AppLoggerService,
  ) {}

  async loadFile(path: string): Promise<SeedData> {
    this.logger.log(`Reading seed data from ${path}`);
    const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
    return parseSeedData(raw);
  }

  async seed(data: SeedData, now: Date = new Date()): Promise<void> {
    this.logger.log('Starting seed process...');

    const usersByEmail = await this.seedUsers(data);
    const coursesByTitle = await this.seedCourses(data.courses, usersByEmail);
    await this.seedSlots(data.availabilitySlots, coursesByTitle, now);
    await this.seedPromoCodes(data.promoCodes, coursesByTitle, now);
  }

  /**
   * Empties every collection the application owns.
   */
  async clear(): Promise<void> {
    this.logger.log('Clearing existing data...');

    for (const model of Object.values(this.connection.models)) {
      const { deletedCount } = await model.deleteMany({}).exec();
      this.logger.log(`Cleared ${deletedCount} documents from ${model.collection.collectionName}`);
    }
  }

  async getStats(): Promise<SeedStats> {
    const collections: Record<string, number> = {};
    for (const model of Object.values(this.connection.models)) {
      collections[model.collection.collectionName] = await model.countDocuments().exec();
    }
    return { collections };
  }

  private async seedUsers(data: SeedData): Promise<Map<string, User>> {
    const usersByEmail = new Map<string, User>();
    let inserted = 0;

    for (const entry of data.users) {
      const email = Email.of(entry.email);
      const existing = await this.userRepository.findByEmail(email);
      if (existing) {
        usersByEmail.set(email.toString(), existing);
        continue;
      }

      const user = User.create({
        name: entry.name,
        email,
        passwordHash: await this.passwordHasher.hash(entry.password),
        role: entry.role,
        timezone: entry.timezone,
      });
      // Seeded accounts can sign in straight away
      user.confirmEmail(user.generateEmailConfirmationToken(DAY_MS));
      await this.userRepository.save(user);
      usersByEmail.set(email.toString(), user);
      inserted++;
    }

    this.appLogger.logSeed({
      collection: 'users',
      inserted,
      skipped: data.users.length - inserted,
    });
    return usersByEmail;
  }

  private async seedCourses(
    entries: SeedCourse[],
    usersByEmail: Map<string, User>,
  ): Promise<Map<string, Course>> {
    const coursesByTitle = new Map<string, Course>();
    let inserted = 0;

    for (const entry of entries) {
      const instructor = usersByEmail.get(Email.of(entry.instructorEmail).toString());
      if (!instructor || !instructor.isInstructor()) {
        throw new Error(`Course "${entry.title}" names unknown instructor ${entry.instructorEmail}`);
      }

      const owned = await this.courseRepository.findByInstructor(instructor.id);
      const existing = owned.find((course) => course.title === entry.title.trim());
      if (existing) {
        coursesByTitle.set(existing.title, existing);
        continue;
      }

      const course = Course.create({
        instructorId: instructor.id,
        price: Money.of(entry.price, entry.currency),
        details: {
          title: entry.title,
          description: entry.description,
          shortDescription: entry.shortDescription ?? null,
          category: entry.category,
          difficultyLevel: entry.difficultyLevel ?? null,
          tags: entry.tags,
          durationMinutes: entry.durationMinutes ?? null,
          maxStudents: entry.maxStudents ?? null,
        },
      });
      entry.materials.forEach((material, orderIndex) =>
        course.addMaterial(
          CourseMaterial.create({
            title: material.title,
            fileUrl: Url.of(material.fileUrl),
            fileType: material.fileType,
            orderIndex,
            isFree: material.isFree,
            durationMinutes: material.durationMinutes,
          }),
        ),
      );
      if (entry.publish) {
        course.publish();
      }

      await this.courseRepository.save(course);
      coursesByTitle.set(course.title, course);
      inserted++;
    }

    this.appLogger.logSeed({ collection: 'courses', inserted, skipped: entries.length - inserted });
    return coursesByTitle;
  }

  private async seedSlots(
    entries: SeedSlot[],
    coursesByTitle: Map<string, Course>,
    now: Date,
  ): Promise<void> {
    let inserted = 0;

    for (const entry of entries) {
      const course = this.requireCourse(coursesByTitle, entry.courseTitle);

      const day = new Date(now.getTime() + entry.startsInDays * DAY_MS);
      const startTime = new Date(
        Date.UTC(day.getUTCFullYear(), day.getUTCMonth(), day.getUTCDate(), entry.startHourUtc),
      );
      const endTime = new Date(startTime.getTime() + entry.durationMinutes * 60_000);

      const overlapping = await this.slotRepository.findOverlapping(
        course.instructorId,
        startTime,
        endTime,
      );
      if (overlapping.length > 0) {
        continue;
      }

      await this.slotRepository.save(
        AvailabilitySlot.create({
          courseId: course.id,
          instructorId: course.instructorId,
          startTime,
          endTime,
          price: Money.of(entry.price, entry.currency),
          maxParticipants: entry.maxParticipants,
          notes: entry.notes ?? null,
        }),
      );
      inserted++;
    }

    this.appLogger.logSeed({
      collection: 'availability_slots',
      inserted,
      skipped: entries.length - inserted,
    });
  }

  private async seedPromoCodes(
    entries: SeedPromoCode[],
    coursesByTitle: Map<string, Course>,
    now: Date,
  ): Promise<void> {
    let inserted = 0;

    for (const entry of entries) {
      if (await this.promoCodeRepository.findByCode(entry.code)) {
        continue;
      }

      await this.promoCodeRepository.save(
        PromoCode.create({
          code: entry.code,
          description: entry.description ?? null,
          discountType: entry.discountType,
          discountValue: entry.discountValue,
          currency: Currency.of(entry.currency),
          maxUses: entry.maxUses ?? null,
          validFrom: now,
          validUntil: new Date(now.getTime() + entry.validForDays * DAY_MS),
          applicableCourseIds: entry.courseTitles.map((title) =>
            this.requireCourse(coursesByTitle, title).id.toString(),
          ),
        }),
      );
      inserted++;
    }

    this.appLogger.logSeed({
      collection: 'promo_codes',
      inserted,
      skipped: entries.length - inserted,
    });
  }

  private requireCourse(coursesByTitle: Map<string, Course>, title: string): Course {
    const course = coursesByTitle.get(title.trim());
    if (!course) {
      throw new Error(`Seed data references unknown course "${title}"`);
    }
    return course;
  }
}
