import { z } from 'zod';
import { DIFFICULTY_LEVELS, DISCOUNT_TYPES, USER_ROLES } from '@domain/value-objects';

const currency = z.string().length(3).default('USD');

const seedUserSchema = z.object({
  name: z.string().min(1),
  email: z.email(),
  password: z.string().min(8),
  role: z.enum(USER_ROLES),
  timezone: z.string().optional(),
});

const seedMaterialSchema = z.object({
  title: z.string().min(1),
  fileUrl: z.url(),
  fileType: z.string().min(1),
  isFree: z.boolean().optional(),
  durationMinutes: z.number().int().positive().optional(),
});

const seedCourseSchema = z.object({
  instructorEmail: z.email(),
  title: z.string().min(1),
  description: z.string().min(1),
  shortDescription: z.string().optional(),
  category: z.string().min(1),
  difficultyLevel: z.enum(DIFFICULTY_LEVELS).optional(),
  tags: z.array(z.string()).default([]),
  price: z.number().nonnegative(),
  currency,
  durationMinutes: z.number().int().positive().optional(),
  maxStudents: z.number().int().positive().optional(),
  publish: z.boolean().default(false),
  materials: z.array(seedMaterialSchema).default([]),
});

// Slot times are relative to the day the seed runs so the data never goes stale
const seedSlotSchema = z.object({
  courseTitle: z.string().min(1),
  startsInDays: z.number().int().positive(),
  startHourUtc: z.number().int().min(0).max(23),
  durationMinutes: z.number().int().positive(),
  price: z.number().nonnegative(),
  currency,
  maxParticipants: z.number().int().positive().optional(),
  notes: z.string().optional(),
});

const seedPromoCodeSchema = z.object({
  code: z.string().min(1),
  description: z.string().optional(),
  discountType: z.enum(DISCOUNT_TYPES),
  discountValue: z.number().positive(),
  currency,
  maxUses: z.number().int().positive().optional(),
  validForDays: z.number().int().positive(),
  courseTitles: z.array(z.string()).default([]),
});

export const seedDataSchema = z.object({
  users: z.array(seedUserSchema).default([]),
  courses: z.array(seedCourseSchema).default([]),
  availabilitySlots: z.array(seedSlotSchema).default([]),
  promoCodes: z.array(seedPromoCodeSchema).default([]),
});

export type SeedData = z.infer<typeof seedDataSchema>;
export type SeedCourse = z.infer<typeof seedCourseSchema>;
export type SeedSlot = z.infer<typeof seedSlotSchema>;
export type SeedPromoCode = z.infer<typeof seedPromoCodeSchema>;

/**
 * @throws Error listing every invalid entry
 */
export function parseSeedData(raw: unknown): SeedData {
  const result = seedDataSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid seed data:\n${errors}`);
  }
  return result.data;
}
