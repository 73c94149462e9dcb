import { Inject, Injectable, Logger } from '@nestjs/common';
import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Length,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { Course } from '@domain/entities';
import { DIFFICULTY_LEVELS, DifficultyLevel, EntityId, Money, Url } from '@domain/value-objects';
import { CachePrefixes, InvalidatesCache } from '../../caching';
import { Result, failure, fromDomain, notFound, success } from '../../common/result';
import { CourseOutputDto, toCourseOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { ICourseRepositoryPort, IUserRepositoryPort } from '../../ports';
import { CourseMaterialInput, CourseMaterialInputProps, toMaterialEntities } from './course-material.input';

export interface CreateCourseInput {
  instructorId: string;
  title: string;
  description: string;
  shortDescription?: string | null;
  content?: string | null;
  category: string;
  difficultyLevel?: DifficultyLevel | null;
  tags?: string[];
  price: number;
  currency?: string;
  durationMinutes?: number | null;
  maxStudents?: number | null;
  thumbnailUrl?: string | null;
  videoIntroUrl?: string | null;
  materials?: CourseMaterialInputProps[];
}

@InvalidatesCache(
  [CachePrefixes.GetAllCourses, CachePrefixes.GetCoursesByCategory],
  'New course appears in listings',
)
@InvalidatesCache(CachePrefixes.GetCoursesByInstructor, 'Instructor has a new course')
export class CreateCourseCommand extends ResultCommand<CourseOutputDto> {
  @IsNotEmpty({ message: 'Instructor ID is required.' })
  readonly instructorId!: string;

  @IsNotEmpty({ message: 'Title is required and must not exceed 200 characters.' })
  @MaxLength(200, { message: 'Title is required and must not exceed 200 characters.' })
  readonly title!: string;

  @IsNotEmpty({ message: 'Description is required and must not exceed 2000 characters.' })
  @MaxLength(2000, { message: 'Description is required and must not exceed 2000 characters.' })
  readonly description!: string;

  @IsOptional()
  @MaxLength(500, { message: 'Short description must not exceed 500 characters.' })
  readonly shortDescription?: string | null;

  @IsOptional()
  @IsString()
  readonly content?: string | null;

  @IsNotEmpty({ message: 'Category is required and must not exceed 100 characters.' })
  @MaxLength(100, { message: 'Category is required and must not exceed 100 characters.' })
  readonly category!: string;

  @IsOptional()
  @IsIn(DIFFICULTY_LEVELS)
  readonly difficultyLevel?: DifficultyLevel | null;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  @ArrayMaxSize(50)
  readonly tags?: string[];

  @IsNumber({}, { message: 'Price must be greater than or equal to 0.' })
  @Min(0, { message: 'Price must be greater than or equal to 0.' })
  readonly price!: number;

  @IsOptional()
  @Length(3, 3, { message: 'Currency must be a 3-character code (e.g., USD, EUR).' })
  readonly currency?: string;

  @IsOptional()
  @IsInt({ message: 'Duration must be between 1 and 1440 minutes.' })
  @Min(1, { message: 'Duration must be between 1 and 1440 minutes.' })
  @Max(1440, { message: 'Duration must be between 1 and 1440 minutes.' })
  readonly durationMinutes?: number | null;

  @IsOptional()
  @IsInt({ message: 'Maximum students must be between 1 and 1000.' })
  @Min(1, { message: 'Maximum students must be between 1 and 1000.' })
  @Max(1000, { message: 'Maximum students must be between 1 and 1000.' })
  readonly maxStudents?: number | null;

  @IsOptional()
  @IsUrl({}, { message: 'Thumbnail URL must be a valid URL.' })
  readonly thumbnailUrl?: string | null;

  @IsOptional()
  @IsUrl({}, { message: 'Video intro URL must be a valid URL.' })
  readonly videoIntroUrl?: string | null;

  @IsOptional()
  @ValidateNested({ each: true })
  @Type(() => CourseMaterialInput)
  readonly materials?: CourseMaterialInput[];

  constructor(input: CreateCourseInput) {
    super();
    Object.assign(this, {
      ...input,
      materials: input.materials?.map((material) => CourseMaterialInput.from(material)),
    });
  }
}

/**
 * Creates an unpublished course for an existing instructor, with its
 * materials added in ascending order index.
 */
@Injectable()
export class CreateCourseHandler
  implements RequestHandler<CreateCourseCommand, Result<CourseOutputDto>>
{
  private readonly logger = new Logger(CreateCourseHandler.name);

  constructor(
    @Inject('ICourseRepository')
    private readonly courseRepository: ICourseRepositoryPort,
    @Inject('IUserRepository')
    private readonly userRepository: IUserRepositoryPort,
  ) {}

  handle(command: CreateCourseCommand): Promise<Result<CourseOutputDto>> {
    return fromDomain(async () => {
      this.logger.log(`Creating course with title: ${command.title}`);

      const instructor = await this.userRepository.findById(
        EntityId.fromString(command.instructorId),
      );
      if (!instructor) {
        this.logger.warn(`Instructor with ID ${command.instructorId} not found`);
        return notFound(`Instructor with ID ${command.instructorId} not found`);
      }
      if (instructor.role === 'student') {
        return failure(`User ${command.instructorId} is not an instructor`);
      }

      const course = Course.create({
        instructorId: instructor.id,
        price: Money.of(command.price, command.currency?.toUpperCase()),
        details: {
          title: command.title,
          description: command.description,
          shortDescription: command.shortDescription ?? null,
          content: command.content ?? null,
          category: command.category,
          difficultyLevel: command.difficultyLevel ?? null,
          tags: command.tags ?? [],
          durationMinutes: command.durationMinutes ?? null,
          maxStudents: command.maxStudents ?? null,
          thumbnailUrl: Url.ofNullable(command.thumbnailUrl),
          videoIntroUrl: Url.ofNullable(command.videoIntroUrl),
        },
      });

      for (const material of toMaterialEntities(command.materials ?? [])) {
        course.addMaterial(material);
      }

      await this.courseRepository.save(course);
      this.logger.log(`Course created successfully with ID: ${course.id.toString()}`);

      return success(toCourseOutput(course));
    });
  }
}
