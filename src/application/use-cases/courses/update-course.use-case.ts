import { Inject, Injectable, Logger } from '@nestjs/common';
import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsBoolean,
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
import { CourseDetails } from '@domain/entities';
import { DIFFICULTY_LEVELS, DifficultyLevel, EntityId, Money, Url } from '@domain/value-objects';
import { InvalidatesCache } from '../../caching';
import { Result, fromDomain, notFound, success } from '../../common/result';
import { CourseOutputDto, toCourseOutput } from '../../dtos';
import { RequestHandler, ResultCommand } from '../../pipeline';
import { ICourseRepositoryPort } from '../../ports';
import { COURSE_QUERY_PREFIXES } from './course-cache';
import { CourseMaterialInput, CourseMaterialInputProps, toMaterialEntities } from './course-material.input';

export interface UpdateCourseInput {
  courseId: string;
  title?: string;
  description?: string;
  shortDescription?: string | null;
  content?: string | null;
  category?: string;
  difficultyLevel?: DifficultyLevel | null;
  tags?: string[];
  price?: number;
  currency?: string;
  durationMinutes?: number | null;
  maxStudents?: number | null;
  thumbnailUrl?: string | null;
  videoIntroUrl?: string | null;
  isPublished?: boolean;
  materials?: CourseMaterialInputProps[];
}

/**
 * Partial update: omitted fields keep their value, `null` clears an optional one.
 * When `materials` is given it replaces the whole material list, and
 * `isPublished` publishes or unpublishes once the other changes are applied.
 */
@InvalidatesCache(COURSE_QUERY_PREFIXES, 'Course details changed')
export class UpdateCourseCommand extends ResultCommand<CourseOutputDto> {
  @IsNotEmpty({ message: 'Course ID is required.' })
  readonly courseId!: string;

  @IsOptional()
  @IsNotEmpty({ message: 'Title is required and must not exceed 200 characters.' })
  @MaxLength(200, { message: 'Title is required and must not exceed 200 characters.' })
  readonly title?: string;

  @IsOptional()
  @IsNotEmpty({ message: 'Description is required and must not exceed 2000 characters.' })
  @MaxLength(2000, { message: 'Description is required and must not exceed 2000 characters.' })
  readonly description?: string;

  @IsOptional()
  @MaxLength(500, { message: 'Short description must not exceed 500 characters.' })
  readonly shortDescription?: string | null;

  @IsOptional()
  @IsString()
  readonly content?: string | null;

  @IsOptional()
  @IsNotEmpty({ message: 'Category is required and must not exceed 100 characters.' })
  @MaxLength(100, { message: 'Category is required and must not exceed 100 characters.' })
  readonly category?: string;

  @IsOptional()
  @IsIn(DIFFICULTY_LEVELS)
  readonly difficultyLevel?: DifficultyLevel | null;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  @ArrayMaxSize(50)
  readonly tags?: string[];

  @IsOptional()
  @IsNumber({}, { message: 'Price must be greater than or equal to 0.' })
  @Min(0, { message: 'Price must be greater than or equal to 0.' })
  readonly price?: number;

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
  @IsBoolean()
  readonly isPublished?: boolean;

  @IsOptional()
  @ValidateNested({ each: true })
  @Type(() => CourseMaterialInput)
  readonly materials?: CourseMaterialInput[];

  constructor(input: UpdateCourseInput) {
    super();
    Object.assign(this, {
      ...input,
      materials: input.materials?.map((material) => CourseMaterialInput.from(material)),
    });
  }
}

@Injectable()
export class UpdateCourseHandler
  implements RequestHandler<UpdateCourseCommand, Result<CourseOutputDto>>
{
  private readonly logger = new Logger(UpdateCourseHandler.name);

  constructor(
    @Inject('ICourseRepository')
    private readonly courseRepository: ICourseRepositoryPort,
  ) {}

  handle(command: UpdateCourseCommand): Promise<Result<CourseOutputDto>> {
    return fromDomain(async () => {
      const course = await this.courseRepository.findById(EntityId.fromString(command.courseId));
      if (!course) {
        this.logger.warn(`Course with ID ${command.courseId} not found`);
        return notFound(`Course with ID ${command.courseId} not found`);
      }

      const changes: Partial<CourseDetails> = {
        title: command.title,
        description: command.description,
        shortDescription: command.shortDescription,
        content: command.content,
        category: command.category,
        difficultyLevel: command.difficultyLevel,
        tags: command.tags,
        durationMinutes: command.durationMinutes,
        maxStudents: command.maxStudents,
        thumbnailUrl:
          command.thumbnailUrl !== undefined ? Url.ofNullable(command.thumbnailUrl) : undefined,
        videoIntroUrl:
          command.videoIntroUrl !== undefined ? Url.ofNullable(command.videoIntroUrl) : undefined,
      };
      course.updateDetails(changes);

      if (command.price !== undefined || command.currency !== undefined) {
        course.updatePrice(
          Money.of(
            command.price ?? course.price.amount,
            command.currency?.toUpperCase() ?? course.price.currency,
          ),
        );
      }

      if (command.materials !== undefined) {
        course.replaceMaterials(toMaterialEntities(command.materials));
      }

      if (command.isPublished === true && !course.isPublished) {
        course.publish();
      } else if (command.isPublished === false && course.isPublished) {
        course.unpublish();
      }

      await this.courseRepository.save(course);
      this.logger.log(`Course ${command.courseId} updated`);

      return success(toCourseOutput(course));
    });
  }
}
