import { Body, Controller, Get, Logger, Param, Patch, Post, Put, Query } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { CourseListOutputDto, CourseOutputDto } from '@application/dtos';
import { RequestPipeline } from '@application/pipeline';
import {
  ActivateCourseCommand,
  ChangeCourseStateHandler,
  CreateCourseCommand,
  CreateCourseHandler,
  DeactivateCourseCommand,
  GetAllCoursesHandler,
  GetAllCoursesQuery,
  GetCourseByIdHandler,
  GetCourseByIdQuery,
  GetCoursesByInstructorHandler,
  GetCoursesByInstructorQuery,
  PublishCourseCommand,
  ReorderCourseMaterialsCommand,
  ReorderCourseMaterialsHandler,
  UnpublishCourseCommand,
  UpdateCourseCommand,
  UpdateCourseHandler,
} from '@application/use-cases';
import {
  CourseQueryDto,
  CreateCourseRequestDto,
  ReorderMaterialsRequestDto,
  UpdateCourseRequestDto,
} from '../dtos/request';
import { unwrapResult } from '../result.mapper';

/**
 * Course catalogue: creation, publishing lifecycle, materials and search.
 */
@ApiTags('Courses')
@Controller('api/v1/courses')
export class CoursesController {
  private readonly logger = new Logger(CoursesController.name);

  constructor(
    private readonly pipeline: RequestPipeline,
    private readonly createCourse: CreateCourseHandler,
    private readonly updateCourse: UpdateCourseHandler,
    private readonly changeCourseState: ChangeCourseStateHandler,
    private readonly reorderMaterials: ReorderCourseMaterialsHandler,
    private readonly getAllCourses: GetAllCoursesHandler,
    private readonly getCourseById: GetCourseByIdHandler,
    private readonly getCoursesByInstructor: GetCoursesByInstructorHandler,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'Search courses',
    description: 'Filter, sort and page the course catalogue. Pages are 0-based.',
  })
  @ApiResponse({ status: 200, description: 'One page of courses' })
  @ApiBadRequestResponse({ description: 'Invalid filters' })
  async search(@Query() query: CourseQueryDto): Promise<CourseListOutputDto> {
    const result = await this.pipeline.send(
      new GetAllCoursesQuery({
        isPublished: query.isPublished,
        isActive: query.isActive,
        instructorId: query.instructorId,
        titleContains: query.title,
        descriptionContains: query.description,
        category: query.category,
        difficultyLevel: query.difficultyLevel,
        tagsContains: query.tags,
        minPrice: query.minPrice,
        maxPrice: query.maxPrice,
        currency: query.currency,
        createdFrom: query.createdFrom,
        createdTo: query.createdTo,
        publishedFrom: query.publishedFrom,
        publishedTo: query.publishedTo,
        updatedFrom: query.updatedFrom,
        updatedTo: query.updatedTo,
        minDurationMinutes: query.minDuration,
        maxDurationMinutes: query.maxDuration,
        minMaxStudents: query.minMaxStudents,
        maxMaxStudents: query.maxMaxStudents,
        sortBy: query.sortBy,
        sortDirection: query.sortDirection,
        page: query.page,
        pageSize: query.pageSize,
      }),
      this.getAllCourses,
    );
    return unwrapResult(result);
  }

  @Get('instructor/:instructorId')
  @ApiOperation({ summary: 'List courses of an instructor' })
  @ApiParam({ name: 'instructorId', description: 'Instructor user ID' })
  async byInstructor(@Param('instructorId') instructorId: string): Promise<CourseOutputDto[]> {
    const result = await this.pipeline.send(
      new GetCoursesByInstructorQuery(instructorId),
      this.getCoursesByInstructor,
    );
    return unwrapResult(result);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get course by ID' })
  @ApiParam({ name: 'id', description: 'Course ID' })
  @ApiNotFoundResponse({ description: 'Course not found' })
  async getById(@Param('id') id: string): Promise<CourseOutputDto> {
    this.logger.debug(`Getting course by ID: ${id}`);
    return unwrapResult(await this.pipeline.send(new GetCourseByIdQuery(id), this.getCourseById));
  }

  @Post()
  @ApiOperation({
    summary: 'Create course',
    description: 'Creates an unpublished course for an existing instructor.',
  })
  @ApiResponse({ status: 201, description: 'Course created' })
  @ApiBadRequestResponse({ description: 'Validation failed' })
  @ApiNotFoundResponse({ description: 'Instructor not found' })
  async create(@Body() body: CreateCourseRequestDto): Promise<CourseOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new CreateCourseCommand(body), this.createCourse),
    );
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update course', description: 'Partial update of a course.' })
  @ApiParam({ name: 'id', description: 'Course ID' })
  @ApiNotFoundResponse({ description: 'Course not found' })
  async update(
    @Param('id') id: string,
    @Body() body: UpdateCourseRequestDto,
  ): Promise<CourseOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new UpdateCourseCommand({ ...body, courseId: id }), this.updateCourse),
    );
  }

  @Patch(':id/publish')
  @ApiOperation({ summary: 'Publish course' })
  @ApiParam({ name: 'id', description: 'Course ID' })
  async publish(@Param('id') id: string): Promise<CourseOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new PublishCourseCommand(id), this.changeCourseState),
    );
  }

  @Patch(':id/unpublish')
  @ApiOperation({ summary: 'Unpublish course' })
  @ApiParam({ name: 'id', description: 'Course ID' })
  async unpublish(@Param('id') id: string): Promise<CourseOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new UnpublishCourseCommand(id), this.changeCourseState),
    );
  }

  @Patch(':id/activate')
  @ApiOperation({ summary: 'Reactivate a deactivated course' })
  @ApiParam({ name: 'id', description: 'Course ID' })
  async activate(@Param('id') id: string): Promise<CourseOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new ActivateCourseCommand(id), this.changeCourseState),
    );
  }

  @Patch(':id/deactivate')
  @ApiOperation({ summary: 'Deactivate (soft delete) course' })
  @ApiParam({ name: 'id', description: 'Course ID' })
  async deactivate(@Param('id') id: string): Promise<CourseOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new DeactivateCourseCommand(id), this.changeCourseState),
    );
  }

  @Put(':id/materials/order')
  @ApiOperation({ summary: 'Reorder course materials' })
  @ApiParam({ name: 'id', description: 'Course ID' })
  async reorder(
    @Param('id') id: string,
    @Body() body: ReorderMaterialsRequestDto,
  ): Promise<CourseOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new ReorderCourseMaterialsCommand(id, body.materialIds),
        this.reorderMaterials,
      ),
    );
  }
}
