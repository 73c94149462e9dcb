import { Body, Controller, Get, Param, Post, Query } from '@nestjs/common';
import { ApiConflictResponse, ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger';
import { RatingOutputDto, RatingSummaryOutputDto } from '@application/dtos';
import { RequestPipeline } from '@application/pipeline';
import {
  GetCourseRatingsHandler,
  GetCourseRatingsQuery,
  GetInstructorRatingsHandler,
  GetInstructorRatingsQuery,
  RateCourseCommand,
  RateCourseHandler,
  RateInstructorCommand,
  RateInstructorHandler,
} from '@application/use-cases';
import { PublicOnlyQueryDto, RateCourseRequestDto, RateInstructorRequestDto } from '../dtos/request';
import { unwrapResult } from '../result.mapper';

@ApiTags('Ratings')
@Controller('api/v1/ratings')
export class RatingsController {
  constructor(
    private readonly pipeline: RequestPipeline,
    private readonly rateCourse: RateCourseHandler,
    private readonly rateInstructor: RateInstructorHandler,
    private readonly getCourseRatings: GetCourseRatingsHandler,
    private readonly getInstructorRatings: GetInstructorRatingsHandler,
  ) {}

  @Get('courses/:courseId')
  @ApiOperation({ summary: 'Course ratings with average and count' })
  @ApiParam({ name: 'courseId', description: 'Course ID' })
  async forCourse(
    @Param('courseId') courseId: string,
    @Query() query: PublicOnlyQueryDto,
  ): Promise<RatingSummaryOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new GetCourseRatingsQuery(courseId, query.publicOnly ?? true),
        this.getCourseRatings,
      ),
    );
  }

  @Get('instructors/:instructorId')
  @ApiOperation({ summary: 'Instructor ratings with average and count' })
  @ApiParam({ name: 'instructorId', description: 'Instructor user ID' })
  async forInstructor(
    @Param('instructorId') instructorId: string,
    @Query() query: PublicOnlyQueryDto,
  ): Promise<RatingSummaryOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new GetInstructorRatingsQuery(instructorId, query.publicOnly ?? true),
        this.getInstructorRatings,
      ),
    );
  }

  @Post('courses/:courseId')
  @ApiOperation({
    summary: 'Rate a course',
    description: 'Requires an active enrollment; one rating per student and course.',
  })
  @ApiParam({ name: 'courseId', description: 'Course ID' })
  @ApiConflictResponse({ description: 'Course already rated by the student' })
  async rateCourseById(
    @Param('courseId') courseId: string,
    @Body() body: RateCourseRequestDto,
  ): Promise<RatingOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new RateCourseCommand({ ...body, courseId }), this.rateCourse),
    );
  }

  @Post('instructors')
  @ApiOperation({
    summary: 'Rate an instructor',
    description: 'Requires a completed booking with the instructor.',
  })
  async rateInstructorByBooking(@Body() body: RateInstructorRequestDto): Promise<RatingOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new RateInstructorCommand(body), this.rateInstructor),
    );
  }
}
