import { Body, Controller, Get, Param, Patch, Post, Put } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger';
import { EnrollmentOutputDto } from '@application/dtos';
import { RequestPipeline } from '@application/pipeline';
import {
  ChangeEnrollmentStatusHandler,
  CompleteCourseMaterialCommand,
  CompleteCourseMaterialHandler,
  CompleteEnrollmentCommand,
  DeactivateEnrollmentCommand,
  EnrollStudentCommand,
  EnrollStudentHandler,
  GetEnrollmentsByCourseHandler,
  GetEnrollmentsByCourseQuery,
  GetEnrollmentsByUserHandler,
  GetEnrollmentsByUserQuery,
  ReactivateEnrollmentCommand,
  UpdateEnrollmentProgressCommand,
  UpdateEnrollmentProgressHandler,
} from '@application/use-cases';
import { EnrollStudentRequestDto, UpdateProgressRequestDto } from '../dtos/request';
import { unwrapResult } from '../result.mapper';

@ApiTags('Enrollments')
@Controller('api/v1/enrollments')
export class EnrollmentsController {
  constructor(
    private readonly pipeline: RequestPipeline,
    private readonly enrollStudent: EnrollStudentHandler,
    private readonly updateProgress: UpdateEnrollmentProgressHandler,
    private readonly completeMaterial: CompleteCourseMaterialHandler,
    private readonly changeStatus: ChangeEnrollmentStatusHandler,
    private readonly getByUser: GetEnrollmentsByUserHandler,
    private readonly getByCourse: GetEnrollmentsByCourseHandler,
  ) {}

  @Get('user/:userId')
  @ApiOperation({ summary: 'List enrollments of a student' })
  @ApiParam({ name: 'userId', description: 'Student user ID' })
  async byUser(@Param('userId') userId: string): Promise<EnrollmentOutputDto[]> {
    return unwrapResult(
      await this.pipeline.send(new GetEnrollmentsByUserQuery(userId), this.getByUser),
    );
  }

  @Get('course/:courseId')
  @ApiOperation({ summary: 'List enrollments of a course' })
  @ApiParam({ name: 'courseId', description: 'Course ID' })
  async byCourse(@Param('courseId') courseId: string): Promise<EnrollmentOutputDto[]> {
    return unwrapResult(
      await this.pipeline.send(new GetEnrollmentsByCourseQuery(courseId), this.getByCourse),
    );
  }

  @Post()
  @ApiOperation({
    summary: 'Enroll student',
    description: 'The course must be published and have room left.',
  })
  async enroll(@Body() body: EnrollStudentRequestDto): Promise<EnrollmentOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new EnrollStudentCommand(body.studentId, body.courseId),
        this.enrollStudent,
      ),
    );
  }

  @Put(':id/progress')
  @ApiOperation({ summary: 'Set progress percentage' })
  @ApiParam({ name: 'id', description: 'Enrollment ID' })
  async progress(
    @Param('id') id: string,
    @Body() body: UpdateProgressRequestDto,
  ): Promise<EnrollmentOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new UpdateEnrollmentProgressCommand(id, body.progressPercentage),
        this.updateProgress,
      ),
    );
  }

  @Patch(':id/materials/:materialId/complete')
  @ApiOperation({ summary: 'Mark a course material completed' })
  @ApiParam({ name: 'id', description: 'Enrollment ID' })
  @ApiParam({ name: 'materialId', description: 'Course material ID' })
  async material(
    @Param('id') id: string,
    @Param('materialId') materialId: string,
  ): Promise<EnrollmentOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new CompleteCourseMaterialCommand(id, materialId),
        this.completeMaterial,
      ),
    );
  }

  @Patch(':id/complete')
  @ApiOperation({ summary: 'Complete enrollment' })
  @ApiParam({ name: 'id', description: 'Enrollment ID' })
  async complete(@Param('id') id: string): Promise<EnrollmentOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new CompleteEnrollmentCommand(id), this.changeStatus),
    );
  }

  @Patch(':id/deactivate')
  @ApiOperation({ summary: 'Deactivate enrollment' })
  @ApiParam({ name: 'id', description: 'Enrollment ID' })
  async deactivate(@Param('id') id: string): Promise<EnrollmentOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new DeactivateEnrollmentCommand(id), this.changeStatus),
    );
  }

  @Patch(':id/reactivate')
  @ApiOperation({ summary: 'Reactivate enrollment' })
  @ApiParam({ name: 'id', description: 'Enrollment ID' })
  async reactivate(@Param('id') id: string): Promise<EnrollmentOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new ReactivateEnrollmentCommand(id), this.changeStatus),
    );
  }
}
