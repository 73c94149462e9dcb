import { Body, Controller, Get, Param, Patch, Post, Put, Query } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
} from '@nestjs/swagger';
import { AvailabilitySlotOutputDto } from '@application/dtos';
import { RequestPipeline } from '@application/pipeline';
import {
  ActivateAvailabilitySlotCommand,
  BookAvailabilitySlotCommand,
  CancelAvailabilitySlotBookingCommand,
  ChangeAvailabilitySlotHandler,
  CreateAvailabilitySlotCommand,
  CreateAvailabilitySlotHandler,
  DeactivateAvailabilitySlotCommand,
  GetAvailabilitySlotByIdHandler,
  GetAvailabilitySlotByIdQuery,
  GetAvailabilitySlotsByInstructorHandler,
  GetAvailabilitySlotsByInstructorQuery,
  GetAvailableSlotsHandler,
  GetAvailableSlotsQuery,
  UpdateAvailabilitySlotCommand,
  UpdateAvailabilitySlotHandler,
} from '@application/use-cases';
import {
  AvailableSlotsQueryDto,
  CreateAvailabilitySlotRequestDto,
  UpdateAvailabilitySlotRequestDto,
} from '../dtos/request';
import { unwrapResult } from '../result.mapper';

/**
 * Instructor availability. Overlapping active slots of one instructor are rejected.
 */
@ApiTags('Availability Slots')
@Controller('api/v1/availability-slots')
export class AvailabilitySlotsController {
  constructor(
    private readonly pipeline: RequestPipeline,
    private readonly createSlot: CreateAvailabilitySlotHandler,
    private readonly updateSlot: UpdateAvailabilitySlotHandler,
    private readonly changeSlot: ChangeAvailabilitySlotHandler,
    private readonly getSlotById: GetAvailabilitySlotByIdHandler,
    private readonly getSlotsByInstructor: GetAvailabilitySlotsByInstructorHandler,
    private readonly getAvailableSlots: GetAvailableSlotsHandler,
  ) {}

  @Get('available')
  @ApiOperation({
    summary: 'Find open slots',
    description: 'Active slots with free seats starting inside the range.',
  })
  async available(@Query() query: AvailableSlotsQueryDto): Promise<AvailabilitySlotOutputDto[]> {
    return unwrapResult(
      await this.pipeline.send(
        new GetAvailableSlotsQuery(query.startDate, query.endDate, query.instructorId),
        this.getAvailableSlots,
      ),
    );
  }

  @Get('instructor/:instructorId')
  @ApiOperation({ summary: 'List slots of an instructor' })
  @ApiParam({ name: 'instructorId', description: 'Instructor user ID' })
  async byInstructor(
    @Param('instructorId') instructorId: string,
  ): Promise<AvailabilitySlotOutputDto[]> {
    return unwrapResult(
      await this.pipeline.send(
        new GetAvailabilitySlotsByInstructorQuery(instructorId),
        this.getSlotsByInstructor,
      ),
    );
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get slot by ID' })
  @ApiParam({ name: 'id', description: 'Slot ID' })
  @ApiNotFoundResponse({ description: 'Slot not found' })
  async getById(@Param('id') id: string): Promise<AvailabilitySlotOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new GetAvailabilitySlotByIdQuery(id), this.getSlotById),
    );
  }

  @Post()
  @ApiOperation({ summary: 'Create slot' })
  @ApiBadRequestResponse({ description: 'Validation failed, foreign course or overlapping slot' })
  async create(@Body() body: CreateAvailabilitySlotRequestDto): Promise<AvailabilitySlotOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new CreateAvailabilitySlotCommand(body), this.createSlot),
    );
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update slot' })
  @ApiParam({ name: 'id', description: 'Slot ID' })
  async update(
    @Param('id') id: string,
    @Body() body: UpdateAvailabilitySlotRequestDto,
  ): Promise<AvailabilitySlotOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new UpdateAvailabilitySlotCommand({ ...body, slotId: id }),
        this.updateSlot,
      ),
    );
  }

  @Patch(':id/activate')
  @ApiOperation({ summary: 'Activate slot' })
  @ApiParam({ name: 'id', description: 'Slot ID' })
  async activate(@Param('id') id: string): Promise<AvailabilitySlotOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new ActivateAvailabilitySlotCommand(id), this.changeSlot),
    );
  }

  @Patch(':id/deactivate')
  @ApiOperation({ summary: 'Deactivate slot' })
  @ApiParam({ name: 'id', description: 'Slot ID' })
  async deactivate(@Param('id') id: string): Promise<AvailabilitySlotOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new DeactivateAvailabilitySlotCommand(id), this.changeSlot),
    );
  }

  @Patch(':id/book')
  @ApiOperation({ summary: 'Take one seat' })
  @ApiParam({ name: 'id', description: 'Slot ID' })
  async book(@Param('id') id: string): Promise<AvailabilitySlotOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new BookAvailabilitySlotCommand(id), this.changeSlot),
    );
  }

  @Patch(':id/release')
  @ApiOperation({ summary: 'Release one seat' })
  @ApiParam({ name: 'id', description: 'Slot ID' })
  async release(@Param('id') id: string): Promise<AvailabilitySlotOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new CancelAvailabilitySlotBookingCommand(id), this.changeSlot),
    );
  }
}
