import { Body, Controller, Get, Param, Patch, Post, Put, Query } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiConflictResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { UserListOutputDto, UserOutputDto } from '@application/dtos';
import { RequestPipeline } from '@application/pipeline';
import {
  ActivateUserCommand,
  ChangePasswordCommand,
  ChangePasswordHandler,
  ChangeUserStatusHandler,
  CreateUserCommand,
  CreateUserHandler,
  DeactivateUserCommand,
  GetUserByIdHandler,
  GetUserByIdQuery,
  GetUsersHandler,
  GetUsersQuery,
  UpdateUserProfileCommand,
  UpdateUserProfileHandler,
} from '@application/use-cases';
import {
  ChangePasswordRequestDto,
  CreateUserRequestDto,
  UpdateUserProfileRequestDto,
  UserQueryDto,
} from '../dtos/request';
import { unwrapResult } from '../result.mapper';

@ApiTags('Users')
@Controller('api/v1/users')
export class UsersController {
  constructor(
    private readonly pipeline: RequestPipeline,
    private readonly createUser: CreateUserHandler,
    private readonly updateProfile: UpdateUserProfileHandler,
    private readonly changePassword: ChangePasswordHandler,
    private readonly changeStatus: ChangeUserStatusHandler,
    private readonly getUserById: GetUserByIdHandler,
    private readonly getUsers: GetUsersHandler,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List users', description: 'Paged, newest first.' })
  async list(@Query() query: UserQueryDto): Promise<UserListOutputDto> {
    return unwrapResult(await this.pipeline.send(new GetUsersQuery(query), this.getUsers));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get user by ID' })
  @ApiParam({ name: 'id', description: 'User ID' })
  @ApiNotFoundResponse({ description: 'User not found' })
  async getById(@Param('id') id: string): Promise<UserOutputDto> {
    return unwrapResult(await this.pipeline.send(new GetUserByIdQuery(id), this.getUserById));
  }

  @Post()
  @ApiOperation({
    summary: 'Register user',
    description: 'Creates the account and sends an email confirmation notification.',
  })
  @ApiResponse({ status: 201, description: 'User created' })
  @ApiBadRequestResponse({ description: 'Validation failed' })
  @ApiConflictResponse({ description: 'Email already registered' })
  async create(@Body() body: CreateUserRequestDto): Promise<UserOutputDto> {
    return unwrapResult(await this.pipeline.send(new CreateUserCommand(body), this.createUser));
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update profile' })
  @ApiParam({ name: 'id', description: 'User ID' })
  async update(
    @Param('id') id: string,
    @Body() body: UpdateUserProfileRequestDto,
  ): Promise<UserOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new UpdateUserProfileCommand({ ...body, userId: id }),
        this.updateProfile,
      ),
    );
  }

  @Put(':id/password')
  @ApiOperation({ summary: 'Change password', description: 'Requires the current password.' })
  @ApiParam({ name: 'id', description: 'User ID' })
  async password(
    @Param('id') id: string,
    @Body() body: ChangePasswordRequestDto,
  ): Promise<UserOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new ChangePasswordCommand(id, body.currentPassword, body.newPassword),
        this.changePassword,
      ),
    );
  }

  @Patch(':id/activate')
  @ApiOperation({ summary: 'Activate user' })
  @ApiParam({ name: 'id', description: 'User ID' })
  async activate(@Param('id') id: string): Promise<UserOutputDto> {
    return unwrapResult(await this.pipeline.send(new ActivateUserCommand(id), this.changeStatus));
  }

  @Patch(':id/deactivate')
  @ApiOperation({ summary: 'Deactivate user' })
  @ApiParam({ name: 'id', description: 'User ID' })
  async deactivate(@Param('id') id: string): Promise<UserOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new DeactivateUserCommand(id), this.changeStatus),
    );
  }
}
