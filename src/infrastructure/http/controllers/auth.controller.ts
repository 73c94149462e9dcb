import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiOperation,
  ApiResponse,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { AuthenticationOutputDto, UserOutputDto } from '@application/dtos';
import { RequestPipeline } from '@application/pipeline';
import {
  AuthenticateUserCommand,
  AuthenticateUserHandler,
  ConfirmEmailCommand,
  ConfirmEmailHandler,
  RequestPasswordResetCommand,
  RequestPasswordResetHandler,
  ResetPasswordCommand,
  ResetPasswordHandler,
} from '@application/use-cases';
import { AppLoggerService } from '@infrastructure/observability/logging/app-logger.service';
import {
  ConfirmEmailRequestDto,
  LoginRequestDto,
  PasswordResetRequestDto,
  ResetPasswordRequestDto,
} from '../dtos/request';
import { unwrapResult } from '../result.mapper';

/**
 * Credential checks and the email-token flows.
 */
@ApiTags('Auth')
@Controller('api/v1/auth')
export class AuthController {
  constructor(
    private readonly pipeline: RequestPipeline,
    private readonly authenticate: AuthenticateUserHandler,
    private readonly confirmEmail: ConfirmEmailHandler,
    private readonly requestPasswordReset: RequestPasswordResetHandler,
    private readonly resetPassword: ResetPasswordHandler,
    private readonly appLogger: AppLoggerService,
  ) {}

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Verify credentials',
    description: 'Repeated failures lock the account for a while.',
  })
  @ApiResponse({ status: 200, description: 'Credentials accepted' })
  @ApiUnauthorizedResponse({ description: 'Invalid credentials or locked account' })
  async login(@Body() body: LoginRequestDto): Promise<AuthenticationOutputDto> {
    const result = await this.pipeline.send(
      new AuthenticateUserCommand(body.email, body.password),
      this.authenticate,
    );

    this.appLogger.logAuthAttempt({
      email: body.email,
      success: result.ok,
      reason: result.ok ? undefined : result.errors.join('; '),
    });
    return unwrapResult(result);
  }

  @Post('confirm-email')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Confirm email address' })
  @ApiBadRequestResponse({ description: 'Invalid or expired token' })
  async confirm(@Body() body: ConfirmEmailRequestDto): Promise<UserOutputDto> {
    return unwrapResult(
      await this.pipeline.send(new ConfirmEmailCommand(body.token), this.confirmEmail),
    );
  }

  @Post('password-reset')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({
    summary: 'Request password reset',
    description: 'Always answers the same way, whether or not the email is registered.',
  })
  async requestReset(@Body() body: PasswordResetRequestDto): Promise<{ accepted: boolean }> {
    unwrapResult(
      await this.pipeline.send(
        new RequestPasswordResetCommand(body.email),
        this.requestPasswordReset,
      ),
    );
    return { accepted: true };
  }

  @Post('password-reset/confirm')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Set a new password with a reset token' })
  @ApiBadRequestResponse({ description: 'Invalid or expired token' })
  async reset(@Body() body: ResetPasswordRequestDto): Promise<UserOutputDto> {
    return unwrapResult(
      await this.pipeline.send(
        new ResetPasswordCommand(body.token, body.newPassword),
        this.resetPassword,
      ),
    );
  }
}
