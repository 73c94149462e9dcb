import { Injectable, Logger } from '@nestjs/common';
import { ValidationError, validate } from 'class-validator';
import { RequestValidationError } from '../../errors';
import { NextHandler, PipelineBehavior } from '../pipeline-behavior';
import { Request, requestName } from '../request';

/**
 * Runs the class-validator rules declared on the request before anything else.
 */
@Injectable()
export class ValidationBehavior implements PipelineBehavior {
  private readonly logger = new Logger(ValidationBehavior.name);

  async handle<TResponse>(
    request: Request<TResponse>,
    next: NextHandler<TResponse>,
  ): Promise<TResponse> {
    // Requests without declared rules are valid
    const errors = flattenValidationErrors(
      await validate(request, { forbidUnknownValues: false }),
    );
    if (errors.length === 0) {
      return next();
    }

    const name = requestName(request);
    this.logger.warn(`Validation failed for ${name}: ${errors.join('; ')}`);

    if (request.validationFailure) {
      return request.validationFailure(errors);
    }
    throw new RequestValidationError(name, errors);
  }
}

export function flattenValidationErrors(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...flattenValidationErrors(error.children ?? []),
  ]);
}
