import {
  BadRequestException,
  ConflictException,
  HttpException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { Failure, Result } from '@application/common';

/**
 * Maps a failed result to the HTTP exception Nest renders for it.
 */
export function toHttpException(failure: Failure): HttpException {
  const message = failure.errors.length === 1 ? failure.errors[0] : failure.errors;
  switch (failure.kind) {
    case 'not_found':
      return new NotFoundException(message);
    case 'conflict':
      return new ConflictException(message);
    case 'unauthorized':
      return new UnauthorizedException(message);
    case 'validation':
    case 'failure':
      return new BadRequestException(message);
  }
}

/**
 * Returns the success value, or throws the HTTP exception matching the failure.
 */
export function unwrapResult<T>(result: Result<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw toHttpException(result);
}
