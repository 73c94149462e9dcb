import {
  BadRequestException,
  ConflictException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import {
  conflict,
  failure,
  notFound,
  success,
  unauthorized,
  validationFailure,
} from '@application/common';
import { toHttpException, unwrapResult } from '@infrastructure/http/result.mapper';

describe('toHttpException', () => {
  it('should map each failure kind to its status', () => {
    expect(toHttpException(notFound('Course not found'))).toBeInstanceOf(NotFoundException);
    expect(toHttpException(conflict('Email already registered'))).toBeInstanceOf(
      ConflictException,
    );
    expect(toHttpException(unauthorized('Invalid credentials'))).toBeInstanceOf(
      UnauthorizedException,
    );
    expect(toHttpException(validationFailure(['Title is required']))).toBeInstanceOf(
      BadRequestException,
    );
    expect(toHttpException(failure('Slot is full'))).toBeInstanceOf(BadRequestException);
  });

  it('should use a single error as the message', () => {
    // Act
    const exception = toHttpException(notFound('Course not found'));

    // Assert
    expect(exception.getStatus()).toBe(404);
    expect(exception.getResponse()).toEqual({
      message: 'Course not found',
      error: 'Not Found',
      statusCode: 404,
    });
  });

  it('should keep every validation error', () => {
    // Act
    const exception = toHttpException(
      validationFailure(['Title is required', 'Price must be positive']),
    );

    // Assert
    expect(exception.getResponse()).toEqual({
      message: ['Title is required', 'Price must be positive'],
      error: 'Bad Request',
      statusCode: 400,
    });
  });
});

describe('unwrapResult', () => {
  it('should return the success value', () => {
    expect(unwrapResult(success({ id: 'course-1' }))).toEqual({ id: 'course-1' });
  });

  it('should throw the mapped exception on failure', () => {
    expect(() => unwrapResult(conflict('Promo code already exists'))).toThrow(ConflictException);
  });
});
