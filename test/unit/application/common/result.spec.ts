import {
  conflict,
  failure,
  fromDomain,
  isResult,
  mapResult,
  notFound,
  success,
  unauthorized,
  validationFailure,
} from '@application/common';
import { BusinessRuleViolationException } from '@domain/exceptions';

describe('Result', () => {
  describe('factories', () => {
    it('should wrap a value in a success', () => {
      expect(success(42)).toEqual({ ok: true, value: 42 });
    });

    it('should collect every message of a failure', () => {
      expect(failure('first', 'second')).toEqual({
        ok: false,
        kind: 'failure',
        errors: ['first', 'second'],
      });
    });

    it('should use default messages for typed failures', () => {
      expect(notFound().errors).toEqual(['Entity Not Found']);
      expect(conflict().errors).toEqual(['Entity already exists']);
      expect(unauthorized().errors).toEqual(['Unauthorized access']);
    });

    it('should copy validation errors', () => {
      const errors = ['Title is required.'];
      const result = validationFailure(errors);
      errors.push('changed');

      expect(result.kind).toBe('validation');
      expect(result.errors).toEqual(['Title is required.']);
    });
  });

  describe('isResult', () => {
    it('should recognise successes and failures', () => {
      expect(isResult(success(null))).toBe(true);
      expect(isResult(notFound('missing'))).toBe(true);
    });

    it('should reject other values', () => {
      expect(isResult(null)).toBe(false);
      expect(isResult('ok')).toBe(false);
      expect(isResult({ ok: true })).toBe(false);
      expect(isResult({ ok: false, kind: 'failure', errors: 'nope' })).toBe(false);
    });
  });

  describe('mapResult', () => {
    it('should transform a success value', () => {
      expect(mapResult(success(2), (value) => value * 10)).toEqual(success(20));
    });

    it('should pass a failure through untouched', () => {
      const missing = notFound('Course with ID c-1 not found');

      expect(mapResult(missing, (value: number) => value * 10)).toBe(missing);
    });
  });

  describe('fromDomain', () => {
    it('should return the result of the work', async () => {
      await expect(fromDomain(async () => success('done'))).resolves.toEqual(success('done'));
    });

    it('should turn a domain exception into a failure', async () => {
      const result = await fromDomain(async () => {
        throw new BusinessRuleViolationException('Course is already published.');
      });

      expect(result).toEqual(failure('Course is already published.'));
    });

    it('should rethrow anything else', async () => {
      await expect(
        fromDomain(async () => {
          throw new Error('connection lost');
        }),
      ).rejects.toThrow('connection lost');
    });
  });
});
