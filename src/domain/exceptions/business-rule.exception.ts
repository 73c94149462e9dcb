import { DomainException } from './domain.exception';

/**
 * Thrown when an aggregate method is called in a state that forbids it.
 * Examples: confirming a cancelled booking, publishing a course without materials.
 */
export class BusinessRuleViolationException extends DomainException {
  constructor(message: string) {
    super(message, 'BUSINESS_RULE_VIOLATION');
  }
}
