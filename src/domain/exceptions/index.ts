export { DomainException } from './domain.exception';
export { BusinessRuleViolationException } from './business-rule.exception';
export { InvalidValueException } from './invalid-value.exception';
