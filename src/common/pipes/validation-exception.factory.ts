import { ValidationError } from 'class-validator';
import { FieldErrors, ValidationException } from '../exceptions/domain.exceptions';

function collect(errors: ValidationError[], prefix: string, into: FieldErrors): void {
  for (const error of errors) {
    const field = prefix ? `${prefix}.${error.property}` : error.property;
    if (error.constraints) {
      into[field] = Object.values(error.constraints);
    }
    if (error.children?.length) {
      collect(error.children, field, into);
    }
  }
}

/**
 * Maps class-validator output onto the same error shape the services raise.
 */
export function validationExceptionFactory(errors: ValidationError[]): ValidationException {
  const details: FieldErrors = {};
  collect(errors, '', details);
  return new ValidationException(details);
}
