import { BadRequestException } from '@nestjs/common';
import { ValidationError } from 'class-validator';

export type FormattedErrors = Record<string, string[]>;

/**
 * Flattens nested class-validator errors into `{ 'a.b': [messages] }`.
 */
export const formatValidationErrors = (
  errors: ValidationError[],
): FormattedErrors => {
  const result: FormattedErrors = {};

  const walk = (errs: ValidationError[], parentPath = ''): void => {
    errs.forEach((error: ValidationError) => {
      const path = parentPath
        ? `${parentPath}.${error.property}`
        : error.property;

      if (error.constraints) {
        result[path] = Object.values(error.constraints);
      }

      if (error.children?.length) {
        walk(error.children, path);
      }
    });
  };

  walk(errors);

  return result;
};

export const validationExceptionFactory = (
  errors: ValidationError[],
): ValidationException => new ValidationException(formatValidationErrors(errors));

export class ValidationException extends BadRequestException {
  constructor(public readonly validationErrors: FormattedErrors) {
    super({
      success: false,
      errors: validationErrors,
    });
  }

  /** The first field-attributed message, e.g. `"email: email must be an email"`. */
  get firstMessage(): string {
    const first = Object.entries(this.validationErrors).find(
      ([, messages]) => messages.length > 0,
    );
    if (!first) return 'Invalid input.';
    return `${first[0]}: ${first[1][0]}`;
  }
}
