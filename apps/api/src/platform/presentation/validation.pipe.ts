import {
  Body,
  ValidationPipe,
  type Type,
  type ValidationError as ClassValidatorError,
} from '@nestjs/common';
import { ValidationError, type FieldError } from '@campus-id/domain';

const flatten = (
  errors: ReadonlyArray<ClassValidatorError>,
  prefix = ''
): FieldError[] =>
  errors.flatMap((error) => {
    const field = prefix ? `${prefix}.${error.property}` : error.property;
    const [message] = Object.values(error.constraints ?? {});
    const own: FieldError[] = message ? [{ field, message }] : [];
    return [...own, ...flatten(error.children ?? [], field)];
  });

/**
 * Request DTO validation. Failures surface as a domain `ValidationError`
 * so they share the error body of every other 400.
 *
 * The DTO class is passed explicitly: builds that strip decorator
 * metadata would otherwise leave the pipe without a type to validate.
 */
export function createValidationPipe(expectedType: Type<object>): ValidationPipe {
  return new ValidationPipe({
    expectedType,
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    exceptionFactory: (errors) => new ValidationError(flatten(errors)),
  });
}

/** `@Body()` validated against `dto`. */
export const ValidBody = (dto: Type<object>): ParameterDecorator =>
  Body(createValidationPipe(dto));
