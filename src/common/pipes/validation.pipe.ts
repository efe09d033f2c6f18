import { ValidationError, ValidationPipe } from '@nestjs/common';
import { AppError } from '../errors/app.error';

function collectConstraints(errors: ValidationError[]): string[] {
  return errors.flatMap((error) => [
    ...Object.values(error.constraints ?? {}),
    ...collectConstraints(error.children ?? []),
  ]);
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    exceptionFactory: (errors) =>
      new AppError(
        collectConstraints(errors).join('; ') || 'Invalid request body',
        400,
        'VALIDATION_FAILED',
      ),
  });
}
