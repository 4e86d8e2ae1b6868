import { ValidationPipe } from '@nestjs/common';

/**
 * Global pipe for the ingestion API. Unknown fields are stripped and
 * any type mismatch becomes a 400 naming the field. Body values are
 * never coerced; numeric query parameters opt in with @Type.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: false,
    transform: true,
  });
}
