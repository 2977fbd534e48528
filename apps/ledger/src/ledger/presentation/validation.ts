import { ValidationPipe, type Type } from '@nestjs/common';

/**
 * Validation pipe bound to an explicit DTO class. The loaders this app runs
 * under (tsx, Vitest) emit no parameter type metadata, so the DTO type is
 * passed in rather than inferred.
 */
export const validated = <T>(dto: Type<T>): ValidationPipe =>
  new ValidationPipe({
    whitelist: true,
    transform: true,
    forbidUnknownValues: false,
    expectedType: dto,
  });
