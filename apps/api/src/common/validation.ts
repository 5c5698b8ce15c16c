import { BadRequestException } from '@nestjs/common';
import type { z } from 'zod';
import { ErrorCodes, notFound } from './errors.js';

export const parseOrThrow = <T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new BadRequestException({
      code: ErrorCodes.validationFailed,
      message: 'request validation failed',
      issues: parsed.error.flatten()
    });
  }
  return parsed.data;
};

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** A path id that is not a UUID cannot name a row, so it is reported as missing. */
export const parseIdParam = (entity: string, value: string): string => {
  if (!UUID_PATTERN.test(value)) {
    throw notFound(entity, value);
  }
  return value;
};
