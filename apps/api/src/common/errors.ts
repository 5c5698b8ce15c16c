import { BadRequestException, ConflictException, ForbiddenException, NotFoundException } from '@nestjs/common';

export const ErrorCodes = {
  notFound: 'NOT_FOUND',
  invalidStage: 'INVALID_STAGE',
  invalidStatus: 'INVALID_STATUS',
  validationFailed: 'VALIDATION_FAILED',
  duplicateShareUser: 'DUPLICATE_SHARE_USER',
  shareOverAllocated: 'SHARE_OVER_ALLOCATED',
  constraintViolation: 'CONSTRAINT_VIOLATION',
  invalidCredentials: 'INVALID_CREDENTIALS',
  forbidden: 'FORBIDDEN',
  serviceUnavailable: 'SERVICE_UNAVAILABLE'
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ErrorBody {
  code: ErrorCode;
  message: string;
  field?: string;
}

export const notFound = (entity: string, id: string) =>
  new NotFoundException({ code: ErrorCodes.notFound, message: `${entity} ${id} not found` } satisfies ErrorBody);

export const invalidField = (code: ErrorCode, field: string, message: string) =>
  new BadRequestException({ code, field, message } satisfies ErrorBody);

export const constraintViolation = (message: string, field?: string) =>
  new ConflictException({
    code: ErrorCodes.constraintViolation,
    message,
    ...(field ? { field } : {})
  } satisfies ErrorBody);

export const forbidden = (message: string) =>
  new ForbiddenException({ code: ErrorCodes.forbidden, message } satisfies ErrorBody);
