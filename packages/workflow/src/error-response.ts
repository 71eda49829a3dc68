/**
 * Maps domain errors to transport-neutral responses.
 */

import {
  BusinessRuleViolationError,
  DomainError,
  DuplicateFileError,
  InspectionAlreadyProcessedError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
} from '@vistoria/domain/errors';
import type { Logger } from './logger.js';

export interface ErrorResponse {
  status: number;
  code: string;
  message: string;
  field?: string;
}

export const INTERNAL_ERROR_MESSAGE = 'Erro interno. Tente novamente mais tarde.';

export function toErrorResponse(error: unknown, logger?: Logger): ErrorResponse {
  if (error instanceof ValidationError) {
    const response: ErrorResponse = { status: 400, code: error.code, message: error.message };
    if (error.field) response.field = error.field;
    return response;
  }
  if (error instanceof UnauthorizedError) {
    return { status: 403, code: error.code, message: error.message };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, code: error.code, message: error.message };
  }
  if (error instanceof DuplicateFileError || error instanceof InspectionAlreadyProcessedError) {
    return { status: 409, code: error.code, message: error.message };
  }
  if (error instanceof BusinessRuleViolationError) {
    return { status: 422, code: error.code, message: error.message };
  }

  // Internal details never reach the caller.
  logger?.error('Unhandled error', {
    error: error instanceof Error ? error.message : String(error),
    code: error instanceof DomainError ? error.code : undefined,
  });
  return { status: 500, code: 'INTERNAL_ERROR', message: INTERNAL_ERROR_MESSAGE };
}
