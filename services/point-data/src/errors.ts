import { ZodError } from 'zod';
import { PointDataError, QueryValidationError } from '@point-obs/point-data';

import type { QueryOutcomeLabel } from './metrics';

export interface ErrorResponse {
  statusCode: number;
  message: string;
  code?: string;
  details?: unknown;
}

const errorCode = (error: PointDataError): string | undefined =>
  'code' in error && typeof error.code === 'string' ? error.code : undefined;

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof QueryValidationError) {
    return {
      statusCode: 400,
      message: error.message,
      code: error.code,
      details: error.issues
    };
  }

  if (error instanceof PointDataError) {
    switch (error.kind) {
      case 'validation':
        return { statusCode: 400, message: error.message, code: errorCode(error) };
      case 'aborted':
        return { statusCode: 499, message: error.message, code: errorCode(error) };
      case 'archive':
        return { statusCode: 500, message: error.message, code: errorCode(error) };
    }
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      message: 'Request validation failed',
      details: error.flatten()
    };
  }

  return {
    statusCode: 500,
    message: 'Unexpected error'
  };
};

export const outcomeForError = (error: unknown): QueryOutcomeLabel => {
  if (error instanceof ZodError) {
    return 'invalid';
  }
  if (error instanceof PointDataError) {
    switch (error.kind) {
      case 'validation':
        return 'invalid';
      case 'aborted':
        return 'aborted';
      case 'archive':
        return 'archive_error';
    }
  }
  return 'error';
};
