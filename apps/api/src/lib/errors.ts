// ============================================================================
// CARDLEAGUE - HTTP Error Mapping
// ============================================================================

import { ZodError } from 'zod';
import { isLeagueError, type LeagueErrorCode } from '@cardleague/core';

export type ErrorStatus = 400 | 404 | 409 | 422 | 500;

export interface ErrorBody {
  error: string;
  code: LeagueErrorCode | 'VALIDATION' | 'INTERNAL';
  details?: string[];
}

const STATUS_BY_CODE: Record<LeagueErrorCode, ErrorStatus> = {
  NOT_FOUND: 404,
  CAP_EXCEEDED: 422,
  TRADE_LIMIT_EXCEEDED: 422,
  INVALID_TRADE: 422,
  INVALID_PHASE: 409,
  INVALID_CONFIG: 400,
  CORRUPT_STATE: 500,
  PERSISTENCE: 500,
};

export function zodIssues(error: ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`,
  );
}

/**
 * Status and JSON body for anything a route throws. Internal messages are
 * only exposed in development.
 */
export function toErrorResponse(
  error: unknown,
  exposeInternal: boolean,
): { status: ErrorStatus; body: ErrorBody } {
  if (isLeagueError(error)) {
    return {
      status: STATUS_BY_CODE[error.code],
      body: { error: error.message, code: error.code },
    };
  }
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: 'Invalid request',
        code: 'VALIDATION',
        details: zodIssues(error),
      },
    };
  }
  return {
    status: 500,
    body: {
      error:
        exposeInternal && error instanceof Error
          ? error.message
          : 'Internal Server Error',
      code: 'INTERNAL',
    },
  };
}
