/**
 * Error codes for clients to distinguish between error types.
 */
export const ErrorCode = {
  // Generic errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  DATABASE_ERROR: 'DATABASE_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',

  // League errors
  LEAGUE_NOT_FOUND: 'LEAGUE_NOT_FOUND',

  // Draft board errors
  NO_DRAFT_DATA: 'NO_DRAFT_DATA',
  MALFORMED_DRAFT_ORDER: 'MALFORMED_DRAFT_ORDER',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when validation fails
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, 400, errorCode);
  }
}

/**
 * Thrown when resource is not found
 */
export class NotFoundException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.NOT_FOUND) {
    super(message, 404, errorCode);
  }
}

/**
 * Thrown when stored data exists but is inconsistent enough that the
 * requested view cannot be built from it
 */
export class UnprocessableEntityException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType, details?: Record<string, unknown>) {
    super(message, 422, errorCode, details);
  }
}

export const LeagueErrors = {
  notFound: (leagueId: string) =>
    new NotFoundException(`League ${leagueId} not found`, ErrorCode.LEAGUE_NOT_FOUND),
};

export const DraftBoardErrors = {
  noData: () =>
    new NotFoundException('No draft data found for this league', ErrorCode.NO_DRAFT_DATA),
  malformedDraftOrder: (leagueId: string, missingTeamIds: string[]) =>
    new UnprocessableEntityException(
      `Draft order for league ${leagueId} cannot be derived: round 1 is missing ${missingTeamIds.length} team(s)`,
      ErrorCode.MALFORMED_DRAFT_ORDER,
      { missingTeamIds }
    ),
};
