// ============================================================================
// CARDLEAGUE - Engine Errors
// ============================================================================
// Every command validates before it mutates, so a thrown LeagueError means
// the league is exactly as it was before the call.

export type LeagueErrorCode =
  | 'NOT_FOUND'
  | 'CAP_EXCEEDED'
  | 'TRADE_LIMIT_EXCEEDED'
  | 'INVALID_TRADE'
  | 'INVALID_PHASE'
  | 'INVALID_CONFIG'
  | 'CORRUPT_STATE'
  | 'PERSISTENCE';

export class LeagueError extends Error {
  readonly code: LeagueErrorCode;

  constructor(code: LeagueErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Unknown card, team, shop item or playoff reference */
export class NotFoundError extends LeagueError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

/** A roster change would push salary used over the cap */
export class CapExceededError extends LeagueError {
  readonly teamId: string;
  readonly salaryUsed: number;
  readonly cap: number;

  constructor(teamId: string, salaryUsed: number, cap: number) {
    super(
      'CAP_EXCEEDED',
      `Team ${teamId} would use ${salaryUsed} of ${cap} cap points`,
    );
    this.teamId = teamId;
    this.salaryUsed = salaryUsed;
    this.cap = cap;
  }
}

/** The team already made its trade this season */
export class TradeLimitExceededError extends LeagueError {
  readonly teamId: string;

  constructor(teamId: string) {
    super(
      'TRADE_LIMIT_EXCEEDED',
      `Team ${teamId} has already used its trade this season`,
    );
    this.teamId = teamId;
  }
}

export class InvalidTradeError extends LeagueError {
  constructor(message: string) {
    super('INVALID_TRADE', message);
  }
}

/** Command issued in the wrong season phase (e.g. playoffs before week 20) */
export class InvalidPhaseError extends LeagueError {
  constructor(message: string) {
    super('INVALID_PHASE', message);
  }
}

export class InvalidConfigError extends LeagueError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

/** Persisted state failed its shape or integrity check */
export class CorruptStateError extends LeagueError {
  readonly problems: string[];

  constructor(problems: string[], options?: ErrorOptions) {
    super(
      'CORRUPT_STATE',
      `League state is corrupt: ${problems.slice(0, 3).join('; ')}`,
      options,
    );
    this.problems = problems;
  }
}

/** Reading or writing the state file failed */
export class PersistenceError extends LeagueError {
  constructor(message: string, options?: ErrorOptions) {
    super('PERSISTENCE', message, options);
  }
}

export function isLeagueError(error: unknown): error is LeagueError {
  return error instanceof LeagueError;
}
