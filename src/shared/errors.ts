/**
 * Error types shared by the rules engine, the search and the adapters.
 *
 * The core throws; adapters (terminal, PlayTak client, move service) decide how a
 * failure is shown. Nothing in the core substitutes a default move for an error.
 */

export enum GameErrorCode {
  MOVE_ILLEGAL = "MOVE_ILLEGAL",
  NOTATION_INVALID = "NOTATION_INVALID",
  INVARIANT_VIOLATION = "INVARIANT_VIOLATION",
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
  REQUEST_INVALID = "REQUEST_INVALID",
}

export const ERROR_HTTP_STATUS: Record<GameErrorCode, number> = {
  [GameErrorCode.MOVE_ILLEGAL]: 400,
  [GameErrorCode.NOTATION_INVALID]: 400,
  [GameErrorCode.INVARIANT_VIOLATION]: 500,
  [GameErrorCode.CONFIGURATION_ERROR]: 500,
  [GameErrorCode.REQUEST_INVALID]: 400,
};

export interface GameErrorJSON {
  code: GameErrorCode;
  message: string;
  context: Record<string, unknown>;
}

export class GameError extends Error {
  readonly code: GameErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: GameErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "GameError";
    this.code = code;
    this.context = context;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get httpStatus(): number {
    return ERROR_HTTP_STATUS[this.code];
  }

  toJSON(): GameErrorJSON {
    return { code: this.code, message: this.message, context: this.context };
  }
}

/** A move that is not legal in the position it was played in. */
export class IllegalMoveError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.MOVE_ILLEGAL, message, context);
    this.name = "IllegalMoveError";
  }
}

/** PTN, TPS or PlayTak text that cannot be parsed. */
export class NotationError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.NOTATION_INVALID, message, context);
    this.name = "NotationError";
  }
}

/**
 * The rules engine broke its contract, e.g. an ongoing position with no legal
 * moves. Fatal to the current search call.
 */
export class InvariantViolationError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.INVARIANT_VIOLATION, message, context);
    this.name = "InvariantViolationError";
  }
}

export class ConfigurationError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.CONFIGURATION_ERROR, message, context);
    this.name = "ConfigurationError";
  }
}

/** A move-service request with missing or out-of-range fields. */
export class BadRequestError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.REQUEST_INVALID, message, context);
    this.name = "BadRequestError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
