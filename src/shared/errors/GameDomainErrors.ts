/**
 * Game Domain Errors - Structured error types for the game service
 *
 * This module provides consistent error types for session-level errors
 * raised by the HTTP routes and the session manager.
 *
 * Error Categories:
 * - **Game State Errors**: game not found, game already completed
 * - **Move Errors**: illegal moves, moves out of turn, bad coordinates
 * - **Capacity Errors**: too many active games
 *
 * Usage:
 * ```typescript
 * import { GameNotFoundError, isGameError } from './GameDomainErrors';
 *
 * throw new GameNotFoundError(gameId);
 *
 * if (isGameError(error)) {
 *   res.status(error.httpStatus).json(error.toJSON());
 * }
 * ```
 *
 * @module GameDomainErrors
 */

import { EngineErrorCode, isEngineError, type EngineError } from '../engine/errors';

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Enumeration of all game domain error codes.
 *
 * Error codes are prefixed by category:
 * - GAME_*: General game state errors
 * - MOVE_*: Move-related errors
 */
export enum GameErrorCode {
  // Game State Errors
  GAME_NOT_FOUND = 'GAME_NOT_FOUND',
  GAME_ALREADY_COMPLETED = 'GAME_ALREADY_COMPLETED',
  GAME_INVALID_STATE = 'GAME_INVALID_STATE',
  GAME_LIMIT_REACHED = 'GAME_LIMIT_REACHED',

  // Move Errors
  MOVE_INVALID = 'MOVE_INVALID',
  MOVE_NOT_YOUR_TURN = 'MOVE_NOT_YOUR_TURN',
  MOVE_INVALID_POSITION = 'MOVE_INVALID_POSITION',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * HTTP status codes for error types.
 */
export const ERROR_HTTP_STATUS: Record<GameErrorCode, number> = {
  // Game State Errors - 4xx
  [GameErrorCode.GAME_NOT_FOUND]: 404,
  [GameErrorCode.GAME_ALREADY_COMPLETED]: 409,
  [GameErrorCode.GAME_INVALID_STATE]: 400,
  [GameErrorCode.GAME_LIMIT_REACHED]: 503,

  // Move Errors - 4xx
  [GameErrorCode.MOVE_INVALID]: 400,
  [GameErrorCode.MOVE_NOT_YOUR_TURN]: 403,
  [GameErrorCode.MOVE_INVALID_POSITION]: 400,

  // Internal Errors - 500
  [GameErrorCode.INTERNAL_ERROR]: 500,
};

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all game domain errors.
 *
 * Provides:
 * - Structured error code
 * - Context for debugging
 * - HTTP status code mapping
 * - Serialization for API responses
 */
export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(code: GameErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }

  /** Get HTTP status code for this error */
  get httpStatus(): number {
    return ERROR_HTTP_STATUS[this.code] ?? 500;
  }

  /** Serialize to a JSON-safe object for API responses */
  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of a GameError.
 */
export interface GameErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error for invalid moves.
 */
export class InvalidMoveError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.MOVE_INVALID, message, context);
    this.name = 'InvalidMoveError';
    Object.setPrototypeOf(this, InvalidMoveError.prototype);
  }
}

/**
 * Error when it's not the player's turn.
 */
export class NotYourTurnError extends GameError {
  constructor(expected: string, actual: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.MOVE_NOT_YOUR_TURN,
      `Not your turn. Expected ${expected}, got ${actual}`,
      { expected, actual, ...context }
    );
    this.name = 'NotYourTurnError';
    Object.setPrototypeOf(this, NotYourTurnError.prototype);
  }
}

/**
 * Error when game is not found.
 */
export class GameNotFoundError extends GameError {
  constructor(gameId: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.GAME_NOT_FOUND, `Game not found: ${gameId}`, { gameId, ...context });
    this.name = 'GameNotFoundError';
    Object.setPrototypeOf(this, GameNotFoundError.prototype);
  }
}

/**
 * Error when a finished game is asked to change or to be saved.
 */
export class GameCompletedError extends GameError {
  constructor(gameId: string, state: string, context: Record<string, unknown> = {}) {
    super(
      GameErrorCode.GAME_ALREADY_COMPLETED,
      `Game ${gameId} is already over (state: ${state})`,
      { gameId, state, ...context }
    );
    this.name = 'GameCompletedError';
    Object.setPrototypeOf(this, GameCompletedError.prototype);
  }
}

/**
 * Error when the session manager is at capacity.
 */
export class GameLimitReachedError extends GameError {
  constructor(limit: number) {
    super(GameErrorCode.GAME_LIMIT_REACHED, `Active game limit of ${limit} reached`, { limit });
    this.name = 'GameLimitReachedError';
    Object.setPrototypeOf(this, GameLimitReachedError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Check if an error is a GameError.
 */
export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

/**
 * Get HTTP status code for an error.
 */
export function getHttpStatus(error: unknown): number {
  if (isGameError(error)) {
    return error.httpStatus;
  }
  return 500;
}

/**
 * Re-code an engine error as the matching session-level error, keeping its
 * message and context.
 */
export function fromEngineError(error: EngineError, gameId?: string): GameError {
  const context = { ...(gameId ? { gameId } : {}), ...error.context, engineCode: error.code };

  switch (error.code) {
    case EngineErrorCode.RULES_ILLEGAL_MOVE:
      return new InvalidMoveError(error.message, context);
    case EngineErrorCode.RULES_OUT_OF_TURN:
      return new NotYourTurnError(String(error.context.expected), String(error.context.actual), context);
    case EngineErrorCode.RULES_GAME_OVER:
      return new GameCompletedError(gameId ?? 'unknown', String(error.context.state), context);
    case EngineErrorCode.BOARD_INVALID_COORDINATE:
      return new GameError(GameErrorCode.MOVE_INVALID_POSITION, error.message, context);
    case EngineErrorCode.STATE_INVALID_SAVED_GAME:
      return new GameError(GameErrorCode.GAME_INVALID_STATE, error.message, context);
    case EngineErrorCode.STATE_PIECE_NOT_FOUND:
    case EngineErrorCode.INTERNAL_ASSERTION_FAILED:
      return new GameError(GameErrorCode.INTERNAL_ERROR, error.message, context);
  }
}

/**
 * Wrap an unknown error in a GameError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): GameError {
  if (isGameError(error)) {
    return error;
  }

  if (isEngineError(error)) {
    const wrapped = fromEngineError(error);
    return new GameError(wrapped.code, wrapped.message, { ...context, ...wrapped.context });
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new GameError(GameErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}
