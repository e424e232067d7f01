/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * This module provides the error types raised or returned while validating
 * and applying moves, and while restoring saved games.
 *
 * Error Categories:
 * - **RulesViolation**: the move is refused by the rules (game over, out of
 *   turn, illegal geometry)
 * - **BoardConstraintViolation**: a coordinate is malformed or off the board
 * - **InvalidState**: a saved game cannot be reconciled with the starting
 *   roster
 *
 * Relationship to GameDomainErrors:
 * - GameDomainErrors (src/shared/errors/GameDomainErrors.ts) handles
 *   session-level errors (game not found, HTTP status mapping)
 * - EngineErrors handles rules-engine-level errors
 *
 * Usage:
 * ```typescript
 * import { illegalMove, isRulesViolation } from './errors';
 *
 * const error = illegalMove('e2', 'e5', 'Pawn cannot advance three squares');
 * if (isRulesViolation(error)) {
 *   console.log(error.code, error.context);
 * }
 * ```
 *
 * @module EngineErrors
 */

import type { Coordinate, GameStatus, PlayerColor } from '../types/game';

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - RULES_*: Moves refused by the game rules
 * - BOARD_*: Coordinate/geometry issues
 * - STATE_*: Saved state that cannot be restored
 * - INTERNAL_*: Broken engine invariants
 */
export enum EngineErrorCode {
  /** A move was attempted after the game reached a terminal state */
  RULES_GAME_OVER = 'RULES_GAME_OVER',
  /** The piece on the origin square belongs to the player not on move */
  RULES_OUT_OF_TURN = 'RULES_OUT_OF_TURN',
  /** Empty origin square, or geometry/blocking/capture rules refuse the move */
  RULES_ILLEGAL_MOVE = 'RULES_ILLEGAL_MOVE',

  /** Coordinate string is malformed or outside a1..h8 */
  BOARD_INVALID_COORDINATE = 'BOARD_INVALID_COORDINATE',

  /** Saved game does not line up with the canonical starting roster */
  STATE_INVALID_SAVED_GAME = 'STATE_INVALID_SAVED_GAME',
  /** Piece id not present in the arena */
  STATE_PIECE_NOT_FOUND = 'STATE_PIECE_NOT_FOUND',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error codes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Move refused by the game rules',
  BOARD_: 'Board coordinate constraint violation',
  STATE_: 'Inconsistent or unrestorable game state',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 *
 * Provides:
 * - Structured error code for programmatic handling
 * - Context for debugging
 * - Domain indicator for error routing
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'Movement', 'Serialization') */
  readonly domain: string;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for moves refused by the rules.
 *
 * Examples:
 * - The game already ended
 * - The piece on the origin square belongs to the other player
 * - A rook asked to move diagonally
 */
export class RulesViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Rules'
  ) {
    super(code, message, context, domain);
    this.name = 'RulesViolation';
    Object.setPrototypeOf(this, RulesViolation.prototype);
  }
}

/**
 * Error for coordinates outside the board or in the wrong format.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

/**
 * Error for state that cannot be restored or has lost consistency.
 *
 * This typically indicates either:
 * 1. A hand-edited or truncated saved game
 * 2. A bug in the engine (a piece id that was never allocated)
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * Check if an error is an EngineError.
 */
export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

/**
 * Check if an error is a RulesViolation.
 */
export function isRulesViolation(error: unknown): error is RulesViolation {
  return error instanceof RulesViolation;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

// =============================================================================
// FACTORIES
// =============================================================================

export function gameOver(state: GameStatus): RulesViolation {
  return new RulesViolation(
    EngineErrorCode.RULES_GAME_OVER,
    `Game is already over (${state})`,
    { state },
    'Game'
  );
}

export function outOfTurn(expected: PlayerColor, actual: PlayerColor): RulesViolation {
  return new RulesViolation(
    EngineErrorCode.RULES_OUT_OF_TURN,
    `It is ${expected}'s turn, not ${actual}'s`,
    { expected, actual },
    'Game'
  );
}

export function illegalMove(from: string, to: string, reason: string): RulesViolation {
  return new RulesViolation(
    EngineErrorCode.RULES_ILLEGAL_MOVE,
    `Illegal move ${from}-${to}: ${reason}`,
    { from, to, reason },
    'Movement'
  );
}

export function invalidCoordinate(value: unknown): BoardConstraintViolation {
  return new BoardConstraintViolation(
    EngineErrorCode.BOARD_INVALID_COORDINATE,
    `Invalid coordinate: ${JSON.stringify(value)}`,
    { value }
  );
}

export function invalidSavedGame(
  reason: string,
  context: Record<string, unknown> = {}
): InvalidState {
  return new InvalidState(
    EngineErrorCode.STATE_INVALID_SAVED_GAME,
    `Invalid saved game: ${reason}`,
    context,
    'Serialization'
  );
}

export function pieceNotFound(pieceId: number, at?: Coordinate): InvalidState {
  return new InvalidState(EngineErrorCode.STATE_PIECE_NOT_FOUND, `Piece ${pieceId} not found`, {
    pieceId,
    ...(at ? { at } : {}),
  });
}

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}
