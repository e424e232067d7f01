/**
 * Shared Errors Module
 *
 * This module exports structured session-level error types for consistent
 * error handling across the game service.
 *
 * @module errors
 */

export {
  // Error codes
  GameErrorCode,
  ERROR_HTTP_STATUS,
  // Base class
  GameError,
  type GameErrorJSON,
  // Specific errors
  InvalidMoveError,
  NotYourTurnError,
  GameNotFoundError,
  GameCompletedError,
  GameLimitReachedError,
  // Utilities
  isGameError,
  getHttpStatus,
  wrapError,
  fromEngineError,
} from './GameDomainErrors';
