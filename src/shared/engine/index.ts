// =============================================================================
// RULES ENGINE - PUBLIC API
// =============================================================================
// The stable public API for the rules engine. The HTTP service and tests
// should import from this file rather than reaching into individual modules.
//
// Design principles:
// - NARROW: Only essential functions are exported
// - DOMAIN-DRIVEN: Organized by concern (board, movement, victory, persistence)
// - TYPE-SAFE: All inputs/outputs have explicit TypeScript types
// =============================================================================

// =============================================================================
// CORE TYPES (from src/shared/types/game.ts)
// =============================================================================

export type {
  Coordinate,
  PlayerColor,
  PieceType,
  PieceView,
  GameStatus,
  BoardSnapshot,
} from '../types/game';
export { isCoordinate, opponentOf, ALL_COORDINATES, PIECE_TYPES } from '../types/game';

// =============================================================================
// ENGINE TYPES
// =============================================================================

export type {
  PieceId,
  PieceRecord,
  PlayerRecord,
  SquareRecord,
  Direction,
  MovementProfile,
  MoveOutcome,
  MakeMoveResult,
  MatchState,
  CandidateMove,
} from './types';

// =============================================================================
// BOARD & GEOMETRY
// =============================================================================

export { Board } from './board';
export { classifyDirection, offsetCoordinate, DIRECTION_VECTORS } from './core';

// =============================================================================
// MOVEMENT
// =============================================================================

export {
  movePiece,
  traceMove,
  nextSquare,
  getMovementProfile,
  enumerateMoves,
  PAWN_START_RANK,
} from './movementLogic';
export type { PathVerdict } from './movementLogic';

// =============================================================================
// GAME & VICTORY
// =============================================================================

export { GameEngine } from './GameEngine';
export { evaluateCapture, countActiveOfType } from './victoryLogic';
export type { VictoryResult } from './victoryLogic';
export { createInitialMatchState, canonicalRoster } from './initialState';
export type { RosterSlot } from './initialState';

// =============================================================================
// PERSISTENCE & NOTATION
// =============================================================================

export {
  serializeGame,
  restoreGame,
  COLOR_LABELS,
  PIECE_TYPE_LABELS,
} from './serialization';
export type { SavedGame, SavedPiece, ColorLabel, PieceTypeLabel } from './serialization';
export { formatBoard, formatMove, formatPiece } from './notation';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineError,
  EngineErrorCode,
  RulesViolation,
  BoardConstraintViolation,
  InvalidState,
  isEngineError,
  isRulesViolation,
  isBoardConstraintViolation,
  isInvalidState,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON } from './errors';
