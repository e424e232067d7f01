import type { Coordinate, GameStatus, PieceType, PieceView, PlayerColor } from '../types/game';
import type { Board } from './board';
import type { RulesViolation } from './errors';

// ═══════════════════════════════════════════════════════════════════════════
// ARENA RECORDS
// ═══════════════════════════════════════════════════════════════════════════

/** Stable index of a piece in the match's piece arena. */
export type PieceId = number;

export interface PieceRecord {
  readonly id: PieceId;
  readonly type: PieceType;
  readonly color: PlayerColor;
  /** Current square, or null once captured. */
  position: Coordinate | null;
}

export interface PlayerRecord {
  readonly color: PlayerColor;
  /** Ids of active pieces in canonical construction order. */
  roster: PieceId[];
}

export interface SquareRecord {
  readonly coordinate: Coordinate;
  occupant: PieceId | null;
}

// ═══════════════════════════════════════════════════════════════════════════
// GEOMETRY
// ═══════════════════════════════════════════════════════════════════════════

export type Direction =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'up_right'
  | 'up_left'
  | 'down_right'
  | 'down_left';

/** Unit displacement: dx along files (a→h), dy along ranks (1→8). */
export interface DirectionVector {
  dx: -1 | 0 | 1;
  dy: -1 | 0 | 1;
}

/**
 * How the path loop treats a variant's move in one direction.
 *
 * - `maxSteps`: the step budget; sliders use the board width, which the
 *   stepper can never exceed before returning null at an edge.
 * - `capture`: whether the destination may, must, or must not hold an
 *   opposing piece.
 */
export interface MovementProfile {
  maxSteps: number;
  capture: 'allowed' | 'required' | 'forbidden';
}

// ═══════════════════════════════════════════════════════════════════════════
// OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════

export type MoveOutcome =
  | { kind: 'rejected'; reason: string }
  | { kind: 'moved' }
  | { kind: 'captured'; captured: PieceId };

export type MakeMoveResult =
  | { success: true; outcome: 'moved'; gameState: GameStatus }
  | { success: true; outcome: 'captured'; captured: PieceView; gameState: GameStatus }
  | { success: false; error: RulesViolation };

// ═══════════════════════════════════════════════════════════════════════════
// MATCH STATE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Mutable state the movement functions operate on. Owned by GameEngine and
 * passed in explicitly; nothing else holds a reference to it.
 */
export interface MatchState {
  board: Board;
  pieces: PieceRecord[];
  players: Record<PlayerColor, PlayerRecord>;
}

/** A from/to pair that the movement rules accept for the side to move. */
export interface CandidateMove {
  from: Coordinate;
  to: Coordinate;
  captures: PieceView | null;
}
