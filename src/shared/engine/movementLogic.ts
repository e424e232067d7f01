import { ALL_COORDINATES, type Coordinate, type PlayerColor } from '../types/game';
import {
  BOARD_WIDTH,
  DIRECTION_VECTORS,
  classifyDirection,
  isDiagonal,
  offsetCoordinate,
  rankIndex,
  rankNumber,
} from './core';
import { pieceNotFound } from './errors';
import type {
  CandidateMove,
  Direction,
  MatchState,
  MoveOutcome,
  MovementProfile,
  PieceId,
  PieceRecord,
} from './types';

/** Rank number each side's pawns start on. */
export const PAWN_START_RANK: Record<PlayerColor, number> = { white: 2, black: 7 };

/** Rank step that counts as "forward" for each side. */
export const PAWN_FORWARD: Record<PlayerColor, 1 | -1> = { white: 1, black: -1 };

export type PathVerdict =
  | { legal: false; reason: string }
  | { legal: true; from: Coordinate; captured: PieceId | null };

function reject(reason: string): PathVerdict {
  return { legal: false, reason };
}

export function getPiece(state: MatchState, id: PieceId): PieceRecord {
  const piece = state.pieces[id];
  if (!piece) {
    throw pieceNotFound(id);
  }
  return piece;
}

export function isOnPawnStartRank(color: PlayerColor, coord: Coordinate): boolean {
  return rankNumber(coord) === PAWN_START_RANK[color];
}

/**
 * Step budget and capture rule for a piece moving from `from` in `direction`.
 *
 * King and knight get a single step. Pawns get a single step, or two when
 * advancing straight off their starting rank; straight pawn moves may never
 * capture and diagonal ones must. Sliders may cover the whole board.
 */
export function getMovementProfile(
  piece: PieceRecord,
  from: Coordinate,
  direction: Direction
): MovementProfile {
  switch (piece.type) {
    case 'king':
    case 'knight':
      return { maxSteps: 1, capture: 'allowed' };
    case 'pawn':
      if (isDiagonal(direction)) {
        return { maxSteps: 1, capture: 'required' };
      }
      return {
        maxSteps: isOnPawnStartRank(piece.color, from) ? 2 : 1,
        capture: 'forbidden',
      };
    case 'bishop':
    case 'rook':
    case 'queen':
      return { maxSteps: BOARD_WIDTH - 1, capture: 'allowed' };
  }
}

/**
 * Knight landing square for a jump toward `destination` in a diagonal
 * quadrant. A rank delta of 1 means two files across; a delta of 2 means one
 * file across. Anything else cannot be a knight move.
 */
function knightLanding(
  current: Coordinate,
  direction: Direction,
  destination: Coordinate
): Coordinate | null {
  if (!isDiagonal(direction)) {
    return null;
  }
  const { dx, dy } = DIRECTION_VECTORS[direction];
  const rankDelta = Math.abs(rankIndex(destination) - rankIndex(current));
  if (rankDelta === 1) {
    return offsetCoordinate(current, 2 * dx, dy);
  }
  if (rankDelta === 2) {
    return offsetCoordinate(current, dx, 2 * dy);
  }
  return null;
}

/**
 * Advance one unit from `current` along `direction` for this piece's variant.
 *
 * Returns null the moment the step is not something the variant can do:
 * a rook asked to go diagonally, a pawn asked to go backward or sideways, a
 * knight asked for a rank delta other than 1 or 2, or any step that would
 * leave the board.
 */
export function nextSquare(
  piece: PieceRecord,
  current: Coordinate,
  direction: Direction,
  destination: Coordinate
): Coordinate | null {
  const { dx, dy } = DIRECTION_VECTORS[direction];

  switch (piece.type) {
    case 'rook':
      return isDiagonal(direction) ? null : offsetCoordinate(current, dx, dy);
    case 'bishop':
      return isDiagonal(direction) ? offsetCoordinate(current, dx, dy) : null;
    case 'queen':
    case 'king':
      return offsetCoordinate(current, dx, dy);
    case 'knight':
      return knightLanding(current, direction, destination);
    case 'pawn':
      return dy === PAWN_FORWARD[piece.color] ? offsetCoordinate(current, dx, dy) : null;
  }
}

/**
 * Walk the path from the piece's square toward `destination` without
 * touching the state, and decide whether the move is legal.
 *
 * The walk stops at the first occupied square. That square is only
 * acceptable as the destination itself, holding an opposing piece, and only
 * when the variant's profile permits a capture there.
 */
export function traceMove(
  state: MatchState,
  piece: PieceRecord,
  destination: Coordinate
): PathVerdict {
  const start = piece.position;
  if (start === null) {
    return reject(`${piece.color} ${piece.type} has been captured`);
  }

  const direction = classifyDirection(start, destination);
  if (direction === null) {
    return reject('origin and destination are the same square');
  }

  const profile = getMovementProfile(piece, start, direction);
  let current = start;

  for (let step = 0; step < profile.maxSteps; step++) {
    const next = nextSquare(piece, current, direction, destination);
    if (next === null) {
      return reject(`${piece.type} cannot move ${direction.replace('_', '-')} to ${destination}`);
    }

    const occupantId = state.board.occupantOf(next);
    if (occupantId !== null) {
      if (next !== destination) {
        return reject(`path is blocked at ${next}`);
      }
      if (getPiece(state, occupantId).color === piece.color) {
        return reject(`${destination} is occupied by a ${piece.color} piece`);
      }
      if (profile.capture === 'forbidden') {
        return reject('pawn cannot capture straight ahead');
      }
      return { legal: true, from: start, captured: occupantId };
    }

    if (next === destination) {
      if (profile.capture === 'required') {
        return reject('pawn moves diagonally only to capture');
      }
      return { legal: true, from: start, captured: null };
    }

    current = next;
  }

  return reject(`${destination} is out of range for ${piece.type}`);
}

function detachFromRoster(state: MatchState, captured: PieceRecord): void {
  const player = state.players[captured.color];
  player.roster = player.roster.filter((id) => id !== captured.id);
}

/**
 * Validate and, when legal, execute a move. Origin is cleared first, the
 * mover's position updated, any captured piece detached from the board and
 * its owner's roster, and finally the destination occupied by the mover.
 */
export function movePiece(state: MatchState, pieceId: PieceId, destination: Coordinate): MoveOutcome {
  const piece = getPiece(state, pieceId);
  const verdict = traceMove(state, piece, destination);
  if (!verdict.legal) {
    return { kind: 'rejected', reason: verdict.reason };
  }

  state.board.place(verdict.from, null);
  piece.position = destination;

  if (verdict.captured !== null) {
    const captured = getPiece(state, verdict.captured);
    captured.position = null;
    detachFromRoster(state, captured);
  }

  state.board.place(destination, piece.id);

  return verdict.captured === null
    ? { kind: 'moved' }
    : { kind: 'captured', captured: verdict.captured };
}

/**
 * Every move the rules accept for `color` in the current position, in roster
 * order and then rank-major destination order.
 */
export function enumerateMoves(state: MatchState, color: PlayerColor): CandidateMove[] {
  const moves: CandidateMove[] = [];
  for (const id of state.players[color].roster) {
    const piece = getPiece(state, id);
    if (piece.position === null) continue;

    for (const to of ALL_COORDINATES) {
      const verdict = traceMove(state, piece, to);
      if (!verdict.legal) continue;

      const captured = verdict.captured === null ? null : getPiece(state, verdict.captured);
      moves.push({
        from: verdict.from,
        to,
        captures: captured ? { type: captured.type, color: captured.color } : null,
      });
    }
  }
  return moves;
}
