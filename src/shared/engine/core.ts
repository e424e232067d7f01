import { FILES, RANKS, type Coordinate } from '../types/game';
import type { Direction, DirectionVector } from './types';

/**
 * Board geometry shared by the board, the movement logic and the notation
 * helpers. Coordinates are handled as algebraic strings; the helpers below
 * translate them to 0-based file/rank indices and back.
 */

export const BOARD_WIDTH = FILES.length;

export const DIRECTION_VECTORS: Record<Direction, DirectionVector> = {
  up: { dx: 0, dy: 1 },
  down: { dx: 0, dy: -1 },
  left: { dx: -1, dy: 0 },
  right: { dx: 1, dy: 0 },
  up_right: { dx: 1, dy: 1 },
  up_left: { dx: -1, dy: 1 },
  down_right: { dx: 1, dy: -1 },
  down_left: { dx: -1, dy: -1 },
};

export const ORTHOGONAL_DIRECTIONS: readonly Direction[] = ['up', 'down', 'left', 'right'];
export const DIAGONAL_DIRECTIONS: readonly Direction[] = [
  'up_right',
  'up_left',
  'down_right',
  'down_left',
];

export const ALL_DIRECTIONS: readonly Direction[] = [
  ...ORTHOGONAL_DIRECTIONS,
  ...DIAGONAL_DIRECTIONS,
];

export function isDiagonal(direction: Direction): boolean {
  const { dx, dy } = DIRECTION_VECTORS[direction];
  return dx !== 0 && dy !== 0;
}

export function fileIndex(coord: Coordinate): number {
  return coord.charCodeAt(0) - 'a'.charCodeAt(0);
}

export function rankIndex(coord: Coordinate): number {
  return coord.charCodeAt(1) - '1'.charCodeAt(0);
}

/** 1-based rank number, e.g. 4 for `e4`. */
export function rankNumber(coord: Coordinate): number {
  return rankIndex(coord) + 1;
}

/**
 * Build a coordinate from 0-based indices, or null when either index falls
 * outside the board.
 */
export function coordinateAt(file: number, rank: number): Coordinate | null {
  const fileChar = FILES[file];
  const rankChar = RANKS[rank];
  if (fileChar === undefined || rankChar === undefined) {
    return null;
  }
  return `${fileChar}${rankChar}`;
}

/** Shift a coordinate by whole files/ranks; null when it leaves the board. */
export function offsetCoordinate(coord: Coordinate, dx: number, dy: number): Coordinate | null {
  return coordinateAt(fileIndex(coord) + dx, rankIndex(coord) + dy);
}

function sign(value: number): -1 | 0 | 1 {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0;
}

/**
 * Classify the compass direction from `from` toward `to` by comparing files
 * and ranks independently. Returns null when the two squares coincide.
 *
 * Note that this is a quadrant classification, not an alignment check: b1→c3
 * is `up_right` even though it is not on a diagonal. The per-variant stepper
 * decides whether the destination is actually reachable.
 */
export function classifyDirection(from: Coordinate, to: Coordinate): Direction | null {
  const horizontal = sign(fileIndex(to) - fileIndex(from));
  const vertical = sign(rankIndex(to) - rankIndex(from));

  for (const direction of ALL_DIRECTIONS) {
    const vector = DIRECTION_VECTORS[direction];
    if (vector.dx === horizontal && vector.dy === vertical) {
      return direction;
    }
  }
  return null;
}
