import { ALL_COORDINATES, isCoordinate, type Coordinate } from '../types/game';
import { fileIndex, rankIndex, BOARD_WIDTH } from './core';
import { invalidCoordinate } from './errors';
import type { PieceId, SquareRecord } from './types';

/**
 * The fixed 64-square lattice.
 *
 * Squares are created once, in rank-major order, and only their occupancy
 * changes afterwards. The board stores piece ids, not pieces: keeping the
 * piece's own `position` in step with `place` is the caller's job.
 */
export class Board {
  private readonly squares: SquareRecord[];

  constructor() {
    this.squares = ALL_COORDINATES.map((coordinate) => ({ coordinate, occupant: null }));
  }

  /**
   * Resolve a coordinate string to its square.
   *
   * @throws BoardConstraintViolation when `coord` is malformed or off-board
   */
  resolve(coord: string): SquareRecord {
    if (!isCoordinate(coord)) {
      throw invalidCoordinate(coord);
    }
    const square = this.squares[rankIndex(coord) * BOARD_WIDTH + fileIndex(coord)];
    if (!square) {
      throw invalidCoordinate(coord);
    }
    return square;
  }

  occupantOf(coord: Coordinate): PieceId | null {
    return this.resolve(coord).occupant;
  }

  isEmpty(coord: Coordinate): boolean {
    return this.occupantOf(coord) === null;
  }

  place(coord: Coordinate, piece: PieceId | null): void {
    this.resolve(coord).occupant = piece;
  }

  /** All squares in rank-major order (a1, b1, ..., h8). */
  allSquares(): readonly SquareRecord[] {
    return this.squares;
  }

  occupiedSquares(): SquareRecord[] {
    return this.squares.filter((square) => square.occupant !== null);
  }

  clear(): void {
    for (const square of this.squares) {
      square.occupant = null;
    }
  }
}
