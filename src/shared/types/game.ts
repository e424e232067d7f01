// Shared game types used by the engine, the validation layer and the HTTP
// service. Everything here is plain data so it can cross the wire as JSON.

export const FILES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;
export const RANKS = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

export type FileLetter = (typeof FILES)[number];
export type RankDigit = (typeof RANKS)[number];

/** Algebraic square name, e.g. `e4`. */
export type Coordinate = `${FileLetter}${RankDigit}`;

export type PlayerColor = 'white' | 'black';

export const PIECE_TYPES = ['pawn', 'knight', 'bishop', 'rook', 'queen', 'king'] as const;
export type PieceType = (typeof PIECE_TYPES)[number];

export type GameStatus = 'UNFINISHED' | 'WHITE_WON' | 'BLACK_WON';

/** What a renderer needs to know about an occupied square. */
export interface PieceView {
  type: PieceType;
  color: PlayerColor;
}

/** Read-only view of all 64 squares, keyed by coordinate. */
export type BoardSnapshot = Record<Coordinate, PieceView | null>;

const COORDINATE_PATTERN = /^[a-h][1-8]$/;

export function isCoordinate(value: unknown): value is Coordinate {
  return typeof value === 'string' && COORDINATE_PATTERN.test(value);
}

export function opponentOf(color: PlayerColor): PlayerColor {
  return color === 'white' ? 'black' : 'white';
}

export function winStatusFor(color: PlayerColor): GameStatus {
  return color === 'white' ? 'WHITE_WON' : 'BLACK_WON';
}

/**
 * Every coordinate in rank-major order starting at a1 (a1, b1, ..., h1, a2,
 * ..., h8).
 */
export const ALL_COORDINATES: readonly Coordinate[] = RANKS.flatMap((rank) =>
  FILES.map((file): Coordinate => `${file}${rank}`)
);
