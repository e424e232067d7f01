import { FILES, RANKS, type BoardSnapshot, type PieceType, type PlayerColor } from '../types/game';
import type { MakeMoveResult } from './types';

/**
 * Shared notation helpers.
 *
 * These produce a compact, human-readable form of pieces, moves and whole
 * boards for logs, test failures and the plain-text board endpoint. They are
 * not a full algebraic system.
 */

const PIECE_LETTERS: Record<PieceType, string> = {
  pawn: 'P',
  knight: 'N',
  bishop: 'B',
  rook: 'R',
  queen: 'Q',
  king: 'K',
};

const COLOR_LETTERS: Record<PlayerColor, string> = {
  white: 'W',
  black: 'B',
};

const EMPTY_SQUARE = '..';

/** Two-letter tag: piece letter then color letter, e.g. `NW`, `KB`. */
export function formatPiece(type: PieceType, color: PlayerColor): string {
  return `${PIECE_LETTERS[type]}${COLOR_LETTERS[color]}`;
}

/**
 * `e2-e4` for a quiet move, `e4xd5` for a capture, with a trailing `#` when
 * the capture ended the game.
 */
export function formatMove(from: string, to: string, result?: MakeMoveResult): string {
  if (result && result.success && result.outcome === 'captured') {
    const suffix = result.gameState === 'UNFINISHED' ? '' : '#';
    return `${from}x${to}${suffix}`;
  }
  return `${from}-${to}`;
}

/**
 * Render a board snapshot as text with rank 8 at the top:
 *
 * ```
 *    a  b  c  d  e  f  g  h
 * 8 RB NB BB QB KB BB NB RB 8
 * ...
 * 1 RW NW BW QW KW BW NW RW 1
 *    a  b  c  d  e  f  g  h
 * ```
 */
export function formatBoard(snapshot: BoardSnapshot): string {
  const fileHeader = `   ${FILES.join('  ')}`;
  const rows = [...RANKS].reverse().map((rank) => {
    const cells = FILES.map((file) => {
      const piece = snapshot[`${file}${rank}`];
      return piece ? formatPiece(piece.type, piece.color) : EMPTY_SQUARE;
    });
    return `${rank} ${cells.join(' ')} ${rank}`;
  });
  return [fileHeader, ...rows, fileHeader].join('\n');
}
