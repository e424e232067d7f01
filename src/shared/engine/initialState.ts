import {
  FILES,
  type Coordinate,
  type FileLetter,
  type PieceType,
  type PlayerColor,
} from '../types/game';
import { Board } from './board';
import type { MatchState, PieceRecord, PlayerRecord } from './types';

export interface RosterSlot {
  type: PieceType;
  coordinate: Coordinate;
}

const BACK_RANK_ORDER: ReadonlyArray<{ type: PieceType; files: readonly FileLetter[] }> = [
  { type: 'rook', files: ['a', 'h'] },
  { type: 'knight', files: ['b', 'g'] },
  { type: 'bishop', files: ['c', 'f'] },
  { type: 'queen', files: ['d'] },
  { type: 'king', files: ['e'] },
];

/**
 * The canonical starting roster for one side: eight pawns a→h, then rooks,
 * knights, bishops, queen and king. Saved games list surviving pieces in
 * this same order, which is what lets a restore match them up by index.
 */
export function canonicalRoster(color: PlayerColor): RosterSlot[] {
  const pawnRank = color === 'white' ? '2' : '7';
  const backRank = color === 'white' ? '1' : '8';

  const pawns = FILES.map((file): RosterSlot => ({
    type: 'pawn',
    coordinate: `${file}${pawnRank}`,
  }));
  const officers = BACK_RANK_ORDER.flatMap(({ type, files }) =>
    files.map((file): RosterSlot => ({ type, coordinate: `${file}${backRank}` }))
  );

  return [...pawns, ...officers];
}

/**
 * Creates a fresh match in the standard starting position: 32 pieces on the
 * board, white's sixteen occupying ids 0-15 and black's 16-31.
 */
export function createInitialMatchState(): MatchState {
  const board = new Board();
  const pieces: PieceRecord[] = [];

  const seat = (color: PlayerColor): PlayerRecord => {
    const roster = canonicalRoster(color).map(({ type, coordinate }) => {
      const id = pieces.length;
      pieces.push({ id, type, color, position: coordinate });
      board.place(coordinate, id);
      return id;
    });
    return { color, roster };
  };

  const white = seat('white');
  const black = seat('black');

  return { board, pieces, players: { white, black } };
}
