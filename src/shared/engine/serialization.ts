/**
 * ═══════════════════════════════════════════════════════════════════════════
 * Saved-game serialization
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A saved game is the ordered record `[turn, whitePieces, blackPieces]`, each
 * piece list holding `[typeLabel, coordinate]` pairs in roster order
 * (abbreviated here):
 *
 * ```json
 * ["Black", [["Pawn", "a2"], ..., ["King", "e1"]], [["Pawn", "d5"], ..., ["King", "e8"]]]
 * ```
 *
 * Because both sides list survivors in canonical construction order, a
 * restore can walk the starting roster and the saved list side by side and
 * match pieces up by type.
 */

import {
  isCoordinate,
  PIECE_TYPES,
  type Coordinate,
  type PieceType,
  type PlayerColor,
} from '../types/game';
import { gameOver, invalidCoordinate, invalidSavedGame } from './errors';
import { GameEngine } from './GameEngine';
import { createInitialMatchState } from './initialState';
import { getPiece } from './movementLogic';
import type { MatchState, PieceId } from './types';

// ═══════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════

export type ColorLabel = 'White' | 'Black';
export type PieceTypeLabel = 'Pawn' | 'Knight' | 'Bishop' | 'Rook' | 'Queen' | 'King';

export type SavedPiece = [PieceTypeLabel, string];
export type SavedGame = [ColorLabel, SavedPiece[], SavedPiece[]];

export const COLOR_LABELS: Record<PlayerColor, ColorLabel> = {
  white: 'White',
  black: 'Black',
};

export const PIECE_TYPE_LABELS: Record<PieceType, PieceTypeLabel> = {
  pawn: 'Pawn',
  knight: 'Knight',
  bishop: 'Bishop',
  rook: 'Rook',
  queen: 'Queen',
  king: 'King',
};

export function colorFromLabel(label: ColorLabel): PlayerColor {
  return label === 'White' ? 'white' : 'black';
}

// ═══════════════════════════════════════════════════════════════════════════
// Serialization
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Capture turn and survivors of an unfinished game.
 *
 * @throws RulesViolation with RULES_GAME_OVER when the game has ended
 */
export function serializeGame(game: GameEngine): SavedGame {
  if (game.isFinished()) {
    throw gameOver(game.getGameState());
  }

  const listFor = (color: PlayerColor): SavedPiece[] =>
    game.getRoster(color).flatMap((piece): SavedPiece[] =>
      piece.position === null ? [] : [[PIECE_TYPE_LABELS[piece.type], piece.position]]
    );

  return [COLOR_LABELS[game.getTurn()], listFor('white'), listFor('black')];
}

/**
 * Re-seat one side's canonical roster onto its saved squares.
 *
 * Only piece positions and the roster change here. The caller rebuilds board
 * occupancy afterwards from scratch, so a piece saved on a square another
 * piece started on is never wiped by a later reset.
 */
function reconcileRoster(
  match: MatchState,
  color: PlayerColor,
  saved: readonly SavedPiece[]
): void {
  const player = match.players[color];
  const survivors: PieceId[] = [];
  let savedIndex = 0;

  for (const id of player.roster) {
    const piece = getPiece(match, id);
    const entry = saved[savedIndex];

    if (entry !== undefined && PIECE_TYPE_LABELS[piece.type] === entry[0]) {
      const [, coordinate] = entry;
      if (!isCoordinate(coordinate)) {
        throw invalidCoordinate(coordinate);
      }
      piece.position = coordinate;
      survivors.push(id);
      savedIndex++;
    } else {
      // Missing from the save: captured before it was written.
      piece.position = null;
    }
  }

  if (savedIndex < saved.length) {
    throw invalidSavedGame(`${COLOR_LABELS[color]} piece list does not follow the starting order`, {
      color,
      unmatched: saved.slice(savedIndex),
    });
  }

  player.roster = survivors;

  // Losing every piece of one type ends the game, and finished games are
  // never saved.
  for (const type of PIECE_TYPES) {
    if (!survivors.some((id) => getPiece(match, id).type === type)) {
      throw invalidSavedGame(`${COLOR_LABELS[color]} has no ${type} left`, { color, type });
    }
  }
}

/**
 * Rebuild a game from a saved record: fresh starting position, saved turn,
 * then every surviving piece moved to its saved square and every other
 * square cleared.
 *
 * @throws BoardConstraintViolation for a malformed coordinate
 * @throws InvalidState when entries cannot be matched or share a square, or
 *   when a side has lost every piece of some type
 */
export function restoreGame(saved: SavedGame): GameEngine {
  const [turnLabel, whitePieces, blackPieces] = saved;
  const match = createInitialMatchState();

  reconcileRoster(match, 'white', whitePieces);
  reconcileRoster(match, 'black', blackPieces);

  match.board.clear();
  const seen = new Map<Coordinate, PieceId>();
  for (const id of [...match.players.white.roster, ...match.players.black.roster]) {
    const position = getPiece(match, id).position;
    if (position === null) continue;

    const other = seen.get(position);
    if (other !== undefined) {
      throw invalidSavedGame(`two pieces share ${position}`, { coordinate: position, pieces: [other, id] });
    }
    seen.set(position, id);
    match.board.place(position, id);
  }

  const game = new GameEngine(match);
  game.setTurn(colorFromLabel(turnLabel));
  return game;
}
