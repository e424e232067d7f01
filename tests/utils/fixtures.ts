/**
 * Shared fixtures for engine and service tests.
 */

import {
  ALL_COORDINATES,
  GameEngine,
  restoreGame,
  type ColorLabel,
  type PlayerColor,
  type SavedGame,
  type SavedPiece,
} from '../../src/shared/engine';

/** One of each officer on its home square, in roster order. */
export function homeOfficers(color: PlayerColor): SavedPiece[] {
  const rank = color === 'white' ? '1' : '8';
  return [
    ['Rook', `a${rank}`],
    ['Knight', `b${rank}`],
    ['Bishop', `c${rank}`],
    ['Queen', `d${rank}`],
    ['King', `e${rank}`],
  ];
}

/**
 * A thinned-out position: the given pawn squares for each side plus one of
 * each officer at home. Every piece type is still represented, so the game
 * is restorable as long as each side keeps at least one pawn.
 */
export function sparseGame(turn: ColorLabel, whitePawns: string[], blackPawns: string[]): SavedGame {
  const pawns = (squares: string[]): SavedPiece[] => squares.map((square): SavedPiece => ['Pawn', square]);
  return [turn, [...pawns(whitePawns), ...homeOfficers('white')], [...pawns(blackPawns), ...homeOfficers('black')]];
}

export function sparseEngine(turn: ColorLabel, whitePawns: string[], blackPawns: string[]): GameEngine {
  return restoreGame(sparseGame(turn, whitePawns, blackPawns));
}

/**
 * Play a list of moves that are all expected to succeed, failing loudly with
 * the engine's reason otherwise.
 */
export function playMoves(game: GameEngine, moves: Array<[string, string]>): void {
  for (const [from, to] of moves) {
    const result = game.makeMove(from, to);
    if (!result.success) {
      throw new Error(`setup move ${from}-${to} failed: ${result.error.message}`);
    }
  }
}

/**
 * Check that every piece in either roster is the occupant of the square it
 * records as its position, and that no other square is occupied.
 */
export function expectBoardMatchesRosters(game: GameEngine): void {
  const rosterPieces = [...game.getRoster('white'), ...game.getRoster('black')];

  for (const piece of rosterPieces) {
    expect(piece.position).not.toBeNull();
    if (piece.position !== null) {
      expect(game.getOccupantId(piece.position)).toBe(piece.id);
    }
  }

  const occupied = ALL_COORDINATES.filter((coord) => game.getOccupantId(coord) !== null);
  expect(occupied).toHaveLength(rosterPieces.length);
}
