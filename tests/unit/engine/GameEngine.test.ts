/**
 * GameEngine Unit Tests
 * Turn order, the type-elimination win condition and rejection paths.
 */

import { GameEngine } from '../../../src/shared/engine/GameEngine';
import { EngineErrorCode } from '../../../src/shared/engine/errors';
import { createInitialMatchState } from '../../../src/shared/engine/initialState';
import { expectBoardMatchesRosters, playMoves, sparseEngine } from '../../utils/fixtures';

describe('GameEngine', () => {
  let game: GameEngine;

  beforeEach(() => {
    game = new GameEngine();
  });

  describe('initial state', () => {
    it('starts unfinished with white to move', () => {
      expect(game.getTurn()).toBe('white');
      expect(game.getGameState()).toBe('UNFINISHED');
      expect(game.getWinner()).toBeNull();
      expect(game.isFinished()).toBe(false);
    });

    it('shows the standard starting position', () => {
      const snapshot = game.getBoardSnapshot();
      expect(Object.keys(snapshot)).toHaveLength(64);
      expect(snapshot.e1).toEqual({ type: 'king', color: 'white' });
      expect(snapshot.d8).toEqual({ type: 'queen', color: 'black' });
      expect(snapshot.g1).toEqual({ type: 'knight', color: 'white' });
      expect(snapshot.c7).toEqual({ type: 'pawn', color: 'black' });
      expect(snapshot.e4).toBeNull();
      expectBoardMatchesRosters(game);
    });

    it('gives each side sixteen pieces', () => {
      expect(game.getRoster('white')).toHaveLength(16);
      expect(game.getRoster('black')).toHaveLength(16);
      expect(game.countActive('black', 'pawn')).toBe(8);
      expect(game.countActive('white', 'king')).toBe(1);
    });
  });

  describe('makeMove', () => {
    it('plays e2-e4 and passes the turn to black', () => {
      const result = game.makeMove('e2', 'e4');

      expect(result).toEqual({ success: true, outcome: 'moved', gameState: 'UNFINISHED' });
      expect(game.getTurn()).toBe('black');
      expect(game.getPieceAt('e4')).toEqual({ type: 'pawn', color: 'white' });
      expect(game.getPieceAt('e2')).toBeNull();
    });

    it('rejects a pawn advancing three squares', () => {
      const result = game.makeMove('e2', 'e5');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(EngineErrorCode.RULES_ILLEGAL_MOVE);
        expect(result.error.message).toBe('Illegal move e2-e5: e5 is out of range for pawn');
      }
      expect(game.getTurn()).toBe('white');
    });

    it('rejects a pawn moving diagonally onto an empty square', () => {
      const result = game.makeMove('e2', 'd3');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(EngineErrorCode.RULES_ILLEGAL_MOVE);
        expect(result.error.context).toEqual({
          from: 'e2',
          to: 'd3',
          reason: 'pawn moves diagonally only to capture',
        });
      }
    });

    it('rejects a white move on black’s turn and leaves the position alone', () => {
      playMoves(game, [['e2', 'e4']]);
      const before = game.getBoardSnapshot();

      const result = game.makeMove('d2', 'd4');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(EngineErrorCode.RULES_OUT_OF_TURN);
        expect(result.error.message).toBe("It is black's turn, not white's");
      }
      expect(game.getBoardSnapshot()).toEqual(before);
      expect(game.getTurn()).toBe('black');
      expect(game.getGameState()).toBe('UNFINISHED');
    });

    it('rejects a move from an empty square', () => {
      const result = game.makeMove('e4', 'e5');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Illegal move e4-e5: no piece on e4');
      }
    });

    it.each([
      ['e9', 'e4'],
      ['e2', 'i4'],
      ['E2', 'E4'],
      ['', 'e4'],
    ])('rejects the malformed pair %j -> %j as an illegal move', (from, to) => {
      const result = game.makeMove(from, to);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(EngineErrorCode.RULES_ILLEGAL_MOVE);
        expect(result.error.context).toEqual({ from, to, reason: 'coordinate is off the board' });
      }
    });

    it('rejects a null move as illegal on either side’s turn', () => {
      const whiteTurn = game.makeMove('a1', 'a1');
      playMoves(game, [['e2', 'e4']]);
      const blackTurn = game.makeMove('a1', 'a1');

      for (const result of [whiteTurn, blackTurn]) {
        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.code).toBe(EngineErrorCode.RULES_ILLEGAL_MOVE);
        }
      }
    });

    it('can retry a rejected move without side effects', () => {
      const first = game.makeMove('b1', 'b3');
      const second = game.makeMove('b1', 'b3');

      expect(first.success).toBe(false);
      expect(second.success).toBe(false);
      if (!first.success && !second.success) {
        expect(second.error.message).toBe(first.error.message);
      }
      expect(game.makeMove('b1', 'c3').success).toBe(true);
    });
  });

  describe('captures', () => {
    it('captures a pawn without ending the game while pawns remain', () => {
      playMoves(game, [
        ['e2', 'e4'],
        ['d7', 'd5'],
      ]);

      const result = game.makeMove('e4', 'd5');

      expect(result).toEqual({
        success: true,
        outcome: 'captured',
        captured: { type: 'pawn', color: 'black' },
        gameState: 'UNFINISHED',
      });
      expect(game.getTurn()).toBe('black');
      expect(game.countActive('black', 'pawn')).toBe(7);
      expect(game.getRoster('black')).toHaveLength(15);
      expectBoardMatchesRosters(game);
    });

    it('tracks which piece stands on each square, not just its type', () => {
      const match = createInitialMatchState();
      const queensideRook = match.board.occupantOf('a1');
      const kingsideRook = match.board.occupantOf('h1');
      match.board.place('a1', kingsideRook);
      match.board.place('h1', queensideRook);
      const swapped = new GameEngine(match);

      expect(swapped.getPieceAt('a1')).toEqual({ type: 'rook', color: 'white' });
      expect(() => expectBoardMatchesRosters(swapped)).toThrow();
      expectBoardMatchesRosters(game);
    });

    it('wins the game when the last pawn of a side is captured', () => {
      game = sparseEngine('White', ['e4'], ['d5']);

      const result = game.makeMove('e4', 'd5');

      expect(result).toEqual({
        success: true,
        outcome: 'captured',
        captured: { type: 'pawn', color: 'black' },
        gameState: 'WHITE_WON',
      });
      expect(game.getGameState()).toBe('WHITE_WON');
      expect(game.getWinner()).toBe('white');
      expect(game.getTurn()).toBe('white');
    });

    it('refuses every move once the game is over', () => {
      game = sparseEngine('White', ['e4'], ['d5']);
      playMoves(game, [['e4', 'd5']]);

      const result = game.makeMove('e8', 'e7');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe(EngineErrorCode.RULES_GAME_OVER);
        expect(result.error.message).toBe('Game is already over (WHITE_WON)');
      }
      expect(game.getLegalMoves()).toEqual([]);
    });

    it('ends the game on the capture of a sole queen', () => {
      // Scholar's-mate shape: the white queen takes f7, then the king retakes.
      playMoves(game, [
        ['e2', 'e4'],
        ['e7', 'e5'],
        ['d1', 'h5'],
        ['a7', 'a6'],
        ['h5', 'f7'],
      ]);
      expect(game.getGameState()).toBe('UNFINISHED');

      const result = game.makeMove('e8', 'f7');

      expect(result).toEqual({
        success: true,
        outcome: 'captured',
        captured: { type: 'queen', color: 'white' },
        gameState: 'BLACK_WON',
      });
      expect(game.getWinner()).toBe('black');
      expect(game.getTurn()).toBe('black');
    });
  });

  describe('setTurn', () => {
    it('overrides the side to move', () => {
      game.setTurn('black');
      expect(game.getTurn()).toBe('black');
      expect(game.makeMove('e7', 'e5').success).toBe(true);
      expect(game.getTurn()).toBe('white');
    });

    it('throws once the game is over', () => {
      game = sparseEngine('White', ['e4'], ['d5']);
      playMoves(game, [['e4', 'd5']]);
      expect(() => game.setTurn('black')).toThrow('Game is already over (WHITE_WON)');
    });
  });

  describe('read-only views', () => {
    it('returns copies that cannot change the match', () => {
      const [firstPawn] = game.getRoster('white');
      firstPawn.position = 'h5';
      expect(game.getPieceAt('a2')).toEqual({ type: 'pawn', color: 'white' });
      expect(game.getPieceAt('h5')).toBeNull();

      const snapshot = game.getBoardSnapshot();
      snapshot.e4 = { type: 'queen', color: 'black' };
      expect(game.getPieceAt('e4')).toBeNull();
    });

    it('lists legal moves for the side to move', () => {
      playMoves(game, [['e2', 'e4']]);
      const moves = game.getLegalMoves();
      expect(moves).toHaveLength(20);
      expect(moves.every(({ from }) => game.getPieceAt(from)?.color === 'black')).toBe(true);
    });
  });
});
