import {
  GameEngine,
  formatBoard,
  formatMove,
  restoreGame,
  serializeGame,
  isEngineError,
  type BoardSnapshot,
  type CandidateMove,
  type GameStatus,
  type PieceView,
  type PlayerColor,
  type SavedGame,
} from '../../shared/engine';
import { fromEngineError, wrapError } from '../../shared/errors';
import { logger } from '../utils/logger';

/**
 * One entry of the in-memory move log kept beside the engine.
 */
export interface MoveRecord {
  moveNumber: number;
  color: PlayerColor;
  from: string;
  to: string;
  notation: string;
  captured: PieceView | null;
}

/**
 * Wire view of a session returned by the HTTP routes.
 */
export interface GameSummary {
  gameId: string;
  turn: PlayerColor;
  gameState: GameStatus;
  winner: PlayerColor | null;
  board: BoardSnapshot;
  moves: string[];
  createdAt: string;
  updatedAt: string;
}

export type AppliedMove =
  | { outcome: 'moved'; notation: string; game: GameSummary }
  | { outcome: 'captured'; captured: PieceView; notation: string; game: GameSummary };

/**
 * GameSession owns a single match between two seats sharing one client.
 *
 * It keeps the engine, a move log and timestamps, and turns engine
 * rejections into session-level errors the HTTP layer knows how to answer.
 * Sessions are not safe for concurrent mutation; callers go through
 * `GameSessionManager.withGameLock`.
 */
export class GameSession {
  private readonly history: MoveRecord[] = [];
  private readonly createdAt: Date;
  private updatedAt: Date;

  private constructor(
    public readonly gameId: string,
    private readonly engine: GameEngine
  ) {
    this.createdAt = new Date();
    this.updatedAt = this.createdAt;
  }

  static create(gameId: string): GameSession {
    const session = new GameSession(gameId, new GameEngine());
    logger.info('GameSession created', { gameId });
    return session;
  }

  /**
   * @throws GameError when the saved game cannot be placed on a board
   */
  static fromSaved(gameId: string, saved: SavedGame): GameSession {
    let engine: GameEngine;
    try {
      engine = restoreGame(saved);
    } catch (error) {
      throw isEngineError(error) ? fromEngineError(error, gameId) : wrapError(error, { gameId });
    }

    const session = new GameSession(gameId, engine);
    logger.info('GameSession restored from saved game', {
      gameId,
      turn: engine.getTurn(),
      whitePieces: saved[1].length,
      blackPieces: saved[2].length,
    });
    return session;
  }

  get isFinished(): boolean {
    return this.engine.isFinished();
  }

  /**
   * Submit a move for the side to move.
   *
   * @throws GameError carrying the engine's refusal (illegal move, out of
   *   turn or game over); the match is unchanged in that case
   */
  applyMove(from: string, to: string): AppliedMove {
    const color = this.engine.getTurn();
    const result = this.engine.makeMove(from, to);

    if (!result.success) {
      logger.warn('Engine rejected move', {
        gameId: this.gameId,
        from,
        to,
        code: result.error.code,
        reason: result.error.message,
      });
      throw fromEngineError(result.error, this.gameId);
    }

    const notation = formatMove(from, to, result);
    this.history.push({
      moveNumber: this.history.length + 1,
      color,
      from,
      to,
      notation,
      captured: result.outcome === 'captured' ? result.captured : null,
    });
    this.updatedAt = new Date();

    if (result.outcome === 'captured') {
      logger.info('Piece captured', {
        gameId: this.gameId,
        notation,
        captured: result.captured,
      });
    } else {
      logger.debug('Move applied', { gameId: this.gameId, notation });
    }

    if (result.gameState !== 'UNFINISHED') {
      logger.info('Game finished', {
        gameId: this.gameId,
        gameState: result.gameState,
        moves: this.history.length,
      });
    }

    const game = this.getSummary();
    return result.outcome === 'captured'
      ? { outcome: 'captured', captured: result.captured, notation, game }
      : { outcome: 'moved', notation, game };
  }

  getSummary(): GameSummary {
    return {
      gameId: this.gameId,
      turn: this.engine.getTurn(),
      gameState: this.engine.getGameState(),
      winner: this.engine.getWinner(),
      board: this.engine.getBoardSnapshot(),
      moves: this.history.map((move) => move.notation),
      createdAt: this.createdAt.toISOString(),
      updatedAt: this.updatedAt.toISOString(),
    };
  }

  getHistory(): MoveRecord[] {
    return this.history.map((move) => ({ ...move }));
  }

  getLegalMoves(): CandidateMove[] {
    return this.engine.getLegalMoves();
  }

  renderBoard(): string {
    return formatBoard(this.engine.getBoardSnapshot());
  }

  /**
   * @throws GameCompletedError once the game has a winner
   */
  save(): SavedGame {
    try {
      return serializeGame(this.engine);
    } catch (error) {
      throw isEngineError(error) ? fromEngineError(error, this.gameId) : wrapError(error, { gameId: this.gameId });
    }
  }
}
