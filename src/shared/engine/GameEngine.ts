import {
  isCoordinate,
  opponentOf,
  type BoardSnapshot,
  type Coordinate,
  type GameStatus,
  type PieceType,
  type PieceView,
  type PlayerColor,
} from '../types/game';
import { gameOver, illegalMove, outOfTurn } from './errors';
import { createInitialMatchState } from './initialState';
import { enumerateMoves, getPiece, movePiece } from './movementLogic';
import type { CandidateMove, MakeMoveResult, MatchState, PieceId, PieceRecord } from './types';
import { countActiveOfType, evaluateCapture } from './victoryLogic';

/**
 * Turn and win-condition state machine for one match.
 *
 * GameEngine is the only owner of the board, the piece arena, both rosters,
 * the turn pointer and the game state. Movement functions receive that state
 * explicitly; callers outside the engine only see copies.
 *
 * `makeMove` is the sole mutator during play. Every rejection is returned as
 * a value and leaves the match exactly as it was.
 */
export class GameEngine {
  private readonly match: MatchState;
  private turn: PlayerColor = 'white';
  private gameState: GameStatus = 'UNFINISHED';

  constructor(match: MatchState = createInitialMatchState()) {
    this.match = match;
  }

  getTurn(): PlayerColor {
    return this.turn;
  }

  getGameState(): GameStatus {
    return this.gameState;
  }

  getWinner(): PlayerColor | null {
    switch (this.gameState) {
      case 'WHITE_WON':
        return 'white';
      case 'BLACK_WON':
        return 'black';
      case 'UNFINISHED':
        return null;
    }
  }

  isFinished(): boolean {
    return this.gameState !== 'UNFINISHED';
  }

  getBoardSnapshot(): BoardSnapshot {
    const entries = this.match.board
      .allSquares()
      .map(({ coordinate, occupant }) => [
        coordinate,
        occupant === null ? null : this.viewOf(getPiece(this.match, occupant)),
      ]);
    return Object.fromEntries(entries) as BoardSnapshot;
  }

  getPieceAt(coord: Coordinate): PieceView | null {
    const id = this.match.board.occupantOf(coord);
    return id === null ? null : this.viewOf(getPiece(this.match, id));
  }

  getOccupantId(coord: Coordinate): PieceId | null {
    return this.match.board.occupantOf(coord);
  }

  /** Copy of a piece record; mutating it has no effect on the match. */
  getPiece(id: PieceId): PieceRecord {
    return { ...getPiece(this.match, id) };
  }

  getRoster(color: PlayerColor): PieceRecord[] {
    return this.match.players[color].roster.map((id) => this.getPiece(id));
  }

  countActive(color: PlayerColor, type: PieceType): number {
    return countActiveOfType(this.match, color, type);
  }

  /** Moves the rules accept for the side to move; empty once the game is over. */
  getLegalMoves(): CandidateMove[] {
    if (this.isFinished()) {
      return [];
    }
    return enumerateMoves(this.match, this.turn);
  }

  /**
   * Administrative override used when restoring a saved game. The caller is
   * responsible for having restored occupancy and rosters first.
   *
   * @throws RulesViolation with RULES_GAME_OVER on a finished game
   */
  setTurn(color: PlayerColor): void {
    if (this.isFinished()) {
      throw gameOver(this.gameState);
    }
    this.turn = color;
  }

  makeMove(from: string, to: string): MakeMoveResult {
    if (this.isFinished()) {
      return { success: false, error: gameOver(this.gameState) };
    }

    if (!isCoordinate(from) || !isCoordinate(to)) {
      return { success: false, error: illegalMove(from, to, 'coordinate is off the board') };
    }

    // A null move is refused whoever owns the square.
    if (from === to) {
      return { success: false, error: illegalMove(from, to, 'origin and destination are the same square') };
    }

    const moverId = this.match.board.occupantOf(from);
    if (moverId === null) {
      return { success: false, error: illegalMove(from, to, `no piece on ${from}`) };
    }

    const mover = getPiece(this.match, moverId);
    if (mover.color !== this.turn) {
      return { success: false, error: outOfTurn(this.turn, mover.color) };
    }

    const outcome = movePiece(this.match, moverId, to);

    switch (outcome.kind) {
      case 'rejected':
        return { success: false, error: illegalMove(from, to, outcome.reason) };

      case 'moved':
        this.turn = opponentOf(this.turn);
        return { success: true, outcome: 'moved', gameState: this.gameState };

      case 'captured': {
        const captured = this.viewOf(getPiece(this.match, outcome.captured));
        const victory = evaluateCapture(this.match, mover.color, outcome.captured);
        if (victory.isGameOver) {
          this.gameState = victory.state;
        } else {
          this.turn = opponentOf(this.turn);
        }
        return { success: true, outcome: 'captured', captured, gameState: this.gameState };
      }
    }
  }

  private viewOf(piece: PieceRecord): PieceView {
    return { type: piece.type, color: piece.color };
  }
}
