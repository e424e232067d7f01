import type { GameStatus, PieceType, PlayerColor } from '../types/game';
import { winStatusFor } from '../types/game';
import { getPiece } from './movementLogic';
import type { MatchState, PieceId } from './types';

export interface VictoryResult {
  isGameOver: boolean;
  winner?: PlayerColor;
  /** The piece type the loser has run out of. */
  eliminatedType?: PieceType;
  state: GameStatus;
}

export function countActiveOfType(state: MatchState, color: PlayerColor, type: PieceType): number {
  return state.players[color].roster.filter((id) => getPiece(state, id).type === type).length;
}

/**
 * Type-elimination check after a capture has been applied.
 *
 * The captured piece is already gone from its owner's roster, so "last of
 * its type" means no surviving teammate of that type. The king needs no
 * special case: there is only one, so capturing it always ends the game.
 */
export function evaluateCapture(
  state: MatchState,
  mover: PlayerColor,
  capturedId: PieceId
): VictoryResult {
  const captured = getPiece(state, capturedId);
  const survivors = countActiveOfType(state, captured.color, captured.type);

  if (survivors > 0) {
    return { isGameOver: false, state: 'UNFINISHED' };
  }

  return {
    isGameOver: true,
    winner: mover,
    eliminatedType: captured.type,
    state: winStatusFor(mover),
  };
}
