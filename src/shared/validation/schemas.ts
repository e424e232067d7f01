import { z } from 'zod';
import type { SavedGame } from '../engine/serialization';

// Coordinate validation: one lowercase file letter and one rank digit.
export const CoordinateSchema = z
  .string()
  .regex(/^[a-h][1-8]$/, 'Coordinate must be a file a-h followed by a rank 1-8');

// Move validation
// NOTE: coordinates are validated for shape only. Whether the move is legal
// is the engine's decision, so an off-board square still reaches the engine
// as a string and comes back as an illegal move.
export const MoveRequestSchema = z.object({
  from: z.string().min(1).max(8),
  to: z.string().min(1).max(8),
});

export type MoveRequestInput = z.infer<typeof MoveRequestSchema>;

export const GameIdParamSchema = z.object({
  gameId: z.string().uuid('Game id must be a UUID'),
});

export const ColorLabelSchema = z.enum(['White', 'Black']);

export const PieceTypeLabelSchema = z.enum(['Pawn', 'Knight', 'Bishop', 'Rook', 'Queen', 'King']);

export const SavedPieceSchema = z.tuple([PieceTypeLabelSchema, CoordinateSchema]);

// Saved game: [turn, whitePieces, blackPieces]. At most sixteen pieces a side.
export const SavedGameSchema = z.tuple([
  ColorLabelSchema,
  z.array(SavedPieceSchema).max(16),
  z.array(SavedPieceSchema).max(16),
]);

/**
 * Validate an untrusted saved-game payload (for example a parsed request
 * body or file) before handing it to `restoreGame`.
 *
 * @throws ZodError when the payload does not have the saved-game shape
 */
export function parseSavedGame(input: unknown): SavedGame {
  return SavedGameSchema.parse(input);
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public field?: string,
    public code?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}
