import { Router, Request } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { updateContextWithGame } from '../middleware/requestContext';
import { logger } from '../utils/logger';
import {
  GameIdParamSchema,
  MoveRequestSchema,
  ValidationError,
  parseSavedGame,
} from '../../shared/validation/schemas';
import type { GameSessionManager } from '../game/GameSessionManager';

/**
 * Validate the `:gameId` route parameter and tag the request context with it.
 */
const readGameId = (req: Request): string => {
  const parsed = GameIdParamSchema.safeParse(req.params);
  if (!parsed.success) {
    throw new ValidationError('Game id must be a UUID', 'gameId', 'INVALID_GAME_ID');
  }
  updateContextWithGame(parsed.data.gameId);
  return parsed.data.gameId;
};

/**
 * Game routes. Every read or write of a live game goes through the
 * manager's per-game lock so concurrent requests see a consistent match.
 */
export const createGameRoutes = (manager: GameSessionManager): Router => {
  const router = Router();

  /**
   * POST /games
   * Start a new game from the standard starting position.
   */
  router.post(
    '/',
    asyncHandler(async (_req, res) => {
      const session = manager.createSession();
      updateContextWithGame(session.gameId);
      logger.info('Game created', { gameId: session.gameId });

      res.status(201).json({
        success: true,
        data: { game: session.getSummary() },
      });
    })
  );

  /**
   * POST /games/load
   * Body: a saved game `[turn, whitePieces, blackPieces]`. Registers a new
   * game at that position.
   */
  router.post(
    '/load',
    asyncHandler(async (req, res) => {
      const saved = parseSavedGame(req.body);
      const session = manager.loadSession(saved);
      updateContextWithGame(session.gameId);

      res.status(201).json({
        success: true,
        data: { game: session.getSummary() },
      });
    })
  );

  router.get(
    '/:gameId',
    asyncHandler(async (req, res) => {
      const gameId = readGameId(req);
      const game = await manager.withGameLock(gameId, () => manager.requireSession(gameId).getSummary());

      res.json({
        success: true,
        data: { game },
      });
    })
  );

  /**
   * GET /games/:gameId/board
   * Plain-text rendering, rank 8 at the top.
   */
  router.get(
    '/:gameId/board',
    asyncHandler(async (req, res) => {
      const gameId = readGameId(req);
      const board = await manager.withGameLock(gameId, () => manager.requireSession(gameId).renderBoard());

      res.type('text/plain').send(`${board}\n`);
    })
  );

  /**
   * GET /games/:gameId/moves
   * Moves the side to move may make; empty once the game is over.
   */
  router.get(
    '/:gameId/moves',
    asyncHandler(async (req, res) => {
      const gameId = readGameId(req);
      const { turn, moves } = await manager.withGameLock(gameId, () => {
        const session = manager.requireSession(gameId);
        return { turn: session.getSummary().turn, moves: session.getLegalMoves() };
      });

      res.json({
        success: true,
        data: { turn, moves },
      });
    })
  );

  /**
   * POST /games/:gameId/moves
   * Body: `{ from, to }`. Applies the move for the side to move.
   */
  router.post(
    '/:gameId/moves',
    asyncHandler(async (req, res) => {
      const gameId = readGameId(req);
      const { from, to } = MoveRequestSchema.parse(req.body);

      const applied = await manager.withGameLock(gameId, () =>
        manager.requireSession(gameId).applyMove(from, to)
      );

      res.json({
        success: true,
        data: applied,
      });
    })
  );

  /**
   * GET /games/:gameId/save
   * Saved form of an unfinished game; 409 once the game has a winner.
   */
  router.get(
    '/:gameId/save',
    asyncHandler(async (req, res) => {
      const gameId = readGameId(req);
      const saved = await manager.withGameLock(gameId, () => manager.requireSession(gameId).save());

      res.json({
        success: true,
        data: { saved },
      });
    })
  );

  router.delete(
    '/:gameId',
    asyncHandler(async (req, res) => {
      const gameId = readGameId(req);
      await manager.withGameLock(gameId, () => {
        manager.requireSession(gameId);
        manager.removeSession(gameId);
      });

      res.status(204).end();
    })
  );

  return router;
};
