import { Router } from 'express';
import { createGameRoutes } from './game';
import type { GameSessionManager } from '../game/GameSessionManager';

export const setupRoutes = (manager: GameSessionManager): Router => {
  const router = Router();

  router.use('/games', createGameRoutes(manager));

  return router;
};
