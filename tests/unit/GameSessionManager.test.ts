/**
 * GameSessionManager Unit Tests
 * Registry capacity, lookup and the per-game lock.
 */

import { GameSessionManager } from '../../src/server/game/GameSessionManager';
import { GameErrorCode, isGameError } from '../../src/shared/errors';
import { sparseGame } from '../utils/fixtures';

function sequentialIds(): () => string {
  let next = 0;
  return () => `game-${++next}`;
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('GameSessionManager', () => {
  let manager: GameSessionManager;

  beforeEach(() => {
    manager = new GameSessionManager({ maxActiveGames: 2, generateId: sequentialIds() });
  });

  describe('sessions', () => {
    it('creates sessions under fresh ids', () => {
      const first = manager.createSession();
      const second = manager.createSession();

      expect(first.gameId).toBe('game-1');
      expect(second.gameId).toBe('game-2');
      expect(manager.getSession('game-1')).toBe(first);
      expect(manager.size).toBe(2);
    });

    it('loads a saved game as a new session', () => {
      const session = manager.loadSession(sparseGame('Black', ['e4'], ['d5']));
      const summary = session.getSummary();

      expect(summary.gameId).toBe('game-1');
      expect(summary.turn).toBe('black');
      expect(summary.board.e4).toEqual({ type: 'pawn', color: 'white' });
    });

    it('refuses new sessions at capacity', () => {
      manager.createSession();
      manager.createSession();

      expect(() => manager.createSession()).toThrow('Active game limit of 2 reached');
      expect(manager.size).toBe(2);
    });

    it('frees capacity when a session is removed', () => {
      manager.createSession();
      manager.createSession();

      expect(manager.removeSession('game-1')).toBe(true);
      expect(manager.removeSession('game-1')).toBe(false);
      expect(manager.createSession().gameId).toBe('game-3');
    });

    it('throws GameNotFoundError for unknown ids', () => {
      let caught: unknown;
      try {
        manager.requireSession('missing');
      } catch (error) {
        caught = error;
      }

      expect(isGameError(caught)).toBe(true);
      if (isGameError(caught)) {
        expect(caught.code).toBe(GameErrorCode.GAME_NOT_FOUND);
        expect(caught.httpStatus).toBe(404);
      }
    });
  });

  describe('withGameLock', () => {
    it('runs operations on the same game one at a time in arrival order', async () => {
      const events: string[] = [];
      let releaseFirst: () => void = () => undefined;
      const firstGate = new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });

      const first = manager.withGameLock('game-1', async () => {
        events.push('first:start');
        await firstGate;
        events.push('first:end');
        return 1;
      });
      const second = manager.withGameLock('game-1', () => {
        events.push('second');
        return 2;
      });

      await tick();
      expect(events).toEqual(['first:start']);

      releaseFirst();
      await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
      expect(events).toEqual(['first:start', 'first:end', 'second']);
    });

    it('does not hold up other games', async () => {
      const events: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const slow = manager.withGameLock('game-1', async () => {
        await gate;
        events.push('game-1');
      });
      await manager.withGameLock('game-2', () => {
        events.push('game-2');
      });

      expect(events).toEqual(['game-2']);
      release();
      await slow;
      expect(events).toEqual(['game-2', 'game-1']);
    });

    it('releases the lock when an operation fails', async () => {
      const failing = manager.withGameLock('game-1', () => {
        throw new Error('boom');
      });

      await expect(failing).rejects.toThrow('boom');
      await expect(manager.withGameLock('game-1', () => 'next')).resolves.toBe('next');
    });

    it('serializes concurrent moves so only one of two identical moves succeeds', async () => {
      const session = manager.createSession();

      const attempts = await Promise.allSettled([
        manager.withGameLock(session.gameId, () => session.applyMove('e2', 'e4')),
        manager.withGameLock(session.gameId, () => session.applyMove('e2', 'e4')),
      ]);

      expect(attempts.map((attempt) => attempt.status)).toEqual(['fulfilled', 'rejected']);
      expect(session.getSummary().turn).toBe('black');
    });
  });
});
