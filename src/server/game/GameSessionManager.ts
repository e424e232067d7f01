import { randomUUID } from 'crypto';
import { GameSession } from './GameSession';
import { logger } from '../utils/logger';
import { config } from '../config';
import { GameLimitReachedError, GameNotFoundError } from '../../shared/errors';
import type { SavedGame } from '../../shared/engine';

export interface GameSessionManagerOptions {
  /** Upper bound on sessions held at once (defaults to MAX_ACTIVE_GAMES). */
  maxActiveGames?: number;
  /** Id generator, overridable in tests. */
  generateId?: () => string;
}

/**
 * In-memory registry of live games.
 *
 * Games live only as long as the process; `save` and `load` on the HTTP
 * surface are how a client keeps one across restarts.
 */
export class GameSessionManager {
  private sessions: Map<string, GameSession> = new Map();
  private locks: Map<string, Promise<void>> = new Map();
  private readonly maxActiveGames: number;
  private readonly generateId: () => string;

  constructor(options: GameSessionManagerOptions = {}) {
    this.maxActiveGames = options.maxActiveGames ?? config.games.maxActive;
    this.generateId = options.generateId ?? randomUUID;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * @throws GameLimitReachedError when the registry is full
   */
  public createSession(): GameSession {
    const gameId = this.reserveId();
    const session = GameSession.create(gameId);
    this.sessions.set(gameId, session);
    return session;
  }

  /**
   * Register a game restored from its saved form under a fresh id.
   *
   * @throws GameLimitReachedError when the registry is full
   * @throws GameError when the saved game cannot be restored
   */
  public loadSession(saved: SavedGame): GameSession {
    const gameId = this.reserveId();
    const session = GameSession.fromSaved(gameId, saved);
    this.sessions.set(gameId, session);
    return session;
  }

  public getSession(gameId: string): GameSession | undefined {
    return this.sessions.get(gameId);
  }

  /**
   * @throws GameNotFoundError for an unknown id
   */
  public requireSession(gameId: string): GameSession {
    const session = this.sessions.get(gameId);
    if (!session) {
      throw new GameNotFoundError(gameId);
    }
    return session;
  }

  public removeSession(gameId: string): boolean {
    const removed = this.sessions.delete(gameId);
    if (removed) {
      logger.info('GameSession removed', { gameId });
    }
    return removed;
  }

  /**
   * Execute an operation with an exclusive lock on the gameId.
   *
   * Operations on the same game run one after another in arrival order, so
   * two concurrent moves can never both see the same turn. Operations on
   * different games do not wait for each other. A failing operation releases
   * the lock for the next one.
   */
  public async withGameLock<T>(gameId: string, operation: () => Promise<T> | T): Promise<T> {
    const previous = this.locks.get(gameId) ?? Promise.resolve();
    const run = previous.then(operation);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(gameId, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(gameId) === tail) {
        this.locks.delete(gameId);
      }
    }
  }

  private reserveId(): string {
    if (this.sessions.size >= this.maxActiveGames) {
      logger.warn('Active game limit reached', {
        activeGames: this.sessions.size,
        limit: this.maxActiveGames,
      });
      throw new GameLimitReachedError(this.maxActiveGames);
    }
    return this.generateId();
  }
}
