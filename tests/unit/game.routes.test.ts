/**
 * HTTP route tests for the game service, driven in-process with supertest.
 */

import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../src/server/app';
import { GameSessionManager } from '../../src/server/game/GameSessionManager';
import { sparseGame } from '../utils/fixtures';

const MISSING_ID = '00000000-0000-4000-8000-000000000000';

describe('game routes', () => {
  let app: Express;
  let manager: GameSessionManager;

  beforeEach(() => {
    manager = new GameSessionManager({ maxActiveGames: 3 });
    app = createApp({ manager });
  });

  async function createGame(): Promise<string> {
    const res = await request(app).post('/api/games').expect(201);
    return res.body.data.game.gameId;
  }

  describe('POST /api/games', () => {
    it('creates a game in the starting position', async () => {
      const res = await request(app).post('/api/games').expect(201);

      expect(res.body.success).toBe(true);
      expect(res.body.data.game).toMatchObject({ turn: 'white', gameState: 'UNFINISHED', winner: null, moves: [] });
      expect(res.body.data.game.board.e1).toEqual({ type: 'king', color: 'white' });
      expect(manager.size).toBe(1);
    });

    it('answers 503 once the game limit is reached', async () => {
      await createGame();
      await createGame();
      await createGame();

      const res = await request(app).post('/api/games').expect(503);
      expect(res.body.error.code).toBe('GAME_LIMIT_REACHED');
      expect(res.body.error.message).toBe('Active game limit of 3 reached');
    });
  });

  describe('POST /api/games/:gameId/moves', () => {
    it('applies a legal move', async () => {
      const gameId = await createGame();

      const res = await request(app).post(`/api/games/${gameId}/moves`).send({ from: 'e2', to: 'e4' }).expect(200);

      expect(res.body.data.outcome).toBe('moved');
      expect(res.body.data.notation).toBe('e2-e4');
      expect(res.body.data.game.turn).toBe('black');
      expect(res.body.data.game.board.e4).toEqual({ type: 'pawn', color: 'white' });
    });

    it('answers 400 MOVE_INVALID for an illegal move', async () => {
      const gameId = await createGame();

      const res = await request(app).post(`/api/games/${gameId}/moves`).send({ from: 'e2', to: 'e5' }).expect(400);

      expect(res.body).toMatchObject({
        success: false,
        error: { code: 'MOVE_INVALID', message: 'Illegal move e2-e5: e5 is out of range for pawn' },
      });
    });

    it('answers 403 MOVE_NOT_YOUR_TURN when the wrong side moves', async () => {
      const gameId = await createGame();

      const res = await request(app).post(`/api/games/${gameId}/moves`).send({ from: 'e7', to: 'e5' }).expect(403);

      expect(res.body.error.code).toBe('MOVE_NOT_YOUR_TURN');
      expect(res.body.error.message).toBe('Not your turn. Expected white, got black');
    });

    it('reports an off-board square as an illegal move', async () => {
      const gameId = await createGame();

      const res = await request(app).post(`/api/games/${gameId}/moves`).send({ from: 'e2', to: 'e9' }).expect(400);

      expect(res.body.error.code).toBe('MOVE_INVALID');
      expect(res.body.error.message).toBe('Illegal move e2-e9: coordinate is off the board');
    });

    it('answers 400 INVALID_REQUEST for a body without coordinates', async () => {
      const gameId = await createGame();

      const res = await request(app).post(`/api/games/${gameId}/moves`).send({ from: 'e2' }).expect(400);

      expect(res.body.error.code).toBe('INVALID_REQUEST');
      expect(res.body.error.message).toBe('to: Required');
    });

    it('answers 400 for a body that is not JSON', async () => {
      const gameId = await createGame();

      const res = await request(app)
        .post(`/api/games/${gameId}/moves`)
        .set('Content-Type', 'application/json')
        .send('{"from": "e2",')
        .expect(400);

      expect(res.body.error.code).toBe('INVALID_REQUEST');
    });

    it('answers 413 PAYLOAD_TOO_LARGE for an oversized body', async () => {
      const gameId = await createGame();

      const res = await request(app)
        .post(`/api/games/${gameId}/moves`)
        .send({ from: 'e2', to: 'e4', note: 'x'.repeat(20_000) })
        .expect(413);

      expect(res.body.error).toMatchObject({ code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' });
    });

    it('announces the winner and answers 409 afterwards', async () => {
      const loaded = await request(app)
        .post('/api/games/load')
        .send(sparseGame('White', ['e4'], ['d5']))
        .expect(201);
      const gameId: string = loaded.body.data.game.gameId;

      const win = await request(app).post(`/api/games/${gameId}/moves`).send({ from: 'e4', to: 'd5' }).expect(200);
      expect(win.body.data).toMatchObject({
        outcome: 'captured',
        captured: { type: 'pawn', color: 'black' },
        notation: 'e4xd5#',
        game: { gameState: 'WHITE_WON', winner: 'white', turn: 'white' },
      });

      const after = await request(app).post(`/api/games/${gameId}/moves`).send({ from: 'e8', to: 'e7' }).expect(409);
      expect(after.body.error.code).toBe('GAME_ALREADY_COMPLETED');

      await request(app).get(`/api/games/${gameId}/save`).expect(409);
    });
  });

  describe('reads', () => {
    it('returns the game with its move list', async () => {
      const gameId = await createGame();
      await request(app).post(`/api/games/${gameId}/moves`).send({ from: 'g1', to: 'f3' }).expect(200);

      const res = await request(app).get(`/api/games/${gameId}`).expect(200);

      expect(res.body.data.game).toMatchObject({ gameId, turn: 'black', moves: ['g1-f3'] });
    });

    it('renders the board as plain text', async () => {
      const gameId = await createGame();

      const res = await request(app).get(`/api/games/${gameId}/board`).expect(200);

      expect(res.headers['content-type']).toBe('text/plain; charset=utf-8');
      const lines = res.text.split('\n');
      expect(lines[0]).toBe('   a  b  c  d  e  f  g  h');
      expect(lines[1]).toBe('8 RB NB BB QB KB BB NB RB 8');
      expect(lines[8]).toBe('1 RW NW BW QW KW BW NW RW 1');
    });

    it('lists the legal moves for the side to move', async () => {
      const gameId = await createGame();

      const res = await request(app).get(`/api/games/${gameId}/moves`).expect(200);

      expect(res.body.data.turn).toBe('white');
      expect(res.body.data.moves).toHaveLength(20);
      expect(res.body.data.moves[0]).toEqual({ from: 'a2', to: 'a3', captures: null });
    });

    it('answers 404 for an unknown game', async () => {
      const res = await request(app).get(`/api/games/${MISSING_ID}`).expect(404);

      expect(res.body.error.code).toBe('GAME_NOT_FOUND');
      expect(res.body.error.message).toBe(`Game not found: ${MISSING_ID}`);
    });

    it('answers 400 for a game id that is not a UUID', async () => {
      const res = await request(app).get('/api/games/not-a-uuid').expect(400);

      expect(res.body.error.code).toBe('INVALID_GAME_ID');
    });
  });

  describe('save and load', () => {
    it('round-trips a game through save and load', async () => {
      const gameId = await createGame();
      await request(app).post(`/api/games/${gameId}/moves`).send({ from: 'e2', to: 'e4' }).expect(200);

      const saved = await request(app).get(`/api/games/${gameId}/save`).expect(200);
      expect(saved.body.data.saved[0]).toBe('Black');
      expect(saved.body.data.saved[1][4]).toEqual(['Pawn', 'e4']);

      const loaded = await request(app).post('/api/games/load').send(saved.body.data.saved).expect(201);
      const original = await request(app).get(`/api/games/${gameId}`).expect(200);

      expect(loaded.body.data.game.gameId).not.toBe(gameId);
      expect(loaded.body.data.game.turn).toBe('black');
      expect(loaded.body.data.game.board).toEqual(original.body.data.game.board);
    });

    it('answers 400 INVALID_REQUEST for a malformed saved game', async () => {
      const res = await request(app)
        .post('/api/games/load')
        .send(['Green', [], []])
        .expect(400);

      expect(res.body.error.code).toBe('INVALID_REQUEST');
    });

    it('answers 400 GAME_INVALID_STATE for a save that cannot be placed', async () => {
      const res = await request(app)
        .post('/api/games/load')
        .send(sparseGame('White', ['e4'], ['e4']))
        .expect(400);

      expect(res.body.error.code).toBe('GAME_INVALID_STATE');
      expect(res.body.error.message).toBe('Invalid saved game: two pieces share e4');
    });
  });

  describe('DELETE /api/games/:gameId', () => {
    it('removes the game', async () => {
      const gameId = await createGame();

      await request(app).delete(`/api/games/${gameId}`).expect(204);
      await request(app).get(`/api/games/${gameId}`).expect(404);
      await request(app).delete(`/api/games/${gameId}`).expect(404);
    });
  });

  describe('service plumbing', () => {
    it('reports health', async () => {
      await createGame();

      const res = await request(app).get('/health').expect(200);

      expect(res.body).toMatchObject({ status: 'ok', service: 'elimination-chess-api', activeGames: 1 });
    });

    it('echoes a client request id and generates one otherwise', async () => {
      const echoed = await request(app).get('/health').set('X-Request-Id', 'req-test-1').expect(200);
      expect(echoed.headers['x-request-id']).toBe('req-test-1');

      const generated = await request(app).get('/health').expect(200);
      expect(generated.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('sends the API security headers', async () => {
      const res = await request(app).get('/health').expect(200);

      expect(res.headers['x-frame-options']).toBe('DENY');
      expect(res.headers['x-content-type-options']).toBe('nosniff');
      expect(res.headers['referrer-policy']).toBe('no-referrer');
      expect(res.headers['content-security-policy']).toContain("default-src 'none'");
      expect(res.headers['strict-transport-security']).toBeUndefined();
      expect(res.headers['x-powered-by']).toBeUndefined();
    });

    it('answers 404 NOT_FOUND for unknown routes', async () => {
      const res = await request(app).get('/api/unknown').expect(404);

      expect(res.body.error).toMatchObject({ code: 'NOT_FOUND', message: 'Route /api/unknown not found' });
    });
  });
});
