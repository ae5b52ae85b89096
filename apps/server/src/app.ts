// apps/server/src/app.ts
//
// HTTP surface: thin Express routes over HangmanService.
//
// Bodies and queries are validated with the @hangman/protocol schemas
// (400 + zod's formatted error on failure). Core errors map to statuses in
// the error middleware; anything unexpected is logged and answered with 500.
//
// Routes:
//   POST   /api/user                      create a user
//   GET    /api/user/rankings             user rankings
//   POST   /api/game                      new game
//   GET    /api/game/:key                 game state
//   PUT    /api/game/:key                 make a move
//   PUT    /api/game/:key/next_level      start the next level
//   DELETE /api/game/:key                 cancel an unfinished game
//   GET    /api/game/:key/history         move history
//   GET    /api/games/user/:userName      a user's games (?completed=true)
//   GET    /api/games/average_attempts    average attempts remaining
//   GET    /api/scores/high_scores        best finished games (?numberOfResults=)

import express, {
  type ErrorRequestHandler,
  type Request,
  type RequestHandler,
  type Response,
} from 'express';
import cors from 'cors';
import { GameError, type GameErrorCode } from '@hangman/game-core';
import {
  createUserReq,
  highScoresQuery,
  moveReq,
  newGameReq,
  userGamesQuery,
  type ErrorRes,
} from '@hangman/protocol';

import type { Logger } from './logger.js';
import type { HangmanService } from './service.js';

export interface AppOptions {
  service: HangmanService;
  log: Logger;
  corsOrigin?: string;
}

const STATUS: Record<GameErrorCode, number> = {
  VALIDATION: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
};

/**
 * Errors raised by Express middleware for a bad request (e.g. body-parser's
 * `entity.parse.failed`) carry a 4xx `status`.
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

const isParseFailure = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';

/** Forwards a rejected handler promise to the error middleware. */
const handle =
  (fn: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    fn(req, res).catch(next);
  };

export function createApp({ service, log, corsOrigin }: AppOptions) {
  const app = express();
  app.use(cors(corsOrigin ? { origin: corsOrigin } : undefined));
  app.use(express.json());

  /* ------------------------------------------------------------------------ */
  /*                                  Users                                   */
  /* ------------------------------------------------------------------------ */

  app.post(
    '/api/user',
    handle(async (req, res) => {
      const parsed = createUserReq.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json(parsed.error.format());
        return;
      }
      const { userName, email } = parsed.data;
      res.status(201).json(await service.createUser(userName, email));
    }),
  );

  app.get(
    '/api/user/rankings',
    handle(async (_req, res) => {
      res.json(await service.userRankings());
    }),
  );

  /* ------------------------------------------------------------------------ */
  /*                                  Games                                   */
  /* ------------------------------------------------------------------------ */

  app.post(
    '/api/game',
    handle(async (req, res) => {
      const parsed = newGameReq.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json(parsed.error.format());
        return;
      }
      res.status(201).json(await service.newGame(parsed.data));
    }),
  );

  app.get(
    '/api/game/:key',
    handle(async (req, res) => {
      res.json(await service.getGame(req.params.key));
    }),
  );

  app.put(
    '/api/game/:key',
    handle(async (req, res) => {
      const parsed = moveReq.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json(parsed.error.format());
        return;
      }
      res.json(await service.makeMove(req.params.key, parsed.data.guess));
    }),
  );

  app.put(
    '/api/game/:key/next_level',
    handle(async (req, res) => {
      res.json(await service.nextLevel(req.params.key));
    }),
  );

  app.delete(
    '/api/game/:key',
    handle(async (req, res) => {
      res.json(await service.cancelGame(req.params.key));
    }),
  );

  app.get(
    '/api/game/:key/history',
    handle(async (req, res) => {
      res.json(await service.gameHistory(req.params.key));
    }),
  );

  app.get(
    '/api/games/user/:userName',
    handle(async (req, res) => {
      const parsed = userGamesQuery.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json(parsed.error.format());
        return;
      }
      res.json(await service.userGames(req.params.userName, parsed.data.completed));
    }),
  );

  app.get(
    '/api/games/average_attempts',
    handle(async (_req, res) => {
      res.json(await service.averageAttempts());
    }),
  );

  /* ------------------------------------------------------------------------ */
  /*                                  Scores                                  */
  /* ------------------------------------------------------------------------ */

  app.get(
    '/api/scores/high_scores',
    handle(async (req, res) => {
      const parsed = highScoresQuery.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json(parsed.error.format());
        return;
      }
      res.json(await service.highScores(parsed.data.numberOfResults));
    }),
  );

  /* ------------------------------------------------------------------------ */
  /*                                  Errors                                  */
  /* ------------------------------------------------------------------------ */

  const onError: ErrorRequestHandler = (err, req, res, _next) => {
    if (err instanceof GameError) {
      const body: ErrorRes = { error: err.message, code: err.code };
      res.status(STATUS[err.code]).json(body);
      return;
    }
    const status = clientErrorStatus(err);
    if (status !== undefined) {
      log.warn({ status, method: req.method, url: req.originalUrl }, 'bad request');
      const body: ErrorRes = { error: isParseFailure(err) ? 'Malformed JSON body' : 'Bad request' };
      res.status(status).json(body);
      return;
    }
    log.error({ err, method: req.method, url: req.originalUrl }, 'request failed');
    const body: ErrorRes = { error: 'Internal server error' };
    res.status(500).json(body);
  };
  app.use(onError);

  return app;
}
