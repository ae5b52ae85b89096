// apps/server/src/service.ts
//
// HangmanService: fetch → core transition → persist, one request at a time.
//
// Every operation reads the entities it needs from the Store, hands them to
// the pure functions in @hangman/game-core, writes back whatever changed and
// renders a protocol view. Concurrent moves on the same game are expected to
// be serialized by the store; nothing here holds state between calls.

import { nanoid } from 'nanoid';
import {
  ConflictError,
  NotFoundError,
  WordBank,
  assertAttemptsAllowed,
  averageAttemptsRemaining,
  cancelGame,
  describeGame,
  gameHistory,
  highScores,
  makeMove,
  maskWord,
  nextLevelBlocked,
  normalizeGuess,
  rankUsers,
  startGame,
  startNextLevel,
  welcomeMessage,
  type Game,
  type GameState,
  type Level,
  type Random,
  type User,
  type Word,
} from '@hangman/game-core';
import {
  averageAttemptsRes,
  cancelRes,
  gameRes,
  gamesRes,
  historyRes,
  rankingsRes,
  scoresRes,
  userRes,
  type AverageAttemptsRes,
  type CancelRes,
  type GameRes,
  type GamesRes,
  type HistoryRes,
  type NewGameReq,
  type RankingsRes,
  type ScoresRes,
  type UserRes,
} from '@hangman/protocol';

import type { Logger } from './logger.js';
import type { Store } from './store.js';

export interface ServiceOptions {
  store: Store;
  log: Logger;
  /** Word selection randomness; Math.random by default. */
  random?: Random;
  /** Clock used for game dates. */
  now?: () => Date;
  /** Entity key generator; nanoid by default. */
  newKey?: () => string;
}

/** Present for every stored entity reference; missing means corrupt data. */
function required<T>(value: T | undefined, what: string): T {
  if (value === undefined) throw new Error(`${what} is missing from the store`);
  return value;
}

const toUserRes = (u: User): UserRes =>
  userRes.parse({
    userName: u.name,
    email: u.email,
    totalScore: u.totalScore,
    totalPlayed: u.totalPlayed,
    averageScore: u.averageScore,
  });

export class HangmanService {
  private readonly store: Store;
  private readonly log: Logger;
  private readonly random: Random;
  private readonly now: () => Date;
  private readonly newKey: () => string;

  constructor(opts: ServiceOptions) {
    this.store = opts.store;
    this.log = opts.log;
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? (() => new Date());
    this.newKey = opts.newKey ?? (() => nanoid());
  }

  /* ------------------------------------------------------------------------ */
  /*                                  Users                                   */
  /* ------------------------------------------------------------------------ */

  async createUser(name: string, email?: string): Promise<UserRes> {
    if (await this.store.findUserByName(name)) {
      throw new ConflictError('A User with that name already exists!');
    }
    const user = await this.insertUser(name, email);
    return toUserRes(user);
  }

  async userRankings(): Promise<RankingsRes> {
    const users = rankUsers(await this.store.listUsers());
    return rankingsRes.parse({
      items: users.map((u) => ({
        userName: u.name,
        totalScore: u.totalScore,
        totalPlayed: u.totalPlayed,
        averageScore: u.averageScore,
      })),
    });
  }

  /* ------------------------------------------------------------------------ */
  /*                                  Games                                   */
  /* ------------------------------------------------------------------------ */

  /** Starts a game, creating the user on first sight of the name. */
  async newGame(req: NewGameReq): Promise<GameRes> {
    assertAttemptsAllowed(req.attemptsAllowed);
    const user = await this.userNamed(req.userName, req.email);

    const word = await this.pickWordFor(user.key);
    const { game, level } = startGame({
      gameKey: this.newKey(),
      levelKey: this.newKey(),
      user,
      attemptsAllowed: req.attemptsAllowed,
      word,
      date: this.now().toISOString().slice(0, 10),
    });
    await this.store.putGame(game);
    await this.store.putLevel(level);
    this.log.info({ game: game.key, user: user.name }, 'game created');

    return this.view({ game, level, word, user }, welcomeMessage(user.name));
  }

  async getGame(key: string): Promise<GameRes> {
    const state = await this.loadState(key);
    return this.view(state, describeGame(state.game, state.level, state.user.name));
  }

  async makeMove(key: string, rawGuess: string): Promise<GameRes> {
    const guess = normalizeGuess(rawGuess);
    const state = await this.loadState(key);
    const outcome = makeMove(state, guess);
    if (outcome.status === 'rejected') return this.view(state, outcome.message);

    await this.store.putLevel(outcome.level);
    await this.store.putGame(outcome.game);
    let { user } = state;
    if (outcome.user) {
      user = outcome.user;
      await this.store.putUser(user);
    }

    if (outcome.result === 'won') {
      this.log.info(
        { game: key, level: outcome.level.levelNumber, score: outcome.game.score },
        'level won',
      );
    } else if (outcome.result === 'lost') {
      this.log.info({ game: key, score: outcome.game.score }, 'game over');
    }

    return this.view(
      { game: outcome.game, level: outcome.level, word: state.word, user },
      outcome.message,
    );
  }

  async nextLevel(key: string): Promise<GameRes> {
    const state = await this.loadState(key);
    const blocked = nextLevelBlocked(state.game, state.level);
    if (blocked) return this.view(state, blocked.message);

    const word = await this.pickWordFor(state.user.key);
    const outcome = startNextLevel(state.game, state.level, {
      levelKey: this.newKey(),
      word,
      userName: state.user.name,
    });
    if (outcome.status === 'rejected') return this.view(state, outcome.message);

    await this.store.putLevel(outcome.level);
    await this.store.putGame(outcome.game);
    this.log.info({ game: key, level: outcome.level.levelNumber }, 'next level');

    return this.view(
      { game: outcome.game, level: outcome.level, word, user: state.user },
      outcome.message,
    );
  }

  /** Deletes an unfinished game and all its levels. */
  async cancelGame(key: string): Promise<CancelRes> {
    const game = await this.loadGame(key);
    const outcome = cancelGame(game);
    if (outcome.status === 'rejected') {
      const state = await this.loadState(key);
      return cancelRes.parse({
        deleted: false,
        message: outcome.message,
        game: this.view(state, outcome.message),
      });
    }

    await this.store.deleteLevels(key);
    await this.store.deleteGame(key);
    this.log.info({ game: key }, 'game cancelled');
    return cancelRes.parse({ deleted: true, message: outcome.message });
  }

  /** Active (or, with `completed`, finished) games of a user. */
  async userGames(userName: string, completed: boolean): Promise<GamesRes> {
    const user = await this.store.findUserByName(userName);
    if (!user) throw new NotFoundError('A User with that name does not exist!');

    const games = await this.store.listGames({ userKey: user.key, gameOver: completed });
    const items: GameRes[] = [];
    for (const game of games) {
      const state = await this.stateOf(game, user);
      items.push(this.view(state, ''));
    }
    return gamesRes.parse({ items });
  }

  async gameHistory(key: string): Promise<HistoryRes> {
    const game = await this.loadGame(key);
    const user = required(await this.store.getUser(game.userKey), `user ${game.userKey}`);
    const levels = await this.store.listLevels(key);

    const words = new Map<string, Word>();
    for (const level of levels) {
      if (!words.has(level.wordKey)) {
        words.set(
          level.wordKey,
          required(await this.store.getWord(level.wordKey), `word ${level.wordKey}`),
        );
      }
    }

    return historyRes.parse({
      urlsafeKey: game.key,
      userName: user.name,
      date: game.date,
      score: game.score,
      moves: gameHistory(levels, words),
    });
  }

  /* ------------------------------------------------------------------------ */
  /*                                  Scores                                  */
  /* ------------------------------------------------------------------------ */

  async highScores(limit?: number): Promise<ScoresRes> {
    const best = highScores(await this.store.listGames({ gameOver: true }), limit);
    const items: ScoresRes['items'] = [];
    for (const game of best) {
      const user = required(await this.store.getUser(game.userKey), `user ${game.userKey}`);
      items.push({ userName: user.name, date: game.date, score: game.score });
    }
    return scoresRes.parse({ items });
  }

  /** Mean attempts remaining on the current level of every unfinished game. */
  async averageAttempts(): Promise<AverageAttemptsRes> {
    const active = await this.store.listGames({ gameOver: false });
    const levels: Level[] = [];
    for (const game of active) {
      levels.push(
        required(await this.store.getLevel(game.currentLevelKey), `level ${game.currentLevelKey}`),
      );
    }
    return averageAttemptsRes.parse({
      averageAttemptsRemaining: averageAttemptsRemaining(levels),
    });
  }

  /* ------------------------------------------------------------------------ */
  /*                                 Helpers                                  */
  /* ------------------------------------------------------------------------ */

  private async insertUser(name: string, email?: string): Promise<User> {
    const user: User = {
      key: this.newKey(),
      name,
      email,
      totalScore: 0,
      totalPlayed: 0,
      averageScore: 0,
    };
    await this.store.putUser(user);
    this.log.info({ user: name }, 'user created');
    return user;
  }

  /** The user with this name, created if there is none yet. */
  private async userNamed(name: string, email?: string): Promise<User> {
    const existing = await this.store.findUserByName(name);
    if (existing) return existing;
    try {
      return await this.insertUser(name, email);
    } catch (err) {
      // another request created the same name in between
      if (!(err instanceof ConflictError)) throw err;
      return required(await this.store.findUserByName(name), `user ${name}`);
    }
  }

    /** A word the user has not played yet, if any remain. */
  private async pickWordFor(userKey: string): Promise<Word> {
    const bank = new WordBank(await this.store.listWords(), this.random);
    const used: string[] = [];
    for (const game of await this.store.listGames({ userKey })) {
      for (const level of await this.store.listLevels(game.key)) used.push(level.wordKey);
    }
    return bank.unusedWordFor(used);
  }

  private async loadGame(key: string): Promise<Game> {
    const game = await this.store.getGame(key);
    if (!game) throw new NotFoundError('Game not found!');
    return game;
  }

  private async loadState(key: string): Promise<GameState> {
    const game = await this.loadGame(key);
    const user = required(await this.store.getUser(game.userKey), `user ${game.userKey}`);
    return this.stateOf(game, user);
  }

  private async stateOf(game: Game, user: User): Promise<GameState> {
    const level = required(
      await this.store.getLevel(game.currentLevelKey),
      `level ${game.currentLevelKey}`,
    );
    const word = required(await this.store.getWord(level.wordKey), `word ${level.wordKey}`);
    return { game, level, word, user };
  }

  private view({ game, level, word, user }: GameState, message: string): GameRes {
    return gameRes.parse({
      urlsafeKey: game.key,
      userName: user.name,
      gameOver: game.gameOver,
      message,
      // the answer is revealed once the game is over
      guessedWord: game.gameOver ? word.name : maskWord(word.name, level.guesses),
      guesses: level.guesses,
      clue: word.clue,
      date: game.date,
      score: game.score,
      levelNumber: level.levelNumber,
      levelComplete: level.complete,
      attemptsRemaining: level.attemptsRemaining,
    });
  }
}
