// apps/server/src/store.ts
//
// Storage collaborator for the service layer.
//
// The core only needs get/put/delete by key plus a handful of equality
// queries, so any transactional key-value or relational store can back
// `Store`. `MemoryStore` keeps everything in Maps (state is lost on
// restart) and hands out copies, so callers never alias stored entities.

import { ConflictError, type Game, type Level, type User, type Word } from '@hangman/game-core';

export interface GameFilter {
  userKey?: string;
  gameOver?: boolean;
}

export interface Store {
  getUser(key: string): Promise<User | undefined>;
  findUserByName(name: string): Promise<User | undefined>;
  /** Rejects with `ConflictError` when another user already holds the name. */
  putUser(user: User): Promise<void>;
  listUsers(): Promise<User[]>;

  getGame(key: string): Promise<Game | undefined>;
  putGame(game: Game): Promise<void>;
  deleteGame(key: string): Promise<void>;
  listGames(filter?: GameFilter): Promise<Game[]>;

  getLevel(key: string): Promise<Level | undefined>;
  putLevel(level: Level): Promise<void>;
  listLevels(gameKey: string): Promise<Level[]>;
  deleteLevels(gameKey: string): Promise<void>;

  getWord(key: string): Promise<Word | undefined>;
  listWords(): Promise<Word[]>;
  putWords(words: readonly Word[]): Promise<void>;
}

const copyLevel = (l: Level): Level => ({ ...l, guesses: [...l.guesses] });

export class MemoryStore implements Store {
  private readonly users = new Map<string, User>();
  private readonly games = new Map<string, Game>();
  private readonly levels = new Map<string, Level>();
  private readonly words = new Map<string, Word>();

  async getUser(key: string) {
    const u = this.users.get(key);
    return u && { ...u };
  }

  async findUserByName(name: string) {
    for (const u of this.users.values()) if (u.name === name) return { ...u };
    return undefined;
  }

  async putUser(user: User) {
    for (const u of this.users.values()) {
      if (u.name === user.name && u.key !== user.key) {
        throw new ConflictError('A User with that name already exists!');
      }
    }
    this.users.set(user.key, { ...user });
  }

  async listUsers() {
    return [...this.users.values()].map((u) => ({ ...u }));
  }

  async getGame(key: string) {
    const g = this.games.get(key);
    return g && { ...g };
  }

  async putGame(game: Game) {
    this.games.set(game.key, { ...game });
  }

  async deleteGame(key: string) {
    this.games.delete(key);
  }

  async listGames(filter: GameFilter = {}) {
    return [...this.games.values()]
      .filter(
        (g) =>
          (filter.userKey === undefined || g.userKey === filter.userKey) &&
          (filter.gameOver === undefined || g.gameOver === filter.gameOver),
      )
      .map((g) => ({ ...g }));
  }

  async getLevel(key: string) {
    const l = this.levels.get(key);
    return l && copyLevel(l);
  }

  async putLevel(level: Level) {
    this.levels.set(level.key, copyLevel(level));
  }

  async listLevels(gameKey: string) {
    return [...this.levels.values()]
      .filter((l) => l.gameKey === gameKey)
      .map(copyLevel);
  }

  async deleteLevels(gameKey: string) {
    for (const [key, l] of this.levels) {
      if (l.gameKey === gameKey) this.levels.delete(key);
    }
  }

  async getWord(key: string) {
    const w = this.words.get(key);
    return w && { ...w };
  }

  async listWords() {
    return [...this.words.values()].map((w) => ({ ...w }));
  }

  async putWords(words: readonly Word[]) {
    for (const w of words) this.words.set(w.key, { ...w });
  }
}
