// apps/server/src/__tests__/app.test.ts
//
// HTTP routes end to end, against an in-process server on an ephemeral
// loopback port.

import type { Server } from 'node:http';
import pino from 'pino';
import type { Word } from '@hangman/game-core';

import { createApp } from '../app.js';
import { HangmanService } from '../service.js';
import { MemoryStore, type Store } from '../store.js';

const words: Word[] = [
  { key: 'w-cat', name: 'CAT', clue: 'Says meow' },
  { key: 'w-dog', name: 'DOG', clue: 'Says woof' },
];

let server: Server;
let base: string;
let store: Store;

beforeEach(async () => {
  store = new MemoryStore();
  await store.putWords(words);
  const log = pino({ level: 'silent' });
  const service = new HangmanService({ store, log, random: () => 0 });
  server = createApp({ service, log }).listen(0, '127.0.0.1');
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('not listening on TCP');
  base = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  await new Promise<void>((resolve, reject) =>
    server.close((err) => (err ? reject(err) : resolve())),
  );
});

async function call(method: string, path: string, body?: unknown) {
  const res = await fetch(`${base}${path}`, {
    method,
    headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  return { status: res.status, body: await res.json() };
}

describe('hangman API', () => {
  it('creates users and rejects duplicates with 409', async () => {
    const created = await call('POST', '/api/user', { userName: 'alice' });
    expect(created).toEqual({
      status: 201,
      body: { userName: 'alice', totalScore: 0, totalPlayed: 0, averageScore: 0 },
    });
    const again = await call('POST', '/api/user', { userName: 'alice' });
    expect(again).toEqual({
      status: 409,
      body: { error: 'A User with that name already exists!', code: 'CONFLICT' },
    });
  });

  it('plays a game over HTTP', async () => {
    const created = await call('POST', '/api/game', { userName: 'alice', attemptsAllowed: 2 });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ guessedWord: '___', clue: 'Says meow', attemptsRemaining: 2 });
    const key: string = created.body.urlsafeKey;

    const move = await call('PUT', `/api/game/${key}`, { guess: 'cat' });
    expect(move.body).toMatchObject({ guessedWord: 'CAT', levelComplete: true, score: 2 });

    const next = await call('PUT', `/api/game/${key}/next_level`);
    expect(next.body).toMatchObject({ levelNumber: 2, clue: 'Says woof' });

    const fetched = await call('GET', `/api/game/${key}`);
    expect(fetched.body).toMatchObject({ levelNumber: 2, message: 'Make your move, alice!' });

    const history = await call('GET', `/api/game/${key}/history`);
    expect(history.body.moves).toEqual([
      { level: 1, guess: 'CAT', guessedWord: 'CAT', correct: true },
    ]);

    const games = await call('GET', '/api/games/user/alice');
    expect(games.body.items).toHaveLength(1);
  });

  it('answers 400 for a malformed body or guess', async () => {
    const bad = await call('POST', '/api/game', { userName: 'alice', attemptsAllowed: 12 });
    expect(bad.status).toBe(400);

    const { body } = await call('POST', '/api/game', { userName: 'alice' });
    const wrongLength = await call('PUT', `/api/game/${body.urlsafeKey}`, { guess: 'ca' });
    expect(wrongLength).toEqual({
      status: 400,
      body: { error: 'Guess 1 letter or the whole word!', code: 'VALIDATION' },
    });
    const notLetters = await call('PUT', `/api/game/${body.urlsafeKey}`, { guess: '12' });
    expect(notLetters.status).toBe(400);
  });

  it('answers 400 for a body that is not valid JSON', async () => {
    const res = await fetch(`${base}/api/game`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"userName":',
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Malformed JSON body' });
  });

  it('answers 404 for unknown games and users', async () => {
    expect((await call('GET', '/api/game/missing')).status).toBe(404);
    expect((await call('GET', '/api/games/user/nobody')).status).toBe(404);
  });

  it('cancels an unfinished game', async () => {
    const { body } = await call('POST', '/api/game', { userName: 'alice' });
    const res = await call('DELETE', `/api/game/${body.urlsafeKey}`);
    expect(res).toEqual({ status: 200, body: { deleted: true, message: 'Game deleted.' } });
    expect((await call('GET', `/api/game/${body.urlsafeKey}`)).status).toBe(404);
  });

  it('serves scores, rankings and the average attempts statistic', async () => {
    const { body } = await call('POST', '/api/game', { userName: 'alice', attemptsAllowed: 1 });
    await call('PUT', `/api/game/${body.urlsafeKey}`, { guess: 'z' });

    const scores = await call('GET', '/api/scores/high_scores?numberOfResults=5');
    expect(scores.body.items).toEqual([
      { userName: 'alice', date: body.date, score: 0 },
    ]);

    const rankings = await call('GET', '/api/user/rankings');
    expect(rankings.body.items).toEqual([
      { userName: 'alice', totalScore: 0, totalPlayed: 1, averageScore: 0 },
    ]);

    const completed = await call('GET', '/api/games/user/alice?completed=true');
    expect(completed.body.items).toHaveLength(1);

    const average = await call('GET', '/api/games/average_attempts');
    expect(average.body).toEqual({ averageAttemptsRemaining: 0 });
  });

  it('answers 500 when the store fails', async () => {
    store.listUsers = () => Promise.reject(new Error('store down'));
    const res = await call('GET', '/api/user/rankings');
    expect(res).toEqual({ status: 500, body: { error: 'Internal server error' } });
  });
});
