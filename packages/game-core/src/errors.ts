// packages/game-core/src/errors.ts
//
// Error taxonomy for the hangman core.
//
//   • ValidationError → malformed request (bad attempts, bad guess, duplicate guess)
//   • NotFoundError   → unknown game or user reference
//   • ConflictError   → user name already taken
//
// Requests against a finished game or a complete level are *not* errors:
// the core answers them with a `{ status: 'rejected' }` result instead.

export type GameErrorCode = 'VALIDATION' | 'NOT_FOUND' | 'CONFLICT';

export class GameError extends Error {
  constructor(
    readonly code: GameErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends GameError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

export class NotFoundError extends GameError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class ConflictError extends GameError {
  constructor(message: string) {
    super('CONFLICT', message);
  }
}
