import { HttpStatus } from '@nestjs/common';

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class NotFoundError extends GameError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

export class TurnConflictError extends GameError {
  constructor(
    code: 'TURN_NO_MISMATCH' | 'TURN_CONFLICT' = 'TURN_CONFLICT',
    message = 'Turn conflict',
    details?: Record<string, unknown>,
  ) {
    super(code, message, HttpStatus.CONFLICT, details);
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 422, details);
  }
}

/** Durable store read/write failed. The turn's commits were not kept. */
export class PersistenceError extends GameError {
  constructor(
    message = 'Session state could not be persisted',
    details?: Record<string, unknown>,
  ) {
    super(
      'PERSISTENCE_FAILED',
      message,
      HttpStatus.SERVICE_UNAVAILABLE,
      details,
    );
  }
}

export class InternalError extends GameError {
  constructor(message = 'Internal error', details?: Record<string, unknown>) {
    super('INTERNAL_ERROR', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}
