import { HttpStatus } from '@nestjs/common';
import type { Rejection } from '../../db/types/index.js';

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

export class BadRequestError extends GameError {
  constructor(message = 'Bad request', details?: Record<string, unknown>) {
    super('BAD_REQUEST', message, HttpStatus.BAD_REQUEST, details);
  }
}

export class NotFoundError extends GameError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

export class UnauthorizedError extends GameError {
  constructor(message = 'Unauthorized', details?: Record<string, unknown>) {
    super('UNAUTHORIZED', message, HttpStatus.UNAUTHORIZED, details);
  }
}

export class ConflictError extends GameError {
  constructor(message = 'Conflict', details?: Record<string, unknown>) {
    super('CONFLICT', message, HttpStatus.CONFLICT, details);
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 422, details);
  }
}

export class InvalidActionError extends GameError {
  constructor(message = 'Invalid action', details?: Record<string, unknown>) {
    super('INVALID_ACTION', message, 422, details);
  }
}

export class InsufficientResourceError extends GameError {
  constructor(message = 'Insufficient resource', details?: Record<string, unknown>) {
    super('INSUFFICIENT_RESOURCE', message, 422, details);
  }
}

export class InternalError extends GameError {
  constructor(message = 'Internal error', details?: Record<string, unknown>) {
    super('INTERNAL_ERROR', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}

/** Engine rejections outside an encounter surface as 422s */
export function rejectionError(rejection: Rejection): GameError {
  return rejection.code === 'INSUFFICIENT_RESOURCE'
    ? new InsufficientResourceError(rejection.message)
    : new InvalidActionError(rejection.message);
}
