import { NotFoundException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { GameExceptionFilter } from './game-exception.filter.js';
import { InvalidActionError, InternalError } from '../errors/game-errors.js';

function fakeResponse() {
  const res = {
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockReturnValue(res);
  return res;
}

describe('GameExceptionFilter', () => {
  const filter = new GameExceptionFilter();

  it('renders a GameError with its status and code', () => {
    const res = fakeResponse();
    filter.catch(new InvalidActionError('Rusty Sword cannot be enhanced.'), new ExecutionContextHost([{}, res]));
    expect(res.status).toHaveBeenCalledWith(422);
    expect(res.json).toHaveBeenCalledWith({
      code: 'INVALID_ACTION',
      message: 'Rusty Sword cannot be enhanced.',
      details: null,
    });
  });

  it('keeps details', () => {
    const res = fakeResponse();
    filter.catch(new InternalError('Corrupt save', { userId: 'u1' }), new ExecutionContextHost([{}, res]));
    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({
      code: 'INTERNAL_ERROR',
      message: 'Corrupt save',
      details: { userId: 'u1' },
    });
  });

  it('wraps framework HttpExceptions', () => {
    const res = fakeResponse();
    filter.catch(new NotFoundException('Cannot GET /nope'), new ExecutionContextHost([{}, res]));
    expect(res.status).toHaveBeenCalledWith(404);
    const body = res.json.mock.calls[0][0];
    expect(body.code).toBe('HTTP_ERROR');
    expect(body.message).toBe('Cannot GET /nope');
  });

  it('hides unknown errors behind a 500', () => {
    const res = fakeResponse();
    filter.catch(new Error('boom'), new ExecutionContextHost([{}, res]));
    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
      details: null,
    });
  });
});
