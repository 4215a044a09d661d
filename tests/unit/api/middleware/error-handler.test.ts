import { Request, Response, NextFunction } from 'express';
import { errorHandler, notFoundHandler, asyncHandler } from '../../../../src/api/middleware/error-handler';
import { NotFoundError, ValidationError } from '../../../../src/lib/utils/errors';

// Mock logger
jest.mock('../../../../src/lib/utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

describe('Error Handler Middleware', () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let nextFunction: jest.Mock;

  beforeEach(() => {
    mockRequest = { path: '/api/v1/targets/9', method: 'GET' };
    mockResponse = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
    };
    nextFunction = jest.fn();
  });

  const handle = (error: Error): void => {
    errorHandler(error, mockRequest as Request, mockResponse as Response, nextFunction as NextFunction);
  };

  it('should render platform errors with their status and code', () => {
    handle(new NotFoundError('Target', 9));

    expect(mockResponse.status).toHaveBeenCalledWith(404);
    expect(mockResponse.json).toHaveBeenCalledWith({
      error: {
        code: 'NOT_FOUND',
        message: 'Target 9 not found',
        details: { resource: 'Target', id: 9 },
      },
    });
  });

  it('should include validation details', () => {
    handle(new ValidationError('Invalid period: 2w'));

    expect(mockResponse.status).toHaveBeenCalledWith(400);
    expect(mockResponse.json).toHaveBeenCalledWith({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid period: 2w',
        details: undefined,
      },
    });
  });

  it('should map malformed JSON to a 400', () => {
    handle(new SyntaxError('Unexpected token } in JSON'));

    expect(mockResponse.status).toHaveBeenCalledWith(400);
    expect(mockResponse.json).toHaveBeenCalledWith({
      error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' },
    });
  });

  it('should hide unknown errors behind a 500', () => {
    handle(new Error('connection reset'));

    expect(mockResponse.status).toHaveBeenCalledWith(500);
    expect(mockResponse.json).toHaveBeenCalledWith({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });

  it('should report unknown routes', () => {
    notFoundHandler(mockRequest as Request, mockResponse as Response);

    expect(mockResponse.status).toHaveBeenCalledWith(404);
    expect(mockResponse.json).toHaveBeenCalledWith({
      error: { code: 'NOT_FOUND', message: 'Route GET /api/v1/targets/9 not found' },
    });
  });

  it('should forward rejected handlers to next', async () => {
    const failure = new Error('boom');
    const wrapped = asyncHandler(async () => {
      throw failure;
    });

    wrapped(mockRequest as Request, mockResponse as Response, nextFunction as NextFunction);
    await new Promise((resolve) => setImmediate(resolve));

    expect(nextFunction).toHaveBeenCalledWith(failure);
  });
});
