/**
 * Unit Tests — AppError Hierarchy
 *
 * Status codes, isOperational and instanceof are what the error handler and
 * the readiness route branch on; a broken prototype chain would turn a 503
 * into a 500.
 */
import {
  AppError,
  NotFoundError,
  StorageUnavailableError,
  ValidationError,
} from '@shared/errors/AppError';

describe('AppError', () => {
  it('should set message and default statusCode to 500', () => {
    const error = new AppError('something broke');

    expect(error.message).toBe('something broke');
    expect(error.statusCode).toBe(500);
    expect(error.isOperational).toBe(true);
  });

  it('should allow marking an error as non-operational', () => {
    const error = new AppError('fatal crash', 500, false);

    expect(error.isOperational).toBe(false);
  });

  it('should be an instance of both Error and AppError', () => {
    const error = new AppError('test');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(AppError);
  });

  it('should capture a stack trace', () => {
    const error = new AppError('traced');

    expect(error.stack).toContain('AppError');
  });
});

describe('NotFoundError', () => {
  it('should set statusCode to 404 and format the message', () => {
    const error = new NotFoundError('Post', 'abc-123');

    expect(error.message).toBe('Post not found: abc-123');
    expect(error.statusCode).toBe(404);
    expect(error).toBeInstanceOf(AppError);
  });
});

describe('ValidationError', () => {
  it('should set statusCode to 400', () => {
    const error = new ValidationError('lat must be a number');

    expect(error.message).toBe('lat must be a number');
    expect(error.statusCode).toBe(400);
    expect(error.isOperational).toBe(true);
    expect(error).toBeInstanceOf(AppError);
  });
});

describe('StorageUnavailableError', () => {
  it('should set statusCode to 503 and name the failed operation', () => {
    const error = new StorageUnavailableError('findNearby');

    expect(error.message).toBe('Storage unavailable: findNearby failed');
    expect(error.statusCode).toBe(503);
    expect(error.isOperational).toBe(true);
  });

  it('should keep the driver error as cause', () => {
    const driverError = new Error('ECONNREFUSED');
    const error = new StorageUnavailableError('ping', driverError);

    expect(error.cause).toBe(driverError);
    expect(error).toBeInstanceOf(StorageUnavailableError);
    expect(error).toBeInstanceOf(AppError);
  });
});
